import { GRAPH_API_BASE } from "../clients/microsoft-graph.js";

/**
 * A notification's `resource`: a full URL under the API base, a path under
 * it, or a URL pointing anywhere else. The last kind is never fetched, since
 * every fetch carries the bearer token.
 */
export type ResourceReference =
  | { kind: "absolute"; url: string }
  | { kind: "relative"; path: string }
  | { kind: "untrusted"; url: string };

export type TrustedResourceReference = Exclude<ResourceReference, { kind: "untrusted" }>;

const ABSOLUTE_URL = /^[a-z][a-z0-9+.-]*:\/\//i;

function isUnderApiBase(value: string, apiBase: string): boolean {
  let url: URL;
  let base: URL;
  try {
    url = new URL(value);
    base = new URL(`${apiBase.replace(/\/+$/, "")}/`);
  } catch {
    return false;
  }
  return (
    url.protocol === "https:" &&
    url.origin === base.origin &&
    url.username === "" &&
    url.password === "" &&
    url.pathname.startsWith(base.pathname)
  );
}

export function parseResourceReference(
  resource: string,
  apiBase: string = GRAPH_API_BASE,
): ResourceReference {
  const trimmed = resource.trim();
  if (ABSOLUTE_URL.test(trimmed)) {
    return isUnderApiBase(trimmed, apiBase)
      ? { kind: "absolute", url: trimmed }
      : { kind: "untrusted", url: trimmed };
  }
  return { kind: "relative", path: trimmed.replace(/^\/+/, "") };
}

export function resolveResourceUrl(
  reference: TrustedResourceReference,
  apiBase: string = GRAPH_API_BASE,
): string {
  switch (reference.kind) {
    case "absolute":
      return reference.url;
    case "relative":
      return `${apiBase.replace(/\/+$/, "")}/${reference.path}`;
  }
}
