export const API_TIMEOUT_MS = 30_000;
export const PROBE_TIMEOUT_MS = 10_000;

export class HttpError extends Error {
  readonly status: number;
  readonly body: unknown;
  readonly headers: Headers;

  constructor(message: string, status: number, body: unknown, headers: Headers) {
    super(message);
    this.name = "HttpError";
    this.status = status;
    this.body = body;
    this.headers = headers;
  }
}

function tryParseBody(text: string): unknown {
  if (!text) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export interface JsonResponse<T> {
  status: number;
  data: T;
}

/**
 * Performs a request and resolves with the parsed body and status. Any non-2xx
 * response rejects with an {@link HttpError} carrying the parsed body.
 */
export async function sendJson<T>(
  input: string,
  init: RequestInit = {},
  timeoutMs = API_TIMEOUT_MS,
): Promise<JsonResponse<T>> {
  const response = await fetch(input, {
    ...init,
    signal: init.signal ?? AbortSignal.timeout(timeoutMs),
  });

  const text = await response.text();
  const parsed = tryParseBody(text);

  if (!response.ok) {
    throw new HttpError(
      `Request failed with status ${response.status} for ${input}`,
      response.status,
      parsed,
      response.headers,
    );
  }

  return { status: response.status, data: (parsed ?? {}) as T };
}

export async function requestJson<T>(
  input: string,
  init: RequestInit = {},
  timeoutMs = API_TIMEOUT_MS,
): Promise<T> {
  const { data } = await sendJson<T>(input, init, timeoutMs);
  return data;
}

export function toFormBody(params: Record<string, string>): string {
  const body = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    body.set(key, value);
  }
  return body.toString();
}

export function formatErrorBody(body: unknown): string {
  if (typeof body === "string") {
    return body;
  }
  if (body === undefined) {
    return "";
  }
  try {
    return JSON.stringify(body);
  } catch {
    return String(body);
  }
}
