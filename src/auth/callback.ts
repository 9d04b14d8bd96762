import type { MicrosoftGraphClient } from "../clients/microsoft-graph.js";
import type { DbClient } from "../db.js";
import type { IntegrationState } from "../integration-state.js";
import type { Logger } from "../logger.js";
import { parseRecordState, type MicrosoftAuth } from "./microsoft.js";

export interface OAuthCallbackParams {
  code?: string;
  state?: string;
  error?: string;
  errorDescription?: string;
}

export type OAuthCallbackResult =
  | { type: "redirect"; location: string }
  | { type: "bad_request"; message: string };

export interface OAuthCallbackDeps {
  auth: MicrosoftAuth;
  graph: MicrosoftGraphClient;
  db: DbClient;
  state: IntegrationState;
  logger: Logger;
}

const SUCCESS_LOCATION = "/?auth_status=success";
const ERROR_LOCATION = "/?auth_status=error";

/**
 * Completes the authorization-code login. The token is stored first; linking
 * the signed-in mailbox to local users is best effort.
 */
export async function completeMicrosoftLogin(
  params: OAuthCallbackParams,
  deps: OAuthCallbackDeps,
): Promise<OAuthCallbackResult> {
  const { logger } = deps;

  if (params.error) {
    logger.error(
      { error: params.error, description: params.errorDescription },
      "Microsoft OAuth returned an error",
    );
    return { type: "redirect", location: ERROR_LOCATION };
  }

  if (!params.code) {
    return { type: "bad_request", message: "Authorization code is missing from callback" };
  }

  try {
    await deps.auth.exchangeCode(params.code);
  } catch (error) {
    logger.error({ err: error }, "Microsoft OAuth callback failed");
    return { type: "redirect", location: ERROR_LOCATION };
  }

  await linkSignedInUser(deps);

  const record = parseRecordState(params.state);
  if (record) {
    return {
      type: "redirect",
      location: `/records/${record.kind}/${encodeURIComponent(record.name)}?auth_status=success`,
    };
  }
  return { type: "redirect", location: SUCCESS_LOCATION };
}

async function linkSignedInUser(deps: OAuthCallbackDeps): Promise<void> {
  try {
    const me = await deps.graph.getMe();
    const email = me.mail ?? me.userPrincipalName;
    if (!me.id || !email) {
      return;
    }

    deps.db.upsertDirectoryUser({
      email,
      objectId: me.id,
      displayName: me.displayName ?? null,
    });
    if (!deps.state.getOwner()) {
      deps.state.setOwner({ email, objectId: me.id });
    }
  } catch (error) {
    deps.logger.warn({ err: error }, "Failed to fetch signed-in Microsoft user");
  }
}
