import type { TokenProvider } from "../auth/microsoft.js";
import type { GraphSubscription, MicrosoftGraphClient } from "../clients/microsoft-graph.js";
import { AuthRequiredError, RemoteApiError } from "../errors.js";
import { HttpError, formatErrorBody, type JsonResponse } from "../http.js";
import type { SubscriptionStateStore } from "../integration-state.js";
import type { Logger } from "../logger.js";
import { toGraphUtc } from "../meetings/times.js";

/** Calendar subscriptions are capped at 4230 minutes; two days leaves room for a missed run. */
export const SUBSCRIPTION_LIFETIME_MS = 2 * 24 * 60 * 60 * 1000;
export const SUBSCRIPTION_RESOURCE = "/me/events";
export const SUBSCRIPTION_CHANGE_TYPE = "updated";

export interface SubscriptionManagerOptions {
  notificationUrl: string;
  clientState: string;
  now?: () => Date;
}

export interface SubscriptionManagerDeps {
  tokens: TokenProvider;
  graph: Pick<MicrosoftGraphClient, "createSubscription" | "renewSubscription">;
  state: SubscriptionStateStore;
  logger: Logger;
}

export interface CreatedSubscription {
  subscriptionId: string;
}

export type EnsureSubscriptionOutcome =
  | { status: "renewed"; subscriptionId: string }
  | { status: "created"; subscriptionId: string }
  | { status: "skipped"; reason: "no_token" }
  | { status: "failed"; message: string };

/** Keeps exactly one live Graph subscription pointed at the webhook endpoint. */
export class SubscriptionManager {
  private readonly now: () => Date;

  constructor(
    private readonly deps: SubscriptionManagerDeps,
    private readonly options: SubscriptionManagerOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Scheduled path: renew the stored subscription, or create a new one when
   * there is none or renewal is refused. Never throws.
   */
  async ensureSubscription(): Promise<EnsureSubscriptionOutcome> {
    const { logger, state } = this.deps;

    try {
      const token = await this.deps.tokens.getAccessToken();
      if (!token) {
        logger.info("Skipping subscription renewal: no Microsoft token");
        return { status: "skipped", reason: "no_token" };
      }

      const subscriptionId = state.getSubscriptionId();
      if (subscriptionId && (await this.tryRenew(subscriptionId))) {
        return { status: "renewed", subscriptionId };
      }

      const created = await this.createSubscription();
      return { status: "created", subscriptionId: created.subscriptionId };
    } catch (error) {
      logger.error({ err: error }, "Webhook subscription renewal error");
      return { status: "failed", message: error instanceof Error ? error.message : String(error) };
    }
  }

  /** Interactive path: registers a new subscription and stores its id, or throws. */
  async createSubscription(): Promise<CreatedSubscription> {
    const { graph, logger, state } = this.deps;

    const token = await this.deps.tokens.getAccessToken();
    if (!token) {
      throw new AuthRequiredError("Authentication required.");
    }

    let response: JsonResponse<GraphSubscription>;
    try {
      response = await graph.createSubscription({
        changeType: SUBSCRIPTION_CHANGE_TYPE,
        notificationUrl: this.options.notificationUrl,
        resource: SUBSCRIPTION_RESOURCE,
        expirationDateTime: this.expiry(),
        clientState: this.options.clientState,
      });
    } catch (error) {
      if (error instanceof HttpError) {
        logger.error(
          { status: error.status, body: formatErrorBody(error.body) },
          "Graph webhook subscription failed",
        );
        throw RemoteApiError.fromHttpError(error, `Failed to subscribe: ${error.status}`);
      }
      throw error;
    }

    if (response.status !== 201 || !response.data.id) {
      logger.error(
        { status: response.status, body: formatErrorBody(response.data) },
        "Graph webhook subscription failed",
      );
      throw new RemoteApiError(`Failed to subscribe: ${response.status}`, response.status, response.data);
    }

    state.setSubscriptionId(response.data.id);
    logger.info({ subscriptionId: response.data.id }, "Graph webhook subscription created");
    return { subscriptionId: response.data.id };
  }

  private async tryRenew(subscriptionId: string): Promise<boolean> {
    try {
      const response = await this.deps.graph.renewSubscription(subscriptionId, this.expiry());
      if (response.status === 200) {
        this.deps.logger.info({ subscriptionId }, "Graph webhook subscription renewed");
        return true;
      }
      this.deps.logger.warn({ subscriptionId, status: response.status }, "Webhook renewal warning");
      return false;
    } catch (error) {
      this.deps.logger.warn(
        {
          subscriptionId,
          status: error instanceof HttpError ? error.status : undefined,
          body: error instanceof HttpError ? formatErrorBody(error.body) : undefined,
          err: error instanceof HttpError ? undefined : error,
        },
        "Webhook renewal warning",
      );
      return false;
    }
  }

  private expiry(): string {
    return toGraphUtc(new Date(this.now().getTime() + SUBSCRIPTION_LIFETIME_MS));
  }
}
