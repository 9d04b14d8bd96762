import type { Logger } from "../logger.js";
import type { SubscriptionManager } from "./manager.js";

/**
 * Runs `ensureSubscription()` now and then on a fixed interval. A tick that
 * lands while a run is still going is skipped; `stop()` waits for that run.
 */
export class RenewalLoop {
  private timer: NodeJS.Timeout | undefined;
  private inFlight: Promise<void> | undefined;

  constructor(
    private readonly subscriptions: Pick<SubscriptionManager, "ensureSubscription">,
    private readonly intervalMs: number,
    private readonly logger: Logger,
  ) {}

  async start(): Promise<void> {
    await this.runOnce();
    this.timer = setInterval(() => {
      this.runOnce().catch((error: unknown) => {
        this.logger.error({ err: error }, "Subscription renewal error");
      });
    }, this.intervalMs);
  }

  runOnce(): Promise<void> {
    if (this.inFlight) {
      this.logger.warn("Previous subscription renewal still running; skipping this interval");
      return this.inFlight;
    }
    this.inFlight = this.subscriptions
      .ensureSubscription()
      .then((outcome) => {
        this.logger.info({ outcome }, "Subscription renewal finished");
      })
      .finally(() => {
        this.inFlight = undefined;
      });
    return this.inFlight;
  }

  async stop(): Promise<void> {
    clearInterval(this.timer);
    this.timer = undefined;
    await this.inFlight;
  }
}
