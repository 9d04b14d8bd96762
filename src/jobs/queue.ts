import type { Logger } from "../logger.js";

export interface JobQueue<P> {
  /** Schedules the job and returns at once; the job runs on a later tick. */
  enqueue(payload: P): void;
}

export type JobHandler<P> = (payload: P) => Promise<unknown>;

/**
 * Fire-and-forget queue running jobs in this process. Failures are logged and
 * dropped; nothing is retried.
 */
export class InProcessJobQueue<P> implements JobQueue<P> {
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly name: string,
    private readonly handler: JobHandler<P>,
    private readonly logger: Logger,
  ) {}

  get size(): number {
    return this.pending.size;
  }

  enqueue(payload: P): void {
    const job: Promise<void> = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => this.handler(payload))
      .then(
        () => undefined,
        (error: unknown) => {
          this.logger.error({ queue: this.name, err: error }, "Background job failed");
        },
      )
      .finally(() => {
        this.pending.delete(job);
      });
    this.pending.add(job);
  }

  /** Resolves once every job enqueued so far (and any they enqueue) has settled. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending);
    }
  }
}
