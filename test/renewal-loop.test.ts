import { afterEach, describe, expect, it, vi } from "vitest";
import { createSilentLogger } from "../src/logger.js";
import type { EnsureSubscriptionOutcome } from "../src/subscription/manager.js";
import { RenewalLoop } from "../src/subscription/renewal-loop.js";

const RENEWED: EnsureSubscriptionOutcome = { status: "renewed", subscriptionId: "sub-1" };

function gate() {
  let open: (outcome: EnsureSubscriptionOutcome) => void = () => undefined;
  const promise = new Promise<EnsureSubscriptionOutcome>((resolve) => {
    open = resolve;
  });
  return { promise, open: (outcome: EnsureSubscriptionOutcome) => open(outcome) };
}

describe("RenewalLoop", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("waits for a running renewal before stopping", async () => {
    const pending = gate();
    const ensureSubscription = vi.fn(() => pending.promise);
    const loop = new RenewalLoop({ ensureSubscription }, 60_000, createSilentLogger());

    const run = loop.runOnce();
    let stopped = false;
    const stopping = loop.stop().then(() => {
      stopped = true;
    });
    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(stopped).toBe(false);

    pending.open(RENEWED);
    await stopping;
    await run;
    expect(stopped).toBe(true);
  });

  it("skips a run that starts while another is going", async () => {
    const pending = gate();
    const ensureSubscription = vi.fn(() => pending.promise);
    const loop = new RenewalLoop({ ensureSubscription }, 60_000, createSilentLogger());

    const first = loop.runOnce();
    const second = loop.runOnce();
    pending.open(RENEWED);
    await Promise.all([first, second]);

    expect(ensureSubscription).toHaveBeenCalledTimes(1);
  });

  it("renews at start and on every interval until stopped", async () => {
    vi.useFakeTimers();
    const ensureSubscription = vi.fn(async () => RENEWED);
    const loop = new RenewalLoop({ ensureSubscription }, 1_000, createSilentLogger());

    await loop.start();
    expect(ensureSubscription).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(2_000);
    expect(ensureSubscription).toHaveBeenCalledTimes(3);

    await loop.stop();
    await vi.advanceTimersByTimeAsync(5_000);
    expect(ensureSubscription).toHaveBeenCalledTimes(3);
  });
});
