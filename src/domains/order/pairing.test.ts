import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createPairing } from "./pairing";

describe("createPairing", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should start outstanding", () => {
    const pairing = createPairing();

    expect(pairing.isPairFilled()).toBe(false);
    expect(pairing.isPairFailed()).toBe(false);
  });

  it("should keep flags set once notified", () => {
    const pairing = createPairing();

    pairing.notifyFailed();
    pairing.notifyFailed();

    expect(pairing.isPairFailed()).toBe(true);
    expect(pairing.isPairFilled()).toBe(false);
  });

  it("should resolve immediately when already filled", async () => {
    const pairing = createPairing();
    pairing.notifyFilled();

    await expect(pairing.waitForPair(1000)).resolves.toEqual({ filled: true, failed: false });
  });

  it("should resolve when the pair fails while waiting", async () => {
    const pairing = createPairing();
    const waiting = pairing.waitForPair();

    pairing.notifyFailed();

    await expect(waiting).resolves.toEqual({ filled: false, failed: true });
  });

  it("should report both flags false on timeout", async () => {
    const pairing = createPairing();
    const waiting = pairing.waitForPair(5000);

    await vi.advanceTimersByTimeAsync(5000);

    await expect(waiting).resolves.toEqual({ filled: false, failed: false });
    expect(vi.getTimerCount()).toBe(0);
  });

  it("should clear its timer when resolved early", async () => {
    const pairing = createPairing();
    const waiting = pairing.waitForPair(5000);

    pairing.notifyFilled();

    await expect(waiting).resolves.toEqual({ filled: true, failed: false });
    expect(vi.getTimerCount()).toBe(0);
  });
});
