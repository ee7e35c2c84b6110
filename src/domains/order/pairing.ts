/**
 * Fill/fail signalling shared between an order's submitter and its executor.
 *
 * Both flags are one-shot: once set they stay set, and repeated notifications
 * are no-ops.
 */

export interface PairOutcome {
  filled: boolean;
  failed: boolean;
}

export interface Pairing {
  notifyFilled: () => void;
  notifyFailed: () => void;
  isPairFilled: () => boolean;
  isPairFailed: () => boolean;
  /**
   * Resolves once either flag is set, or with both flags as they stand when
   * `timeoutMs` elapses. Without a timeout it waits indefinitely.
   */
  waitForPair: (timeoutMs?: number) => Promise<PairOutcome>;
}

interface Signal {
  set: () => void;
  isSet: () => boolean;
  wait: Promise<void>;
}

const createSignal = (): Signal => {
  let flag = false;
  let release: () => void = () => {};
  const wait = new Promise<void>((resolve) => {
    release = resolve;
  });

  return {
    set: () => {
      if (!flag) {
        flag = true;
        release();
      }
    },
    isSet: () => flag,
    wait,
  };
};

export const createPairing = (): Pairing => {
  const filled = createSignal();
  const failed = createSignal();

  const outcome = (): PairOutcome => ({ filled: filled.isSet(), failed: failed.isSet() });

  const waitForPair = async (timeoutMs?: number): Promise<PairOutcome> => {
    if (filled.isSet() || failed.isSet()) {
      return outcome();
    }

    const resolved = Promise.race([filled.wait, failed.wait]);
    if (timeoutMs === undefined) {
      await resolved;
      return outcome();
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, timeoutMs);
    });
    try {
      await Promise.race([resolved, expired]);
    } finally {
      clearTimeout(timer);
    }
    return outcome();
  };

  return {
    notifyFilled: filled.set,
    notifyFailed: failed.set,
    isPairFilled: filled.isSet,
    isPairFailed: failed.isSet,
    waitForPair,
  };
};
