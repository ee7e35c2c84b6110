/**
 * Reprice policies decide whether a better book price justifies a cancel/replace.
 */

export interface RepricePolicy {
  shouldReprice: (oldPrice: number, newPrice: number, elapsedSeconds: number) => boolean;
}

/**
 * Relative change of `newPrice` against `oldPrice`. A move away from zero is
 * an unbounded change.
 */
export const priceChangePct = (oldPrice: number, newPrice: number): number => {
  if (oldPrice === 0) {
    return newPrice === 0 ? 0 : Number.POSITIVE_INFINITY;
  }
  return Math.abs(newPrice - oldPrice) / Math.abs(oldPrice);
};

export const alwaysReprice: RepricePolicy = {
  shouldReprice: () => true,
};

/**
 * Reprice only when the relative move reaches `minPct` (inclusive).
 */
export const createMinChangeRepricePolicy = (minPct: number): RepricePolicy => ({
  shouldReprice: (oldPrice, newPrice) => priceChangePct(oldPrice, newPrice) >= minPct,
});

/**
 * Defer to `inner` until `afterSeconds` have elapsed, then allow any non-zero move.
 */
export const createElapsedOverrideRepricePolicy = (
  afterSeconds: number,
  inner: RepricePolicy,
): RepricePolicy => ({
  shouldReprice: (oldPrice, newPrice, elapsedSeconds) => {
    if (elapsedSeconds >= afterSeconds) {
      return oldPrice !== newPrice;
    }
    return inner.shouldReprice(oldPrice, newPrice, elapsedSeconds);
  },
});

/**
 * Reprice only when every policy agrees.
 */
export const createCompositeRepricePolicy = (policies: readonly RepricePolicy[]): RepricePolicy => ({
  shouldReprice: (oldPrice, newPrice, elapsedSeconds) =>
    policies.every((policy) => policy.shouldReprice(oldPrice, newPrice, elapsedSeconds)),
});

export interface RepriceThresholds {
  minRepricePct: number;
  repriceOverrideAfterSeconds: number;
}

/**
 * Pick the policy for a set of thresholds:
 * - neither set: always reprice
 * - minimum move only: min-change
 * - override set: min-change (zero when unset) with an elapsed override
 */
export const createRepricePolicy = ({
  minRepricePct,
  repriceOverrideAfterSeconds,
}: RepriceThresholds): RepricePolicy => {
  if (minRepricePct <= 0 && repriceOverrideAfterSeconds <= 0) {
    return alwaysReprice;
  }
  const minChange = createMinChangeRepricePolicy(Math.max(minRepricePct, 0));
  if (repriceOverrideAfterSeconds <= 0) {
    return minChange;
  }
  return createElapsedOverrideRepricePolicy(repriceOverrideAfterSeconds, minChange);
};
