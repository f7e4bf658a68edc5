export type TierFraction = 0.05 | 0.1 | 0.15 | 0.2;

type TierBracket = {
  /** Exclusive lower bound of |pctDown|; the first bracket also admits 0. */
  above: number;
  /** Inclusive upper bound of |pctDown|. */
  upTo: number;
  fraction: TierFraction;
};

export const TIER_BRACKETS: readonly TierBracket[] = [
  { above: 0, upTo: 25, fraction: 0.05 },
  { above: 25, upTo: 50, fraction: 0.1 },
  { above: 50, upTo: 75, fraction: 0.15 },
  { above: 75, upTo: 99.9, fraction: 0.2 },
];

/**
 * Maps a drawdown from the all-time high to the share of remaining funds budgeted for one buy.
 * Only the magnitude counts. Drawdowns past 99.9% have no tier.
 */
export function classifyTier(pctDown: number): TierFraction | undefined {
  const magnitude = Math.abs(pctDown);
  if (magnitude === 0) {
    return TIER_BRACKETS[0].fraction;
  }
  for (const bracket of TIER_BRACKETS) {
    if (magnitude > bracket.above && magnitude <= bracket.upTo) {
      return bracket.fraction;
    }
  }
  return undefined;
}
