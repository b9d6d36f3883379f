import type { FundamentalSnapshot } from "../../../core/entities/market";

const SNAPSHOT_FIELDS = [
  "trailingPe",
  "forwardPe",
  "trailingEps",
  "forwardEps",
  "dividendAmount",
  "dividendYield",
  "marketCap",
  "targetMeanPrice",
] as const satisfies ReadonlyArray<keyof FundamentalSnapshot>;

/**
 * Drops absent and non-finite fields so a snapshot only carries what the provider reported.
 */
export const compactSnapshot = (
  snapshot: FundamentalSnapshot,
): FundamentalSnapshot => {
  const compacted: FundamentalSnapshot = {};

  for (const field of SNAPSHOT_FIELDS) {
    const value = snapshot[field];
    if (value !== undefined && Number.isFinite(value)) {
      compacted[field] = value;
    }
  }

  return compacted;
};
