/**
 * Tenor schedule arithmetic.
 *
 * Markets roll on a fixed quarterly cycle: every tenor's maturity is the
 * current quarter's reference time plus the tenor length.
 */

import { ContractViolationError } from "@/lib/errors";

import { MAX_MARKET_INDEX, SECONDS_IN_QUARTER, TENOR_LENGTHS } from "./constants";
import type { MarketIndexResult } from "./types";

export const isValidTier = (tier: number): boolean =>
  Number.isInteger(tier) && tier >= 1 && tier <= MAX_MARKET_INDEX;

/**
 * Length in seconds of the standardized tenor for a market index.
 */
export const getTenorLength = (tier: number): number => {
  const length = isValidTier(tier) ? TENOR_LENGTHS[tier - 1] : undefined;
  if (length === undefined) {
    throw new ContractViolationError(`Invalid market tier: ${tier}`, { tier });
  }
  return length;
};

/**
 * Start of the quarter containing `now`.
 */
export const getReferenceTime = (now: number): number => now - (now % SECONDS_IN_QUARTER);

export const getMarketMaturity = (
  tier: number,
  now: number,
  tenorLength: (tier: number) => number = getTenorLength,
): number => getReferenceTime(now) + tenorLength(tier);

/**
 * Find the tenor a maturity falls on.
 *
 * Returns the first market whose maturity equals (`idiosyncratic = false`) or
 * lies after (`idiosyncratic = true`) the given maturity.
 */
export const getMarketIndex = (
  maxMarketIndex: number,
  maturity: number,
  now: number,
  tenorLength: (tier: number) => number = getTenorLength,
): MarketIndexResult => {
  if (!isValidTier(maxMarketIndex)) {
    throw new ContractViolationError(`Invalid max market index: ${maxMarketIndex}`, {
      maxMarketIndex,
    });
  }

  const referenceTime = getReferenceTime(now);
  for (let marketIndex = 1; marketIndex <= maxMarketIndex; marketIndex++) {
    const marketMaturity = referenceTime + tenorLength(marketIndex);
    if (marketMaturity === maturity) return { marketIndex, idiosyncratic: false };
    if (marketMaturity > maturity) return { marketIndex, idiosyncratic: true };
  }

  throw new ContractViolationError(`No market found for maturity ${maturity}`, {
    maturity,
    now,
    maxMarketIndex,
  });
};

/**
 * True when the maturity is exactly one of the listed tenors and not in the past.
 */
export const isValidMarketMaturity = (
  maxMarketIndex: number,
  maturity: number,
  now: number,
  tenorLength: (tier: number) => number = getTenorLength,
): boolean => {
  if (maturity < now) return false;
  const referenceTime = getReferenceTime(now);
  for (let marketIndex = 1; marketIndex <= maxMarketIndex; marketIndex++) {
    if (referenceTime + tenorLength(marketIndex) === maturity) return true;
  }
  return false;
};
