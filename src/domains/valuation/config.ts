/**
 * Cash group settings schema and defaults.
 *
 * Settings use the compact units governance stores them in: rate adjustments
 * in increments of 5 basis points, liquidity haircuts in whole percent, the
 * supply rate in basis points. `buildCashGroup` expands them into the
 * `CashGroupParameters` the engine consumes.
 */

import * as v from "valibot";

import type { AssetRate } from "./asset-rate";
import { BASIS_POINT, MAX_MARKET_INDEX } from "./constants";
import { getTenorLength } from "./market-dates";
import type { CashGroupParameters } from "./types";

/** Rate increment of the haircut and buffer settings. */
const FIVE_BASIS_POINTS = 5n * BASIS_POINT;

const percentageSchema = v.pipe(v.number(), v.integer(), v.minValue(0), v.maxValue(100));

export const CashGroupSettingsSchema = v.pipe(
  v.object({
    /** Number of listed tenors. */
    maxMarketIndex: v.pipe(v.number(), v.integer(), v.minValue(2), v.maxValue(MAX_MARKET_INDEX)),
    claimHaircut5Bps: v.pipe(v.number(), v.integer(), v.minValue(0), v.maxValue(255)),
    debtBuffer5Bps: v.pipe(v.number(), v.integer(), v.minValue(0), v.maxValue(255)),
    /** Percentage of pooled value kept per tier, one entry per listed tenor. */
    liquidityHaircuts: v.pipe(v.array(percentageSchema), v.maxLength(MAX_MARKET_INDEX)),
    supplyRateBps: v.pipe(v.number(), v.integer(), v.minValue(0), v.maxValue(100_000)),
  }),
  v.check(
    (settings) => settings.liquidityHaircuts.length >= settings.maxMarketIndex,
    "liquidityHaircuts must cover every listed tenor",
  ),
);

export type CashGroupSettings = v.InferOutput<typeof CashGroupSettingsSchema>;

export const DEFAULT_CASH_GROUP_SETTINGS: CashGroupSettings = {
  maxMarketIndex: 9,
  claimHaircut5Bps: 30, // 150 bps
  debtBuffer5Bps: 30, // 150 bps
  liquidityHaircuts: [99, 98, 97, 96, 95, 94, 93, 92, 91],
  supplyRateBps: 300, // 3%
};

/**
 * Validate settings and bind them to a currency and its asset rate.
 */
export const buildCashGroup = (
  currencyId: number,
  settings: CashGroupSettings,
  assetRate: Pick<AssetRate, "convertFromUnderlying">,
): CashGroupParameters => {
  const parsed = v.parse(CashGroupSettingsSchema, settings);

  return {
    currencyId,
    maxMarketIndex: parsed.maxMarketIndex,
    claimHaircut: BigInt(parsed.claimHaircut5Bps) * FIVE_BASIS_POINTS,
    debtBuffer: BigInt(parsed.debtBuffer5Bps) * FIVE_BASIS_POINTS,
    liquidityHaircuts: parsed.liquidityHaircuts.map((haircut) => BigInt(haircut)),
    supplyRate: BigInt(parsed.supplyRateBps) * BASIS_POINT,
    tenorLength: getTenorLength,
    convertFromUnderlying: assetRate.convertFromUnderlying,
  };
};
