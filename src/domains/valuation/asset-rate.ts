/**
 * Conversion between a currency's underlying and native (asset) denominations.
 *
 * The conversion is linear: one asset unit is worth `rate / rateDecimals`
 * underlying units. Division truncates toward zero.
 */

import * as v from "valibot";

import { ArithmeticFaultError } from "@/lib/errors";
import { mulDivInt256 } from "@/lib/math";

import { bigintSchema } from "./types";

export const AssetRateSchema = v.object({
  rate: bigintSchema,
  rateDecimals: bigintSchema,
});

export type AssetRateParameters = v.InferOutput<typeof AssetRateSchema>;

export interface AssetRate extends AssetRateParameters {
  convertFromUnderlying: (underlying: bigint) => bigint;
  convertToUnderlying: (asset: bigint) => bigint;
}

/** Rate precision of an identity conversion. */
export const ASSET_RATE_DECIMALS = 10n ** 18n;

export const IDENTITY_ASSET_RATE: AssetRateParameters = {
  rate: ASSET_RATE_DECIMALS,
  rateDecimals: ASSET_RATE_DECIMALS,
};

export const createAssetRate = (parameters: AssetRateParameters): AssetRate => {
  const { rate, rateDecimals } = v.parse(AssetRateSchema, parameters);
  if (rate <= 0n || rateDecimals <= 0n) {
    throw new ArithmeticFaultError("Asset rate must be positive", { rate, rateDecimals });
  }

  return {
    rate,
    rateDecimals,
    convertFromUnderlying: (underlying: bigint): bigint =>
      mulDivInt256(underlying, rateDecimals, rate, "convertFromUnderlying"),
    convertToUnderlying: (asset: bigint): bigint =>
      mulDivInt256(asset, rate, rateDecimals, "convertToUnderlying"),
  };
};
