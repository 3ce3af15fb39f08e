/**
 * Valuation domain types, schemas, and type guards.
 *
 * Amounts are signed bigint in the currency's internal precision. Rates are
 * bigint in `RATE_PRECISION`. Timestamps are unix seconds.
 */

import * as v from "valibot";

// --- Positions ---

export type PositionKindType = "FUTURE_CLAIM" | "POOLED_LIQUIDITY";

/**
 * A FutureClaim pays `notional` at `maturity`. A PooledLiquidity position owns
 * a pro-rata share of the market on tenor `tier` (1..9).
 */
export type PositionKind = { type: "FUTURE_CLAIM" } | { type: "POOLED_LIQUIDITY"; tier: number };

export interface Position {
  currencyId: number;
  /** For PooledLiquidity this is the market's maturity, not the settlement date. */
  maturity: number;
  kind: PositionKind;
  /** Positive = claim held, negative = liability owed. */
  notional: bigint;
}

// --- Market state ---

/**
 * Snapshot of one (currency, tenor) market. Immutable during a valuation pass.
 */
export interface MarketParameters {
  maturity: number;
  /** Pooled cash, asset denominated. */
  totalCash: bigint;
  /** Pooled future claims, underlying denominated. */
  totalClaim: bigint;
  /** Pooled ownership units. */
  totalLiquidity: bigint;
  oracleRate: bigint;
}

// --- Cash group ---

/**
 * Per-currency risk parameters used while valuing one currency run.
 */
export interface CashGroupParameters {
  currencyId: number;
  /** Number of tenors the currency lists, 1..9. */
  maxMarketIndex: number;
  /** Added to the oracle rate when discounting positive claims. */
  claimHaircut: bigint;
  /** Subtracted from the oracle rate when discounting liabilities. */
  debtBuffer: bigint;
  /** Percentage kept per tier, index 0 = tier 1. */
  liquidityHaircuts: readonly bigint[];
  /** Annualized supply rate, short end of the curve before the first tenor. */
  supplyRate: bigint;
  tenorLength: (tier: number) => number;
  convertFromUnderlying: (underlying: bigint) => bigint;
}

// --- Results ---

export interface CashClaims {
  /** Asset denominated. */
  cashShare: bigint;
  /** Underlying denominated, undiscounted. */
  claimShare: bigint;
}

export interface LiquidityTokenValue {
  /** Asset denominated. */
  cashShare: bigint;
  /** Underlying denominated present value, 0 when netted into a FutureClaim. */
  netValue: bigint;
}

export interface CashGroupValue {
  netValueAsset: bigint;
  /** Start index of the next currency run. */
  nextIndex: number;
}

export interface MarketIndexResult {
  marketIndex: number;
  /** True when the maturity falls between two tenors. */
  idiosyncratic: boolean;
}

// --- Valibot Schemas ---

export const bigintSchema = v.custom<bigint>(
  (input) => typeof input === "bigint",
  "Expected bigint",
);

export const timestampSchema = v.pipe(v.number(), v.integer(), v.minValue(0));

export const positionKindSchema = v.variant("type", [
  v.object({ type: v.literal("FUTURE_CLAIM") }),
  v.object({
    type: v.literal("POOLED_LIQUIDITY"),
    tier: v.pipe(v.number(), v.integer(), v.minValue(1), v.maxValue(9)),
  }),
]);

export const positionSchema = v.object({
  currencyId: v.pipe(v.number(), v.integer(), v.minValue(1)),
  maturity: timestampSchema,
  kind: positionKindSchema,
  notional: bigintSchema,
});

export const marketParametersSchema = v.object({
  maturity: timestampSchema,
  totalCash: bigintSchema,
  totalClaim: bigintSchema,
  totalLiquidity: bigintSchema,
  oracleRate: bigintSchema,
});

// Type Guards

export type FutureClaimPosition = Position & { kind: { type: "FUTURE_CLAIM" } };

export type PooledLiquidityPosition = Position & {
  kind: { type: "POOLED_LIQUIDITY"; tier: number };
};

export const isFutureClaim = (position: Position): position is FutureClaimPosition =>
  position.kind.type === "FUTURE_CLAIM";

export const isPooledLiquidity = (position: Position): position is PooledLiquidityPosition =>
  position.kind.type === "POOLED_LIQUIDITY";
