/**
 * Valuation module exports.
 */

// Types
export type {
  CashClaims,
  CashGroupParameters,
  CashGroupValue,
  FutureClaimPosition,
  LiquidityTokenValue,
  MarketIndexResult,
  MarketParameters,
  PooledLiquidityPosition,
  Position,
  PositionKind,
  PositionKindType,
} from "./types";

// Type guards
export { isFutureClaim, isPooledLiquidity } from "./types";

// Schemas
export {
  bigintSchema,
  marketParametersSchema,
  positionKindSchema,
  positionSchema,
  timestampSchema,
} from "./types";

// Constants
export {
  BASIS_POINT,
  IMPLIED_RATE_TIME,
  MAX_MARKET_INDEX,
  PERCENTAGE_DECIMALS,
  RATE_PRECISION,
  SECONDS_IN_DAY,
  SECONDS_IN_QUARTER,
  SECONDS_IN_YEAR,
  TENOR_LENGTHS,
} from "./constants";

// Config
export type { CashGroupSettings } from "./config";
export { CashGroupSettingsSchema, DEFAULT_CASH_GROUP_SETTINGS, buildCashGroup } from "./config";

// Asset rate
export type { AssetRate, AssetRateParameters } from "./asset-rate";
export {
  ASSET_RATE_DECIMALS,
  AssetRateSchema,
  IDENTITY_ASSET_RATE,
  createAssetRate,
} from "./asset-rate";

// Tenor schedule
export {
  getMarketIndex,
  getMarketMaturity,
  getReferenceTime,
  getTenorLength,
  isValidMarketMaturity,
  isValidTier,
} from "./market-dates";

// Markets and oracle rates
export { getOracleRate, loadMarket } from "./oracle-rate";

// Discounting
export {
  getDiscountFactor,
  getPresentValue,
  getRiskAdjustedPresentValue,
  getSettlementDate,
} from "./discount";

// Claims
export { getCashClaims, getHaircutCashClaims, getLiquidityHaircut } from "./claims";

// Portfolio ledger
export type { PortfolioLedger } from "./portfolio";
export {
  assertPortfolioSorted,
  comparePositions,
  createPortfolioLedger,
  sortPortfolio,
} from "./portfolio";

// Valuation
export { getLiquidityTokenValue } from "./liquidity-token";
export { getNetCashGroupValue } from "./group-value";
export type {
  CurrencyValuation,
  PortfolioValuation,
  PortfolioValuationDeps,
  PortfolioValuationInput,
} from "./portfolio-value";
export { valuePortfolio } from "./portfolio-value";
