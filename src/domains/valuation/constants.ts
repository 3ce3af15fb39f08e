/**
 * Numeric constants shared by the valuation engine.
 *
 * Rates are fixed point in `RATE_PRECISION` (1e9 = 100%), times are unix
 * seconds, and the rate time basis is a 360-day year.
 */

/** 100% annualized. */
export const RATE_PRECISION = 1_000_000_000n;

/** One basis point in rate precision. */
export const BASIS_POINT = RATE_PRECISION / 10_000n;

/** Haircut tables are whole percentages. */
export const PERCENTAGE_DECIMALS = 100n;

export const SECONDS_IN_DAY = 86_400;
export const SECONDS_IN_QUARTER = 90 * SECONDS_IN_DAY;
export const SECONDS_IN_YEAR = 360 * SECONDS_IN_DAY;

/** Time basis that annualized rates are quoted against. */
export const IMPLIED_RATE_TIME = BigInt(SECONDS_IN_YEAR);

/** Highest standardized tenor index. */
export const MAX_MARKET_INDEX = 9;

/**
 * Tenor length per market index (index 1 at position 0):
 * 3M, 6M, 1Y, 2Y, 5Y, 7Y, 10Y, 15Y, 20Y.
 */
export const TENOR_LENGTHS: readonly number[] = [
  SECONDS_IN_QUARTER,
  2 * SECONDS_IN_QUARTER,
  SECONDS_IN_YEAR,
  2 * SECONDS_IN_YEAR,
  5 * SECONDS_IN_YEAR,
  7 * SECONDS_IN_YEAR,
  10 * SECONDS_IN_YEAR,
  15 * SECONDS_IN_YEAR,
  20 * SECONDS_IN_YEAR,
];
