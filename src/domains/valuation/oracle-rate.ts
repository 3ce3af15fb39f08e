/**
 * Market lookup and oracle rates along the tenor curve.
 */

import { ContractViolationError } from "@/lib/errors";

import { getMarketIndex, getMarketMaturity } from "./market-dates";
import type { CashGroupParameters, MarketParameters } from "./types";

/**
 * Market state for a listed tenor.
 *
 * `markets` is indexed by market index - 1. The stored maturity must match the
 * tenor's maturity at `now`, otherwise the snapshot belongs to another cycle.
 */
export const loadMarket = (
  cashGroup: CashGroupParameters,
  markets: readonly MarketParameters[],
  marketIndex: number,
  now: number,
): MarketParameters => {
  if (marketIndex < 1 || marketIndex > cashGroup.maxMarketIndex) {
    throw new ContractViolationError(`Market index ${marketIndex} is not listed`, {
      currencyId: cashGroup.currencyId,
      marketIndex,
      maxMarketIndex: cashGroup.maxMarketIndex,
    });
  }

  const market = markets[marketIndex - 1];
  if (!market) {
    throw new ContractViolationError(`Market ${marketIndex} is not loaded`, {
      currencyId: cashGroup.currencyId,
      marketIndex,
    });
  }

  const expectedMaturity = getMarketMaturity(marketIndex, now, cashGroup.tenorLength);
  if (market.maturity !== expectedMaturity) {
    throw new ContractViolationError(`Market ${marketIndex} state is not for the current cycle`, {
      currencyId: cashGroup.currencyId,
      marketIndex,
      expectedMaturity,
      maturity: market.maturity,
    });
  }

  return market;
};

/**
 * Linear interpolation between two points of the rate curve.
 */
const interpolateRate = (
  shortMaturity: number,
  shortRate: bigint,
  longMaturity: number,
  longRate: bigint,
  maturity: number,
): bigint => {
  const elapsed = BigInt(maturity - shortMaturity);
  const span = BigInt(longMaturity - shortMaturity);

  if (longRate >= shortRate) {
    return ((longRate - shortRate) * elapsed) / span + shortRate;
  }
  return shortRate - ((shortRate - longRate) * elapsed) / span;
};

/**
 * Oracle rate for any maturity up to the longest listed tenor.
 *
 * On a tenor this is the market's oracle rate. Between tenors it is
 * interpolated from the neighbouring markets; before the first tenor the short
 * end is the cash group's supply rate at `now`.
 */
export const getOracleRate = (
  cashGroup: CashGroupParameters,
  markets: readonly MarketParameters[],
  maturity: number,
  now: number,
): bigint => {
  if (maturity < now) {
    throw new ContractViolationError("Maturity is before valuation time", { maturity, now });
  }

  const { marketIndex, idiosyncratic } = getMarketIndex(
    cashGroup.maxMarketIndex,
    maturity,
    now,
    cashGroup.tenorLength,
  );
  const longMarket = loadMarket(cashGroup, markets, marketIndex, now);
  if (!idiosyncratic) return longMarket.oracleRate;

  if (marketIndex === 1) {
    return interpolateRate(
      now,
      cashGroup.supplyRate,
      longMarket.maturity,
      longMarket.oracleRate,
      maturity,
    );
  }

  const shortMarket = loadMarket(cashGroup, markets, marketIndex - 1, now);
  return interpolateRate(
    shortMarket.maturity,
    shortMarket.oracleRate,
    longMarket.maturity,
    longMarket.oracleRate,
    maturity,
  );
};
