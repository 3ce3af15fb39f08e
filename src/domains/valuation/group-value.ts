/**
 * Net value of one currency run of a portfolio.
 */

import { ContractViolationError } from "@/lib/errors";
import { assertInt256 } from "@/lib/math";

import { getPresentValue, getRiskAdjustedPresentValue } from "./discount";
import { getLiquidityTokenValue } from "./liquidity-token";
import { getOracleRate } from "./oracle-rate";
import { comparePositions } from "./portfolio";
import type { PortfolioLedger } from "./portfolio";
import { isFutureClaim, isPooledLiquidity } from "./types";
import type { CashGroupParameters, CashGroupValue, MarketParameters } from "./types";

/**
 * End of the run of `currencyId` starting at `startIndex`.
 *
 * The run must be ordered and must be the only place the currency appears
 * after `startIndex`.
 */
const findRunEnd = (ledger: PortfolioLedger, currencyId: number, startIndex: number): number => {
  let end = startIndex;
  while (end < ledger.length && ledger.at(end).currencyId === currencyId) {
    if (end > startIndex && comparePositions(ledger.at(end - 1), ledger.at(end)) >= 0) {
      throw new ContractViolationError("Currency run is not sorted", { currencyId, index: end });
    }
    end++;
  }

  for (let i = end; i < ledger.length; i++) {
    if (ledger.at(i).currencyId === currencyId) {
      throw new ContractViolationError("Currency positions are not contiguous", {
        currencyId,
        index: i,
      });
    }
  }

  return end;
};

/**
 * Net present value of the run of `cashGroup.currencyId` positions starting at
 * `startIndex`, in the currency's asset denomination.
 *
 * Liquidity positions are valued first so that their claim shares are netted
 * into matching FutureClaims before those are discounted. With `riskAdjusted`
 * the liquidity haircuts and the claim haircut or debt buffer apply; without it
 * every claim is discounted at the plain oracle rate. Returns the index where
 * the next currency's run begins.
 */
export const getNetCashGroupValue = (
  ledger: PortfolioLedger,
  cashGroup: CashGroupParameters,
  markets: readonly MarketParameters[],
  now: number,
  startIndex: number,
  riskAdjusted = true,
): CashGroupValue => {
  if (!Number.isInteger(startIndex) || startIndex < 0 || startIndex > ledger.length) {
    throw new ContractViolationError(`Start index ${startIndex} out of range`, {
      startIndex,
      length: ledger.length,
    });
  }

  const runEnd = findRunEnd(ledger, cashGroup.currencyId, startIndex);
  let presentValueAsset = 0n;
  let presentValueUnderlying = 0n;

  for (let i = startIndex; i < runEnd; i++) {
    if (!isPooledLiquidity(ledger.at(i))) continue;

    const { cashShare, netValue } = getLiquidityTokenValue(
      ledger,
      i,
      cashGroup,
      markets,
      now,
      riskAdjusted,
    );
    presentValueAsset = assertInt256(presentValueAsset + cashShare, "getNetCashGroupValue");
    presentValueUnderlying = assertInt256(
      presentValueUnderlying + netValue,
      "getNetCashGroupValue",
    );
  }

  for (let i = startIndex; i < runEnd; i++) {
    const position = ledger.at(i);
    if (!isFutureClaim(position)) continue;
    if (position.notional === 0n) continue;

    const oracleRate = getOracleRate(cashGroup, markets, position.maturity, now);
    const presentValue = riskAdjusted
      ? getRiskAdjustedPresentValue(cashGroup, position.notional, position.maturity, now, oracleRate)
      : getPresentValue(position.notional, position.maturity, now, oracleRate);
    presentValueUnderlying = assertInt256(
      presentValueUnderlying + presentValue,
      "getNetCashGroupValue",
    );
  }

  return {
    netValueAsset: assertInt256(
      presentValueAsset + cashGroup.convertFromUnderlying(presentValueUnderlying),
      "getNetCashGroupValue",
    ),
    nextIndex: runEnd,
  };
};
