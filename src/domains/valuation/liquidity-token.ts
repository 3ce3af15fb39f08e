/**
 * Net value of a single PooledLiquidity position.
 */

import { ContractViolationError } from "@/lib/errors";

import { getCashClaims, getHaircutCashClaims } from "./claims";
import { getPresentValue, getRiskAdjustedPresentValue } from "./discount";
import { getMarketIndex } from "./market-dates";
import { loadMarket } from "./oracle-rate";
import type { PortfolioLedger } from "./portfolio";
import { isPooledLiquidity } from "./types";
import type { CashGroupParameters, LiquidityTokenValue, MarketParameters } from "./types";

/**
 * Value the liquidity position at `index` in the ledger.
 *
 * The claim share is netted into a FutureClaim of the same currency and
 * maturity when the portfolio holds one; that entry is then valued by the
 * FutureClaim pass and `netValue` is 0. Otherwise the claim share is
 * discounted here at the market's oracle rate.
 */
export const getLiquidityTokenValue = (
  ledger: PortfolioLedger,
  index: number,
  cashGroup: CashGroupParameters,
  markets: readonly MarketParameters[],
  now: number,
  useHaircut: boolean,
): LiquidityTokenValue => {
  const position = ledger.at(index);
  if (!isPooledLiquidity(position)) {
    throw new ContractViolationError("Position is not pooled liquidity", {
      index,
      kind: position.kind.type,
    });
  }

  const { marketIndex, idiosyncratic } = getMarketIndex(
    cashGroup.maxMarketIndex,
    position.maturity,
    now,
    cashGroup.tenorLength,
  );
  if (idiosyncratic || marketIndex !== position.kind.tier) {
    throw new ContractViolationError("Liquidity position is not on a listed tenor", {
      index,
      maturity: position.maturity,
      tier: position.kind.tier,
      marketIndex,
    });
  }
  const market = loadMarket(cashGroup, markets, marketIndex, now);

  const { cashShare, claimShare } = useHaircut
    ? getHaircutCashClaims(position, market, cashGroup)
    : getCashClaims(position, market);

  const futureClaimIndex = ledger.findFutureClaim(position.currencyId, position.maturity);
  if (futureClaimIndex !== null) {
    ledger.accumulateNotional(futureClaimIndex, claimShare);
    return { cashShare, netValue: 0n };
  }

  const netValue = useHaircut
    ? getRiskAdjustedPresentValue(cashGroup, claimShare, position.maturity, now, market.oracleRate)
    : getPresentValue(claimShare, position.maturity, now, market.oracleRate);

  return { cashShare, netValue };
};
