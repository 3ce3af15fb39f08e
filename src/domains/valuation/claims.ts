/**
 * Pro-rata claims of a PooledLiquidity position on its market.
 */

import { ArithmeticFaultError, ContractViolationError } from "@/lib/errors";
import { assertInt256, mulDivInt256 } from "@/lib/math";

import { PERCENTAGE_DECIMALS } from "./constants";
import { isValidTier } from "./market-dates";
import { isPooledLiquidity } from "./types";
import type { CashClaims, CashGroupParameters, MarketParameters, Position } from "./types";

const requireLiquidityTier = (position: Position): number => {
  if (!isPooledLiquidity(position)) {
    throw new ContractViolationError("Cash claims require a pooled liquidity position", {
      kind: position.kind.type,
    });
  }
  if (position.notional < 0n) {
    throw new ContractViolationError("Pooled liquidity notional cannot be negative", {
      notional: position.notional,
    });
  }
  return position.kind.tier;
};

/**
 * Unhaircut share of the market's pooled cash and pooled claims.
 */
export const getCashClaims = (position: Position, market: MarketParameters): CashClaims => {
  requireLiquidityTier(position);

  return {
    cashShare: mulDivInt256(
      market.totalCash,
      position.notional,
      market.totalLiquidity,
      "getCashClaims",
    ),
    claimShare: mulDivInt256(
      market.totalClaim,
      position.notional,
      market.totalLiquidity,
      "getCashClaims",
    ),
  };
};

const calculateHaircutShare = (
  total: bigint,
  tokens: bigint,
  haircut: bigint,
  totalLiquidity: bigint,
): bigint => {
  if (totalLiquidity === 0n) {
    throw new ArithmeticFaultError("Division by zero in getHaircutCashClaims");
  }
  const share = assertInt256(total * tokens, "getHaircutCashClaims");
  return mulDivInt256(share, haircut, PERCENTAGE_DECIMALS, "getHaircutCashClaims") / totalLiquidity;
};

/**
 * Liquidity haircut percentage for a tier.
 */
export const getLiquidityHaircut = (cashGroup: CashGroupParameters, tier: number): bigint => {
  const haircut = isValidTier(tier) ? cashGroup.liquidityHaircuts[tier - 1] : undefined;
  if (haircut === undefined) {
    throw new ContractViolationError(`No liquidity haircut for tier ${tier}`, {
      currencyId: cashGroup.currencyId,
      tier,
    });
  }
  return haircut;
};

/**
 * Share of pooled cash and claims scaled by the tier's liquidity haircut.
 */
export const getHaircutCashClaims = (
  position: Position,
  market: MarketParameters,
  cashGroup: CashGroupParameters,
): CashClaims => {
  const tier = requireLiquidityTier(position);
  if (position.currencyId !== cashGroup.currencyId) {
    throw new ContractViolationError("Position currency does not match cash group", {
      positionCurrencyId: position.currencyId,
      cashGroupCurrencyId: cashGroup.currencyId,
    });
  }

  const haircut = getLiquidityHaircut(cashGroup, tier);
  return {
    cashShare: calculateHaircutShare(
      market.totalCash,
      position.notional,
      haircut,
      market.totalLiquidity,
    ),
    claimShare: calculateHaircutShare(
      market.totalClaim,
      position.notional,
      haircut,
      market.totalLiquidity,
    ),
  };
};
