/**
 * Continuous-time discounting of future claims.
 *
 * present value = notional * e^(-rate * t / IMPLIED_RATE_TIME), with the
 * exponent evaluated in 64.64 fixed point and the factor expressed in
 * `RATE_PRECISION`.
 */

import { ArithmeticFaultError, ContractViolationError } from "@/lib/errors";
import { divu, exp, fromInt, mul, mulDivInt256, neg, toInt } from "@/lib/math";

import { IMPLIED_RATE_TIME, RATE_PRECISION, SECONDS_IN_QUARTER } from "./constants";
import { getTenorLength, isValidTier } from "./market-dates";
import { isPooledLiquidity } from "./types";
import type { CashGroupParameters, Position } from "./types";

const RATE_PRECISION_64X64 = fromInt(RATE_PRECISION);

/**
 * Discount factor in `RATE_PRECISION` for a time to maturity in seconds.
 */
export const getDiscountFactor = (timeToMaturity: number, oracleRate: bigint): bigint => {
  if (timeToMaturity < 0 || oracleRate < 0n) {
    throw new ContractViolationError("Discount inputs must be non-negative", {
      timeToMaturity,
      oracleRate,
    });
  }

  const expValue = mulDivInt256(
    oracleRate,
    BigInt(timeToMaturity),
    IMPLIED_RATE_TIME,
    "getDiscountFactor",
  );
  const exponent = divu(expValue, RATE_PRECISION);
  return toInt(mul(exp(neg(exponent)), RATE_PRECISION_64X64));
};

const applyDiscountFactor = (notional: bigint, discountFactor: bigint): bigint => {
  if (discountFactor > RATE_PRECISION) {
    throw new ArithmeticFaultError("Discount factor exceeds unity", { discountFactor });
  }
  return mulDivInt256(notional, discountFactor, RATE_PRECISION, "applyDiscountFactor");
};

const getTimeToMaturity = (maturity: number, now: number): number => {
  if (maturity < now) {
    throw new ContractViolationError("Maturity is before valuation time", { maturity, now });
  }
  return maturity - now;
};

/**
 * Present value of a claim paying `notional` at `maturity`.
 * Zero notional short-circuits before any time check.
 */
export const getPresentValue = (
  notional: bigint,
  maturity: number,
  now: number,
  oracleRate: bigint,
): bigint => {
  if (notional === 0n) return 0n;

  const discountFactor = getDiscountFactor(getTimeToMaturity(maturity, now), oracleRate);
  return applyDiscountFactor(notional, discountFactor);
};

/**
 * Present value with the cash group's risk adjustments applied.
 *
 * Positive notionals are discounted at `oracleRate + claimHaircut`. Negative
 * notionals are discounted at `oracleRate - debtBuffer`; when the buffer is at
 * or above the oracle rate the liability is valued at its full notional.
 */
export const getRiskAdjustedPresentValue = (
  cashGroup: CashGroupParameters,
  notional: bigint,
  maturity: number,
  now: number,
  oracleRate: bigint,
): bigint => {
  if (notional === 0n) return 0n;
  const timeToMaturity = getTimeToMaturity(maturity, now);

  let discountFactor: bigint;
  if (notional > 0n) {
    discountFactor = getDiscountFactor(timeToMaturity, oracleRate + cashGroup.claimHaircut);
  } else {
    if (cashGroup.debtBuffer >= oracleRate) return notional;
    discountFactor = getDiscountFactor(timeToMaturity, oracleRate - cashGroup.debtBuffer);
  }

  return applyDiscountFactor(notional, discountFactor);
};

/**
 * Date a position settles into cash.
 *
 * Liquidity positions settle at the end of the current quarterly cycle, which
 * is recovered from the market maturity and the tier's tenor length.
 */
export const getSettlementDate = (
  position: Position,
  tenorLength: (tier: number) => number = getTenorLength,
): number => {
  if (!isPooledLiquidity(position)) return position.maturity;

  const { tier } = position.kind;
  if (!isValidTier(tier)) {
    throw new ContractViolationError(`Invalid market tier: ${tier}`, { tier });
  }
  return position.maturity - tenorLength(tier) + SECONDS_IN_QUARTER;
};
