/**
 * Signed 64.64 binary fixed-point math over bigint.
 *
 * A value `x` represents `x / 2^64` and must stay inside the signed 128-bit
 * range. Intermediate products of notionals and rates are bounded to the
 * signed 256-bit range. Leaving either range is an `ArithmeticFaultError`:
 * values are never clamped or wrapped.
 */

import { ArithmeticFaultError } from "@/lib/errors";

/** 1.0 in 64.64. */
export const ONE_64X64 = 1n << 64n;

export const MAX_64X64 = (1n << 127n) - 1n;
export const MIN_64X64 = -(1n << 127n);

export const MAX_INT256 = (1n << 255n) - 1n;
export const MIN_INT256 = -(1n << 255n);

/** `exp` is only evaluated for |x| < 64. */
const EXP_BOUND = 64n << 64n;

/** Fractional bits carried while evaluating `exp`. */
const WORK_BITS = 128n;
const WORK_ONE = 1n << WORK_BITS;

/** Halvings applied before the series so its argument stays below 0.5. */
const EXP_HALVINGS = 7n;

const assert64x64 = (value: bigint, operation: string): bigint => {
  if (value > MAX_64X64 || value < MIN_64X64) {
    throw new ArithmeticFaultError(`64.64 overflow in ${operation}`, { operation, value });
  }
  return value;
};

/**
 * Guard a value against the signed 256-bit host width.
 */
export const assertInt256 = (value: bigint, operation: string): bigint => {
  if (value > MAX_INT256 || value < MIN_INT256) {
    throw new ArithmeticFaultError(`int256 overflow in ${operation}`, { operation, value });
  }
  return value;
};

/**
 * `a * b / denominator`, truncating toward zero, with every step inside int256.
 */
export const mulDivInt256 = (
  a: bigint,
  b: bigint,
  denominator: bigint,
  operation: string,
): bigint => {
  if (denominator === 0n) {
    throw new ArithmeticFaultError(`Division by zero in ${operation}`, { operation });
  }
  const product = assertInt256(a * b, operation);
  return product / denominator;
};

export const fromInt = (value: bigint): bigint => assert64x64(value << 64n, "fromInt");

/**
 * Integer part of a 64.64 value, rounding toward negative infinity.
 */
export const toInt = (x: bigint): bigint => assert64x64(x, "toInt") >> 64n;

/**
 * `x / y` for unsigned integers, as 64.64.
 */
export const divu = (x: bigint, y: bigint): bigint => {
  if (y === 0n) throw new ArithmeticFaultError("Division by zero in divu");
  if (x < 0n || y < 0n) {
    throw new ArithmeticFaultError("divu expects unsigned operands", { x, y });
  }
  return assert64x64((x << 64n) / y, "divu");
};

export const neg = (x: bigint): bigint => assert64x64(-assert64x64(x, "neg"), "neg");

/**
 * Product of two 64.64 values, rounding toward negative infinity.
 */
export const mul = (x: bigint, y: bigint): bigint =>
  assert64x64((assert64x64(x, "mul") * assert64x64(y, "mul")) >> 64n, "mul");

/**
 * Taylor series of e^r for 0 <= r < 0.5 at WORK_BITS precision.
 * Every term is non-negative, so the sum is monotonic in r.
 */
const expSeries = (r: bigint): bigint => {
  let sum = WORK_ONE;
  let term = WORK_ONE;
  for (let k = 1n; term > 0n; k++) {
    term = (term * r) / (WORK_ONE * k);
    sum += term;
  }
  return sum;
};

/**
 * Natural exponent of a 64.64 value.
 *
 * Monotonically non-decreasing. Returns 0 below -64, faults at or above 64
 * and whenever the result does not fit 64.64.
 */
export const exp = (x: bigint): bigint => {
  assert64x64(x, "exp");
  if (x >= EXP_BOUND) {
    throw new ArithmeticFaultError("64.64 overflow in exp", { operation: "exp", value: x });
  }
  if (x < -EXP_BOUND) return 0n;

  const magnitude = (x < 0n ? -x : x) << (WORK_BITS - 64n);
  let result = expSeries(magnitude >> EXP_HALVINGS);
  for (let i = 0n; i < EXP_HALVINGS; i++) {
    result = (result * result) >> WORK_BITS;
  }
  if (x < 0n) {
    result = (WORK_ONE * WORK_ONE) / result;
  }

  return assert64x64(result >> (WORK_BITS - 64n), "exp");
};
