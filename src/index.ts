/**
 * Term lending valuation engine
 *
 * Deterministic present value of fixed-rate lending portfolios: future claims
 * and pooled liquidity positions, netted and discounted per currency.
 */

export * from "./domains/valuation";

export {
  ArithmeticFaultError,
  ContractViolationError,
  ValuationError,
  isValuationError,
  type ValuationErrorCode,
} from "./lib/errors";

export { createLogger, getLogger, type Logger, type LoggerConfig, type LogLevel } from "./lib/logger";

export {
  MAX_64X64,
  MIN_64X64,
  ONE_64X64,
  divu,
  exp,
  fromInt,
  mul,
  neg,
  toInt,
} from "./lib/math";
