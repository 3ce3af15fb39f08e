/**
 * Valuation error types.
 *
 * Every fault is fatal to the valuation call that raised it: callers treat any
 * `ValuationError` as "valuation unavailable" and never substitute a default.
 */

export type ValuationErrorCode = "CONTRACT_VIOLATION" | "ARITHMETIC_FAULT";

/**
 * Base error for valuation failures.
 */
export class ValuationError extends Error {
  public readonly code: ValuationErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: ValuationErrorCode,
    details: Record<string, unknown> = {},
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "ValuationError";
    this.code = code;
    this.details = details;
  }
}

/**
 * Caller supplied inputs that break an engine precondition: invalid tier,
 * currency mismatch, off-schedule maturity, maturity before the valuation time.
 */
export class ContractViolationError extends ValuationError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, "CONTRACT_VIOLATION", details);
    this.name = "ContractViolationError";
  }
}

/**
 * Fixed-point overflow, division by zero or a discount factor above unity.
 */
export class ArithmeticFaultError extends ValuationError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, "ARITHMETIC_FAULT", details);
    this.name = "ArithmeticFaultError";
  }
}

export const isValuationError = (error: unknown): error is ValuationError =>
  error instanceof ValuationError;
