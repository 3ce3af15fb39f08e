import { describe, expect, it } from "vitest";

import { ContractViolationError } from "@/lib/errors";

import {
  assertPortfolioSorted,
  comparePositions,
  createPortfolioLedger,
  sortPortfolio,
} from "./portfolio";
import type { Position } from "./types";

const futureClaim = (currencyId: number, maturity: number, notional: bigint): Position => ({
  currencyId,
  maturity,
  kind: { type: "FUTURE_CLAIM" },
  notional,
});

const liquidity = (
  currencyId: number,
  maturity: number,
  tier: number,
  notional: bigint,
): Position => ({
  currencyId,
  maturity,
  kind: { type: "POOLED_LIQUIDITY", tier },
  notional,
});

describe("comparePositions", () => {
  it("should order by currency, then maturity, then kind", () => {
    expect(comparePositions(futureClaim(1, 200, 1n), futureClaim(2, 100, 1n))).toBeLessThan(0);
    expect(comparePositions(futureClaim(1, 100, 1n), futureClaim(1, 200, 1n))).toBeLessThan(0);
    expect(comparePositions(futureClaim(1, 100, 1n), liquidity(1, 100, 1, 1n))).toBeLessThan(0);
    expect(comparePositions(liquidity(1, 100, 2, 1n), liquidity(1, 100, 1, 1n))).toBeGreaterThan(
      0,
    );
  });

  it("should ignore notional", () => {
    expect(comparePositions(futureClaim(1, 100, 1n), futureClaim(1, 100, -5n))).toBe(0);
  });
});

describe("sortPortfolio", () => {
  it("should return a sorted copy", () => {
    const positions = [
      liquidity(2, 100, 1, 10n),
      futureClaim(1, 200, 20n),
      liquidity(1, 100, 1, 30n),
      futureClaim(1, 100, 40n),
    ];

    const sorted = sortPortfolio(positions);

    expect(sorted.map((position) => position.notional)).toEqual([40n, 30n, 20n, 10n]);
    expect(positions[0]?.notional).toBe(10n);
  });
});

describe("assertPortfolioSorted", () => {
  it("should accept a sorted portfolio", () => {
    expect(() =>
      assertPortfolioSorted([futureClaim(1, 100, 1n), liquidity(1, 100, 1, 1n), futureClaim(2, 50, 1n)]),
    ).not.toThrow();
  });

  it("should accept an empty portfolio", () => {
    expect(() => assertPortfolioSorted([])).not.toThrow();
  });

  it("should reject positions out of order", () => {
    expect(() => assertPortfolioSorted([futureClaim(1, 200, 1n), futureClaim(1, 100, 1n)])).toThrow(
      "Portfolio is not sorted",
    );
  });

  it("should reject a second future claim at the same maturity", () => {
    expect(() => assertPortfolioSorted([futureClaim(1, 100, 1n), futureClaim(1, 100, 2n)])).toThrow(
      "Duplicate position in portfolio",
    );
  });
});

describe("createPortfolioLedger", () => {
  it("should expose positions by index", () => {
    const ledger = createPortfolioLedger([futureClaim(1, 100, 5n)]);

    expect(ledger.length).toBe(1);
    expect(ledger.at(0).notional).toBe(5n);
    expect(() => ledger.at(1)).toThrow(ContractViolationError);
  });

  it("should find the future claim for a currency and maturity", () => {
    const ledger = createPortfolioLedger([
      futureClaim(1, 100, 1n),
      liquidity(1, 100, 1, 1n),
      futureClaim(2, 100, 1n),
    ]);

    expect(ledger.findFutureClaim(2, 100)).toBe(2);
    expect(ledger.findFutureClaim(1, 200)).toBeNull();
  });

  it("should write netted notional through to the positions", () => {
    const positions = [futureClaim(1, 100, -300n), liquidity(1, 100, 1, 50n)];
    const ledger = createPortfolioLedger(positions);

    ledger.accumulateNotional(0, 180n);

    expect(positions[0]?.notional).toBe(-120n);
    expect(ledger.isNetted(0)).toBe(true);
    expect(ledger.isNetted(1)).toBe(false);
    expect(ledger.nettedIndices()).toEqual([0]);
  });

  it("should only accumulate into future claims", () => {
    const ledger = createPortfolioLedger([liquidity(1, 100, 1, 50n)]);

    expect(() => ledger.accumulateNotional(0, 1n)).toThrow(ContractViolationError);
    expect(ledger.nettedIndices()).toEqual([]);
  });
});
