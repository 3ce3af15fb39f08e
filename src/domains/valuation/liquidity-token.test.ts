import { describe, expect, it } from "vitest";

import { ContractViolationError } from "@/lib/errors";

import { SECONDS_IN_DAY, SECONDS_IN_QUARTER, SECONDS_IN_YEAR } from "./constants";
import { getLiquidityTokenValue } from "./liquidity-token";
import { getTenorLength } from "./market-dates";
import { createPortfolioLedger } from "./portfolio";
import type { CashGroupParameters, MarketParameters, Position } from "./types";

const REFERENCE_TIME = 200 * SECONDS_IN_QUARTER;
const NOW = REFERENCE_TIME + 10 * SECONDS_IN_DAY;
const THREE_MONTH = REFERENCE_TIME + SECONDS_IN_QUARTER;
const SIX_MONTH = REFERENCE_TIME + 2 * SECONDS_IN_QUARTER;
const ONE_YEAR = REFERENCE_TIME + SECONDS_IN_YEAR;

const cashGroup: CashGroupParameters = {
  currencyId: 1,
  maxMarketIndex: 3,
  claimHaircut: 15_000_000n,
  debtBuffer: 15_000_000n,
  liquidityHaircuts: [90n, 80n, 70n],
  supplyRate: 30_000_000n,
  tenorLength: getTenorLength,
  convertFromUnderlying: (underlying) => underlying,
};

const markets: MarketParameters[] = [
  {
    maturity: THREE_MONTH,
    totalCash: 1_000_000n,
    totalClaim: 2_000_000n,
    totalLiquidity: 500_000n,
    oracleRate: 50_000_000n,
  },
  {
    maturity: SIX_MONTH,
    totalCash: 2_000_000n,
    totalClaim: 3_000_000n,
    totalLiquidity: 1_000_000n,
    oracleRate: 60_000_000n,
  },
  {
    maturity: ONE_YEAR,
    totalCash: 1_000_000n,
    totalClaim: 1_000_000n,
    totalLiquidity: 1_000_000n,
    oracleRate: 70_000_000n,
  },
];

const liquidity = (maturity: number, tier: number, notional: bigint): Position => ({
  currencyId: 1,
  maturity,
  kind: { type: "POOLED_LIQUIDITY", tier },
  notional,
});

const futureClaim = (maturity: number, notional: bigint): Position => ({
  currencyId: 1,
  maturity,
  kind: { type: "FUTURE_CLAIM" },
  notional,
});

describe("getLiquidityTokenValue", () => {
  describe("without a matching future claim", () => {
    it("should discount the haircut claim share at the risk-adjusted rate", () => {
      const ledger = createPortfolioLedger([liquidity(THREE_MONTH, 1, 50_000n)]);

      expect(getLiquidityTokenValue(ledger, 0, cashGroup, markets, NOW, true)).toEqual({
        cashShare: 90_000n,
        netValue: 177_418n,
      });
    });

    it("should discount the full claim share at the oracle rate without haircuts", () => {
      const ledger = createPortfolioLedger([liquidity(THREE_MONTH, 1, 50_000n)]);

      expect(getLiquidityTokenValue(ledger, 0, cashGroup, markets, NOW, false)).toEqual({
        cashShare: 100_000n,
        netValue: 197_790n,
      });
    });

    it("should use the tier's own market and haircut", () => {
      const ledger = createPortfolioLedger([liquidity(SIX_MONTH, 2, 100_000n)]);

      expect(getLiquidityTokenValue(ledger, 0, cashGroup, markets, NOW, true)).toEqual({
        cashShare: 160_000n,
        netValue: 231_648n,
      });
    });
  });

  describe("with a matching future claim", () => {
    it("should net the haircut claim share into the future claim", () => {
      const positions = [futureClaim(THREE_MONTH, -300_000n), liquidity(THREE_MONTH, 1, 50_000n)];
      const ledger = createPortfolioLedger(positions);

      expect(getLiquidityTokenValue(ledger, 1, cashGroup, markets, NOW, true)).toEqual({
        cashShare: 90_000n,
        netValue: 0n,
      });
      expect(positions[0]?.notional).toBe(-120_000n);
      expect(ledger.isNetted(0)).toBe(true);
    });

    it("should net the full claim share without haircuts", () => {
      const positions = [futureClaim(THREE_MONTH, -300_000n), liquidity(THREE_MONTH, 1, 50_000n)];
      const ledger = createPortfolioLedger(positions);

      getLiquidityTokenValue(ledger, 1, cashGroup, markets, NOW, false);

      expect(positions[0]?.notional).toBe(-100_000n);
    });

    it("should not net into a future claim at another maturity", () => {
      const positions = [futureClaim(THREE_MONTH, -300_000n), liquidity(SIX_MONTH, 2, 100_000n)];
      const ledger = createPortfolioLedger(positions);

      expect(getLiquidityTokenValue(ledger, 1, cashGroup, markets, NOW, true).netValue).toBe(
        231_648n,
      );
      expect(positions[0]?.notional).toBe(-300_000n);
      expect(ledger.nettedIndices()).toEqual([]);
    });
  });

  it("should reject future claims", () => {
    const ledger = createPortfolioLedger([futureClaim(THREE_MONTH, 1n)]);

    expect(() => getLiquidityTokenValue(ledger, 0, cashGroup, markets, NOW, true)).toThrow(
      "Position is not pooled liquidity",
    );
  });

  it("should reject liquidity off the tenor schedule", () => {
    const ledger = createPortfolioLedger([liquidity(THREE_MONTH + SECONDS_IN_DAY, 2, 1n)]);

    expect(() => getLiquidityTokenValue(ledger, 0, cashGroup, markets, NOW, true)).toThrow(
      ContractViolationError,
    );
  });

  it("should reject a tier that does not match the maturity", () => {
    const ledger = createPortfolioLedger([liquidity(SIX_MONTH, 1, 1n)]);

    expect(() => getLiquidityTokenValue(ledger, 0, cashGroup, markets, NOW, true)).toThrow(
      "Liquidity position is not on a listed tenor",
    );
  });
});
