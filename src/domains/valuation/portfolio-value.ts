/**
 * Whole-portfolio valuation: one net value per currency run.
 */

import * as v from "valibot";

import { ContractViolationError } from "@/lib/errors";
import type { Logger } from "@/lib/logger";

import { getNetCashGroupValue } from "./group-value";
import { assertPortfolioSorted, createPortfolioLedger } from "./portfolio";
import { marketParametersSchema, positionSchema, timestampSchema } from "./types";
import type { CashGroupParameters, MarketParameters, Position } from "./types";

export interface PortfolioValuationInput {
  /** Sorted positions. Netting writes post-netting notionals back into this array. */
  positions: Position[];
  cashGroups: ReadonlyMap<number, CashGroupParameters>;
  /** Market state per currency, indexed by market index - 1. */
  markets: ReadonlyMap<number, readonly MarketParameters[]>;
  now: number;
  /** Apply haircuts and buffers. Defaults to true; false gives the plain present value. */
  riskAdjusted?: boolean;
}

export interface PortfolioValuationDeps {
  logger: Logger;
}

export interface CurrencyValuation {
  currencyId: number;
  netValueAsset: bigint;
  startIndex: number;
  nextIndex: number;
}

export interface PortfolioValuation {
  currencies: CurrencyValuation[];
  /** FutureClaim indices whose notional absorbed a liquidity claim. */
  nettedIndices: number[];
}

const positionListSchema = v.array(positionSchema);
const marketListSchema = v.array(marketParametersSchema);

const validateInput = (input: PortfolioValuationInput): void => {
  const now = v.safeParse(timestampSchema, input.now);
  if (!now.success) {
    throw new ContractViolationError("Invalid valuation time", { issues: v.flatten(now.issues) });
  }

  const positions = v.safeParse(positionListSchema, input.positions);
  if (!positions.success) {
    throw new ContractViolationError("Invalid portfolio positions", {
      issues: v.flatten(positions.issues),
    });
  }

  for (const [currencyId, markets] of input.markets) {
    const result = v.safeParse(marketListSchema, markets);
    if (!result.success) {
      throw new ContractViolationError(`Invalid markets for currency ${currencyId}`, {
        currencyId,
        issues: v.flatten(result.issues),
      });
    }
  }
};

const requireCashGroup = (
  input: PortfolioValuationInput,
  currencyId: number,
): { cashGroup: CashGroupParameters; markets: readonly MarketParameters[] } => {
  const cashGroup = input.cashGroups.get(currencyId);
  if (!cashGroup) {
    throw new ContractViolationError(`No cash group for currency ${currencyId}`, { currencyId });
  }
  if (cashGroup.currencyId !== currencyId) {
    throw new ContractViolationError("Cash group is registered under another currency", {
      currencyId,
      cashGroupCurrencyId: cashGroup.currencyId,
    });
  }
  return { cashGroup, markets: input.markets.get(currencyId) ?? [] };
};

/**
 * Value every currency run of a sorted portfolio.
 *
 * Inputs are validated against the position and market schemas first, so
 * malformed values surface as `ContractViolationError`.
 *
 * Any fault aborts the whole valuation; it is logged and rethrown so no
 * partial result reaches the caller.
 */
export const valuePortfolio = (
  input: PortfolioValuationInput,
  deps: PortfolioValuationDeps,
): PortfolioValuation => {
  const { logger } = deps;
  const riskAdjusted = input.riskAdjusted ?? true;

  try {
    validateInput(input);
    assertPortfolioSorted(input.positions);
    const ledger = createPortfolioLedger(input.positions);
    const currencies: CurrencyValuation[] = [];

    let startIndex = 0;
    while (startIndex < ledger.length) {
      const { currencyId } = ledger.at(startIndex);
      const { cashGroup, markets } = requireCashGroup(input, currencyId);

      const { netValueAsset, nextIndex } = getNetCashGroupValue(
        ledger,
        cashGroup,
        markets,
        input.now,
        startIndex,
        riskAdjusted,
      );
      logger.debug("Currency run valued", {
        currencyId,
        startIndex,
        nextIndex,
        netValueAsset,
        riskAdjusted,
      });

      currencies.push({ currencyId, netValueAsset, startIndex, nextIndex });
      startIndex = nextIndex;
    }

    return { currencies, nettedIndices: ledger.nettedIndices() };
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error("Portfolio valuation failed", err, {
      positions: input.positions.length,
      now: input.now,
    });
    throw error;
  }
};
