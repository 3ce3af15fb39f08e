/**
 * Portfolio ordering and the mutable position ledger of one valuation pass.
 *
 * Positions are valued in contiguous per-currency runs, so the engine needs
 * them ordered by currency, then maturity, then kind. Netting a liquidity
 * claim into a FutureClaim is the only write the engine performs, and it goes
 * through `accumulateNotional` so every mutation is visible at the call site.
 */

import { ContractViolationError } from "@/lib/errors";

import { isFutureClaim } from "./types";
import type { Position } from "./types";

/**
 * Ordering rank of a position kind: FutureClaim first, then liquidity tiers.
 */
const getKindRank = (position: Position): number =>
  position.kind.type === "FUTURE_CLAIM" ? 1 : position.kind.tier + 1;

export const comparePositions = (a: Position, b: Position): number =>
  a.currencyId - b.currencyId || a.maturity - b.maturity || getKindRank(a) - getKindRank(b);

/**
 * Sorted copy of a portfolio. The input is left untouched.
 */
export const sortPortfolio = (positions: readonly Position[]): Position[] =>
  [...positions].sort(comparePositions);

/**
 * Check the ordering the group aggregation relies on.
 *
 * Throws when positions are out of order or when the same (currency, maturity,
 * kind) appears twice, which covers the single-FutureClaim-per-maturity rule.
 */
export const assertPortfolioSorted = (positions: readonly Position[]): void => {
  for (let i = 1; i < positions.length; i++) {
    const previous = positions[i - 1];
    const current = positions[i];
    if (!previous || !current) continue;

    const order = comparePositions(previous, current);
    if (order === 0) {
      throw new ContractViolationError("Duplicate position in portfolio", {
        index: i,
        currencyId: current.currencyId,
        maturity: current.maturity,
        kind: current.kind.type,
      });
    }
    if (order > 0) {
      throw new ContractViolationError("Portfolio is not sorted", {
        index: i,
        currencyId: current.currencyId,
        maturity: current.maturity,
      });
    }
  }
};

export interface PortfolioLedger {
  readonly length: number;
  at: (index: number) => Readonly<Position>;
  /** Index of the FutureClaim with this currency and maturity, or null. */
  findFutureClaim: (currencyId: number, maturity: number) => number | null;
  /** Add `amount` to a FutureClaim's notional for the rest of the pass. */
  accumulateNotional: (index: number, amount: bigint) => void;
  isNetted: (index: number) => boolean;
  nettedIndices: () => number[];
}

/**
 * Wrap a position array for one valuation pass.
 *
 * The ledger writes through to `positions`: after the pass the caller's array
 * holds post-netting notionals and must not be persisted as is.
 */
export const createPortfolioLedger = (positions: Position[]): PortfolioLedger => {
  const netted = new Set<number>();

  const get = (index: number): Position => {
    const position = positions[index];
    if (!position) {
      throw new ContractViolationError(`Position index ${index} out of range`, {
        index,
        length: positions.length,
      });
    }
    return position;
  };

  return {
    get length(): number {
      return positions.length;
    },

    at: (index: number): Readonly<Position> => get(index),

    findFutureClaim: (currencyId: number, maturity: number): number | null => {
      const index = positions.findIndex(
        (position) =>
          isFutureClaim(position) &&
          position.currencyId === currencyId &&
          position.maturity === maturity,
      );
      return index === -1 ? null : index;
    },

    accumulateNotional: (index: number, amount: bigint): void => {
      const position = get(index);
      if (!isFutureClaim(position)) {
        throw new ContractViolationError("Only future claims accumulate netted notional", {
          index,
          kind: position.kind.type,
        });
      }
      position.notional += amount;
      netted.add(index);
    },

    isNetted: (index: number): boolean => netted.has(index),

    nettedIndices: (): number[] => [...netted].sort((a, b) => a - b),
  };
};
