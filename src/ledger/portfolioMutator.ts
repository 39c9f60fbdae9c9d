import { TRANSACTION_TYPES } from '@/constants/transactions';
import { PortfolioPosition, PositionKey } from '@/models';
import { Decimal, ZERO, toDecimal, toDecimalString, toLedgerScale } from '@/utils/decimal';
import { Direction, assertNever, direction } from './direction';
import {
  legKeys,
  requireCounterparty,
  singleLegChanges,
  tradeChanges,
  transferChanges,
} from './legs';
import { LedgerEntry, LedgerPlan, PositionDelta } from './types';

export function portfolioLegs(entry: LedgerEntry): PositionKey[] {
  return legKeys(entry, entry.portfolioId, entry.portfolio2Id);
}

/**
 * Plans the portfolio-ledger effect of an entry.
 *
 * `positionOf` reads the current state of an already resolved leg; only
 * transfers need it, to split the source's cost basis proportionally.
 * Cancelling a transfer reverses the recorded `transferredAmount` instead of
 * recomputing it from a position that may have changed since.
 */
export function planPortfolioChanges(
  entry: LedgerEntry,
  cancel: boolean,
  positionOf: (key: PositionKey) => PortfolioPosition
): LedgerPlan {
  const ownerId = entry.portfolioId;
  if (ownerId === null) {
    return { changes: [], transferredAmount: null };
  }

  const d = direction(entry.type, cancel);

  switch (entry.type) {
    case TRANSACTION_TYPES.BUY:
    case TRANSACTION_TYPES.SELL:
      return { changes: tradeChanges(entry, ownerId, d), transferredAmount: null };
    case TRANSACTION_TYPES.EARNING:
    case TRANSACTION_TYPES.INPUT:
    case TRANSACTION_TYPES.OUTPUT:
      return { changes: singleLegChanges(entry, ownerId, d), transferredAmount: null };
    case TRANSACTION_TYPES.TRANSFER_IN:
    case TRANSACTION_TYPES.TRANSFER_OUT: {
      const owner2Id = requireCounterparty(entry.portfolio2Id, 'portfolio2Id');
      const moved =
        cancel && entry.transferredAmount !== null
          ? toDecimal(entry.transferredAmount).negated()
          : proportionalCostBasis(
              positionOf({ ownerId, instrumentId: entry.instrumentId }),
              entry.quantity,
              d
            );
      return {
        changes: transferChanges(entry, ownerId, owner2Id, d, moved),
        transferredAmount: cancel ? null : moved,
      };
    }
    default:
      return assertNever(entry.type);
  }
}

/**
 * source.amount / source.quantity · quantity · direction at ledger scale, or
 * zero when either quantity is zero
 */
export function proportionalCostBasis(
  source: PortfolioPosition,
  quantity: string,
  d: Direction
): Decimal {
  const sourceQuantity = toDecimal(source.quantity);
  const moved = toDecimal(quantity);
  if (sourceQuantity.isZero() || moved.isZero()) {
    return ZERO;
  }
  return toLedgerScale(toDecimal(source.amount).times(moved).dividedBy(sourceQuantity)).times(d);
}

export function applyPortfolioDelta(
  position: PortfolioPosition,
  delta: PositionDelta
): PortfolioPosition {
  return {
    ...position,
    quantity: toDecimalString(toDecimal(position.quantity).plus(delta.quantity)),
    amount: toDecimalString(toDecimal(position.amount).plus(delta.amount)),
    buyOrders: toDecimalString(toDecimal(position.buyOrders).plus(delta.buyOrders)),
    sellOrders: toDecimalString(toDecimal(position.sellOrders).plus(delta.sellOrders)),
  };
}
