import { TRANSACTION_TYPES } from '@/constants/transactions';
import { ValidationError } from '@/errors';
import { PositionKey } from '@/models';
import { Decimal, ZERO, toDecimal, toLedgerScale } from '@/utils/decimal';
import { Direction, assertNever } from './direction';
import { LedgerEntry, PositionChange, PositionDelta } from './types';

export function positionKeyId(key: PositionKey): string {
  return `${key.ownerId}:${key.instrumentId}`;
}

export function comparePositionKeys(a: PositionKey, b: PositionKey): number {
  return a.ownerId - b.ownerId || a.instrumentId - b.instrumentId;
}

export function makeDelta(partial: Partial<PositionDelta>): PositionDelta {
  return {
    quantity: partial.quantity ?? ZERO,
    amount: partial.amount ?? ZERO,
    buyOrders: partial.buyOrders ?? ZERO,
    sellOrders: partial.sellOrders ?? ZERO,
  };
}

/**
 * Positions an entry touches in one domain, given that domain's owner ids.
 * The session resolves all of them before any change is planned.
 */
export function legKeys(
  entry: LedgerEntry,
  ownerId: number | null,
  owner2Id: number | null
): PositionKey[] {
  if (ownerId === null) {
    return [];
  }

  const primary: PositionKey = { ownerId, instrumentId: entry.instrumentId };

  switch (entry.type) {
    case TRANSACTION_TYPES.BUY:
    case TRANSACTION_TYPES.SELL:
      return entry.instrument2Id === null
        ? [primary]
        : [primary, { ownerId, instrumentId: entry.instrument2Id }];
    case TRANSACTION_TYPES.EARNING:
    case TRANSACTION_TYPES.INPUT:
    case TRANSACTION_TYPES.OUTPUT:
      return [primary];
    case TRANSACTION_TYPES.TRANSFER_IN:
    case TRANSACTION_TYPES.TRANSFER_OUT:
      return owner2Id === null
        ? [primary]
        : [primary, { ownerId: owner2Id, instrumentId: entry.instrumentId }];
    default:
      return assertNever(entry.type);
  }
}

/**
 * Buy/Sell against a quote instrument.
 *
 * Pending orders only move the order totals; a pending Sell leaves the quote
 * leg untouched. Executed trades move quantities and, in the portfolio ledger,
 * cost basis.
 */
export function tradeChanges(entry: LedgerEntry, ownerId: number, d: Direction): PositionChange[] {
  const quantity = toDecimal(entry.quantity).times(d);
  const quantity2 = toDecimal(entry.quantity2).times(d);
  const value = toLedgerScale(quantity.times(toDecimal(entry.priceUsd)));

  const primary: PositionKey = { ownerId, instrumentId: entry.instrumentId };
  const secondary: PositionKey | null =
    entry.instrument2Id === null ? null : { ownerId, instrumentId: entry.instrument2Id };

  const changes: PositionChange[] = [];

  if (entry.order) {
    if (entry.type === TRANSACTION_TYPES.BUY) {
      changes.push({ key: primary, delta: makeDelta({ buyOrders: value }) });
      if (secondary) {
        changes.push({ key: secondary, delta: makeDelta({ sellOrders: quantity2.negated() }) });
      }
    } else {
      changes.push({ key: primary, delta: makeDelta({ sellOrders: quantity.negated() }) });
    }
    return changes;
  }

  changes.push({ key: primary, delta: makeDelta({ quantity, amount: value }) });
  if (secondary) {
    changes.push({
      key: secondary,
      // Quote leg cost basis moves against its quantity (+= quantity2·d);
      // quantity2 is stored unsigned.
      delta: makeDelta({ quantity: quantity2.negated(), amount: quantity2 }),
    });
  }
  return changes;
}

/**
 * Earning, Input and Output: quantity only, on the primary instrument
 */
export function singleLegChanges(entry: LedgerEntry, ownerId: number, d: Direction): PositionChange[] {
  return [
    {
      key: { ownerId, instrumentId: entry.instrumentId },
      delta: makeDelta({ quantity: toDecimal(entry.quantity).times(d) }),
    },
  ];
}

/**
 * Equal and opposite legs between the two owners of a transfer.
 * `moved` is the cost basis credited to the first owner (zero for wallets).
 */
export function transferChanges(
  entry: LedgerEntry,
  ownerId: number,
  owner2Id: number,
  d: Direction,
  moved: Decimal
): PositionChange[] {
  const quantity = toDecimal(entry.quantity).times(d);
  return [
    {
      key: { ownerId, instrumentId: entry.instrumentId },
      delta: makeDelta({ quantity, amount: moved }),
    },
    {
      key: { ownerId: owner2Id, instrumentId: entry.instrumentId },
      delta: makeDelta({ quantity: quantity.negated(), amount: moved.negated() }),
    },
  ];
}

export function requireCounterparty(owner2Id: number | null, field: string): number {
  if (owner2Id === null) {
    throw new ValidationError(`Transfer requires ${field}`, { missing: [field] });
  }
  return owner2Id;
}
