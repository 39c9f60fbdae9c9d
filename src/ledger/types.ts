import Decimal from 'decimal.js';
import { TransactionWrite, PositionKey } from '@/models';

/**
 * The transaction fields that drive position arithmetic
 */
export type LedgerEntry = Pick<
  TransactionWrite,
  | 'type'
  | 'instrumentId'
  | 'instrument2Id'
  | 'quantity'
  | 'quantity2'
  | 'priceUsd'
  | 'order'
  | 'portfolioId'
  | 'portfolio2Id'
  | 'walletId'
  | 'wallet2Id'
  | 'transferredAmount'
>;

/**
 * Signed change to one position. `amount` is ignored by the wallet ledger.
 */
export interface PositionDelta {
  quantity: Decimal;
  amount: Decimal;
  buyOrders: Decimal;
  sellOrders: Decimal;
}

export interface PositionChange {
  key: PositionKey;
  delta: PositionDelta;
}

export interface LedgerPlan {
  changes: PositionChange[];
  /** Cost basis moved by a portfolio transfer; null for every other entry */
  transferredAmount: Decimal | null;
}
