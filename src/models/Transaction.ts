import { TransactionType } from '@/constants/transactions';

/**
 * Transaction fields as received from the API layer, before type-specific
 * validation. Decimal values are strings; absent values are null.
 */
export interface TransactionInput {
  type: string;
  date: Date | null;
  instrumentId: number | null;
  instrument2Id: number | null;
  quantity: string | null;
  quantity2: string | null;
  price: string | null;
  priceUsd: string | null;
  order: boolean;
  comment: string | null;
  portfolioId: number | null;
  portfolio2Id: number | null;
  walletId: number | null;
  wallet2Id: number | null;
}

/**
 * A validated transaction: the type is known and the fields every type needs are present
 */
export interface TransactionData
  extends Omit<TransactionInput, 'type' | 'date' | 'instrumentId' | 'quantity'> {
  type: TransactionType;
  date: Date;
  instrumentId: number;
  quantity: string;
}

/**
 * Row written to the transactions table
 */
export interface TransactionWrite extends TransactionData {
  /** Sibling record of a transfer, seen from the other owner */
  relatedTransactionId: number | null;
  /** Set on the sibling; mirrors never move positions */
  isMirror: boolean;
  /** Cost basis a portfolio transfer moved when it was applied */
  transferredAmount: string | null;
}

export interface Transaction extends TransactionWrite {
  id: number;
  userId: number;
}

export interface TransactionFilters {
  portfolioId?: number;
  walletId?: number;
  instrumentId?: number;
  type?: TransactionType;
}

/**
 * Position of the last row of a page in the (date, id) listing order
 */
export interface TransactionCursor {
  date: Date;
  id: number;
}

export interface TransactionPage {
  transactions: Transaction[];
  nextCursor: string | null;
  hasMore: boolean;
}
