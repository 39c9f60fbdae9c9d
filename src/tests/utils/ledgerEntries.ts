import { TRANSACTION_TYPES } from '@/constants/transactions';
import { LedgerEntry } from '@/ledger/types';

export const BTC = 1;
export const USDT = 2;
export const ETH = 3;

/**
 * Executed Input of nothing in particular; override what the case needs
 */
export function entry(overrides: Partial<LedgerEntry> = {}): LedgerEntry {
  return {
    type: TRANSACTION_TYPES.INPUT,
    instrumentId: BTC,
    instrument2Id: null,
    quantity: '0',
    quantity2: null,
    priceUsd: null,
    order: false,
    portfolioId: null,
    portfolio2Id: null,
    walletId: null,
    wallet2Id: null,
    transferredAmount: null,
    ...overrides,
  };
}
