import { TRANSACTION_TYPES } from '@/constants/transactions';
import { PositionKey, WalletPosition } from '@/models';
import { ZERO, toDecimal, toDecimalString } from '@/utils/decimal';
import { assertNever, direction } from './direction';
import {
  legKeys,
  requireCounterparty,
  singleLegChanges,
  tradeChanges,
  transferChanges,
} from './legs';
import { LedgerEntry, LedgerPlan, PositionDelta } from './types';

export function walletLegs(entry: LedgerEntry): PositionKey[] {
  return legKeys(entry, entry.walletId, entry.wallet2Id);
}

/**
 * Plans the wallet-ledger effect of an entry. Wallets carry no cost basis,
 * so transfers move quantity only, with the same sign convention as portfolios.
 */
export function planWalletChanges(entry: LedgerEntry, cancel: boolean): LedgerPlan {
  const ownerId = entry.walletId;
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
      const owner2Id = requireCounterparty(entry.wallet2Id, 'wallet2Id');
      return { changes: transferChanges(entry, ownerId, owner2Id, d, ZERO), transferredAmount: null };
    }
    default:
      return assertNever(entry.type);
  }
}

export function applyWalletDelta(position: WalletPosition, delta: PositionDelta): WalletPosition {
  return {
    ...position,
    quantity: toDecimalString(toDecimal(position.quantity).plus(delta.quantity)),
    buyOrders: toDecimalString(toDecimal(position.buyOrders).plus(delta.buyOrders)),
    sellOrders: toDecimalString(toDecimal(position.sellOrders).plus(delta.sellOrders)),
  };
}
