import { TRANSACTION_TYPES, TransactionType } from '@/constants/transactions';

export type Direction = 1 | -1;

/**
 * Sign applied to a transaction's quantities.
 * Inflows (Buy, Input, TransferIn, Earning) are +1, outflows -1; cancelling flips it.
 */
export function direction(type: TransactionType, cancel: boolean = false): Direction {
  const base = baseDirection(type);
  if (!cancel) {
    return base;
  }
  return base === 1 ? -1 : 1;
}

function baseDirection(type: TransactionType): Direction {
  switch (type) {
    case TRANSACTION_TYPES.BUY:
    case TRANSACTION_TYPES.INPUT:
    case TRANSACTION_TYPES.TRANSFER_IN:
    case TRANSACTION_TYPES.EARNING:
      return 1;
    case TRANSACTION_TYPES.SELL:
    case TRANSACTION_TYPES.OUTPUT:
    case TRANSACTION_TYPES.TRANSFER_OUT:
      return -1;
    default:
      return assertNever(type);
  }
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled transaction type: ${String(value)}`);
}
