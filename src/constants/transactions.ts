/**
 * Transaction types as they travel on the wire (case-sensitive)
 */
export const TRANSACTION_TYPES = {
  BUY: 'Buy',
  SELL: 'Sell',
  EARNING: 'Earning',
  TRANSFER_IN: 'TransferIn',
  TRANSFER_OUT: 'TransferOut',
  INPUT: 'Input',
  OUTPUT: 'Output',
} as const;

export type TransactionType = (typeof TRANSACTION_TYPES)[keyof typeof TRANSACTION_TYPES];

export const TRANSACTION_TYPE_VALUES: readonly TransactionType[] = Object.values(TRANSACTION_TYPES);

export function isTransactionType(value: string): value is TransactionType {
  return TRANSACTION_TYPE_VALUES.some((type) => type === value);
}

export function isTrade(type: TransactionType): boolean {
  return type === TRANSACTION_TYPES.BUY || type === TRANSACTION_TYPES.SELL;
}

export function isTransfer(type: TransactionType): boolean {
  return type === TRANSACTION_TYPES.TRANSFER_IN || type === TRANSACTION_TYPES.TRANSFER_OUT;
}

/**
 * The type a mirrored transfer record carries: the same movement seen from
 * the other owner's side
 */
export function oppositeTransferType(type: TransactionType): TransactionType {
  switch (type) {
    case TRANSACTION_TYPES.TRANSFER_IN:
      return TRANSACTION_TYPES.TRANSFER_OUT;
    case TRANSACTION_TYPES.TRANSFER_OUT:
      return TRANSACTION_TYPES.TRANSFER_IN;
    default:
      return type;
  }
}

/**
 * Owner domains: each keeps its own position ledger
 */
export const OWNER_DOMAINS = {
  PORTFOLIO: 'portfolio',
  WALLET: 'wallet',
} as const;

export type OwnerDomain = (typeof OWNER_DOMAINS)[keyof typeof OWNER_DOMAINS];
