import { z } from 'zod';
import {
  TRANSACTION_TYPES,
  TRANSACTION_TYPE_VALUES,
  TransactionType,
  isTransactionType,
} from '@/constants/transactions';
import { LEDGER_LIMITS, PAGINATION_LIMITS } from '@/config/businessRules';
import { ValidationError } from '@/errors';
import { TransactionData, TransactionInput } from '@/models';
import { isDecimalString, isLedgerDecimal } from '@/utils/decimal';

const id = z.number().int().positive();

const DECIMAL_DIGITS_MESSAGE = `At most ${LEDGER_LIMITS.MAX_INTEGER_DIGITS} integer and ${LEDGER_LIMITS.LEDGER_SCALE} fractional digits`;

/**
 * Decimal values travel as strings to keep their precision; plain JSON
 * numbers are accepted and converted
 */
const decimal = z
  .union([z.string().trim(), z.number().finite()])
  .transform((value) => String(value))
  .superRefine((value, ctx) => {
    if (!isDecimalString(value)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Must be a decimal number' });
    } else if (!isLedgerDecimal(value)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: DECIMAL_DIGITS_MESSAGE });
    }
  });

/**
 * Payload of POST /transactions and PUT /transactions/:id
 *
 * Only the shape is checked here; which fields a type requires is decided by
 * validateTransaction so that service callers get the same rules.
 */
export const transactionPayloadSchema = z.object({
  type: z.string().min(1),
  date: z.coerce.date().optional(),
  instrumentId: id.nullish(),
  instrument2Id: id.nullish(),
  quantity: decimal.nullish(),
  quantity2: decimal.nullish(),
  price: decimal.nullish(),
  priceUsd: decimal.nullish(),
  order: z.boolean().default(false),
  comment: z.string().max(LEDGER_LIMITS.MAX_COMMENT_LENGTH).nullish(),
  portfolioId: id.nullish(),
  portfolio2Id: id.nullish(),
  walletId: id.nullish(),
  wallet2Id: id.nullish(),
});

export type TransactionPayload = z.infer<typeof transactionPayloadSchema>;

export function toTransactionInput(payload: TransactionPayload): TransactionInput {
  return {
    type: payload.type,
    date: payload.date ?? null,
    instrumentId: payload.instrumentId ?? null,
    instrument2Id: payload.instrument2Id ?? null,
    quantity: payload.quantity ?? null,
    quantity2: payload.quantity2 ?? null,
    price: payload.price ?? null,
    priceUsd: payload.priceUsd ?? null,
    order: payload.order,
    comment: payload.comment ?? null,
    portfolioId: payload.portfolioId ?? null,
    portfolio2Id: payload.portfolio2Id ?? null,
    walletId: payload.walletId ?? null,
    wallet2Id: payload.wallet2Id ?? null,
  };
}

/**
 * Query string of GET /transactions
 */
export const listTransactionsQuerySchema = z.object({
  limit: z.coerce
    .number()
    .int()
    .min(1)
    .max(PAGINATION_LIMITS.MAX_PAGE_SIZE)
    .default(PAGINATION_LIMITS.DEFAULT_PAGE_SIZE),
  cursor: z.string().min(1).optional(),
  portfolioId: z.coerce.number().int().positive().optional(),
  walletId: z.coerce.number().int().positive().optional(),
  instrumentId: z.coerce.number().int().positive().optional(),
  type: z.string().refine(isTransactionType, { message: 'Unknown transaction type' }).optional(),
});

const DECIMAL_FIELDS = ['quantity', 'quantity2', 'price', 'priceUsd'] as const;

type RequiredField = keyof Pick<
  TransactionInput,
  | 'portfolioId'
  | 'portfolio2Id'
  | 'walletId'
  | 'wallet2Id'
  | 'instrumentId'
  | 'instrument2Id'
  | 'quantity'
>;

const PORTFOLIO_TRANSFER: readonly RequiredField[] = ['portfolioId', 'portfolio2Id', 'instrumentId', 'quantity'];
const WALLET_TRANSFER: readonly RequiredField[] = ['walletId', 'wallet2Id', 'instrumentId', 'quantity'];

function missingFields(input: TransactionInput, fields: readonly RequiredField[]): RequiredField[] {
  return fields.filter((field) => input[field] === null);
}

/**
 * Fields that must be present for the given type. Transfers and Input/Output
 * pick their field set from the domain(s) the input populates.
 */
function requiredFields(type: TransactionType, input: TransactionInput): readonly RequiredField[] {
  switch (type) {
    case TRANSACTION_TYPES.BUY:
    case TRANSACTION_TYPES.SELL:
      return ['portfolioId', 'walletId', 'instrumentId', 'instrument2Id', 'quantity'];
    case TRANSACTION_TYPES.EARNING:
      return ['portfolioId', 'walletId', 'instrumentId', 'quantity'];
    case TRANSACTION_TYPES.TRANSFER_IN:
    case TRANSACTION_TYPES.TRANSFER_OUT: {
      const portfolioSide = input.portfolioId !== null || input.portfolio2Id !== null;
      const walletSide = input.walletId !== null || input.wallet2Id !== null;
      if (portfolioSide && walletSide) {
        throw new ValidationError(
          `${type} must move an instrument between two portfolios or between two wallets, not both`,
          { fields: ['portfolioId', 'portfolio2Id', 'walletId', 'wallet2Id'] }
        );
      }
      return walletSide ? WALLET_TRANSFER : PORTFOLIO_TRANSFER;
    }
    case TRANSACTION_TYPES.INPUT:
    case TRANSACTION_TYPES.OUTPUT:
      if (input.portfolioId === null && input.walletId === null) {
        throw new ValidationError(
          `Missing required fields for ${type} transaction: portfolioId or walletId`,
          { missing: ['portfolioId', 'walletId'] }
        );
      }
      return ['instrumentId', 'quantity'];
  }
}

/**
 * Enforces the fields each transaction type needs and narrows the input.
 *
 * @throws ValidationError naming the unknown type or the missing fields
 */
export function validateTransaction(input: TransactionInput): TransactionData {
  const { type } = input;
  if (!isTransactionType(type)) {
    throw new ValidationError(`Unknown transaction type: ${type}`, {
      allowed: TRANSACTION_TYPE_VALUES,
    });
  }

  const missing = missingFields(input, requiredFields(type, input));
  const { instrumentId, quantity } = input;

  if (missing.length > 0 || instrumentId === null || quantity === null) {
    throw new ValidationError(
      `Missing required fields for ${type} transaction: ${missing.join(', ')}`,
      { missing }
    );
  }

  const outOfRange = DECIMAL_FIELDS.filter((field) => {
    const value = input[field];
    return value !== null && !isLedgerDecimal(value);
  });
  if (outOfRange.length > 0) {
    throw new ValidationError(`${DECIMAL_DIGITS_MESSAGE}: ${outOfRange.join(', ')}`, {
      fields: outOfRange,
    });
  }

  return {
    ...input,
    type,
    date: input.date ?? new Date(),
    instrumentId,
    quantity,
  };
}
