import Decimal from 'decimal.js';
import { LEDGER_LIMITS } from '@/config/businessRules';

// Ledger arithmetic never uses floating point; never print exponents either,
// NUMERIC columns do not accept them
Decimal.set({
  precision: LEDGER_LIMITS.DECIMAL_PRECISION,
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,
  toExpNeg: -9e15,
});

export const ZERO = new Decimal(0);

/**
 * Converts a NUMERIC string (or an absent value, read as zero) to Decimal
 */
export function toDecimal(value: Decimal.Value | null): Decimal {
  return new Decimal(value ?? 0);
}

/**
 * Rounds a computed value (a product or a quotient) to the ledger scale, so
 * adding and later subtracting it is exact
 */
export function toLedgerScale(value: Decimal): Decimal {
  return value.toDecimalPlaces(LEDGER_LIMITS.LEDGER_SCALE, Decimal.ROUND_HALF_UP);
}

/**
 * Canonical string form stored in NUMERIC columns: no trailing zeros, no negative zero
 */
export function toDecimalString(value: Decimal): string {
  return value.isZero() ? '0' : value.toString();
}

/**
 * Percentage of `part` in `total`, rounded half-up to two decimals; 0 when total is 0
 */
export function percentageOf(part: Decimal, total: Decimal): number {
  if (total.isZero()) {
    return 0;
  }
  return part.times(100).dividedBy(total).toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toNumber();
}

export function isDecimalString(value: string): boolean {
  return /^-?\d+(\.\d+)?$/.test(value);
}

const LEDGER_DECIMAL = new RegExp(
  `^-?\\d{1,${LEDGER_LIMITS.MAX_INTEGER_DIGITS}}(\\.\\d{1,${LEDGER_LIMITS.LEDGER_SCALE}})?$`
);

/**
 * A decimal string within the digits the ledger stores exactly
 */
export function isLedgerDecimal(value: string): boolean {
  return LEDGER_DECIMAL.test(value);
}

export { Decimal };
