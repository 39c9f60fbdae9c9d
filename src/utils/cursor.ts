import { Transaction, TransactionCursor } from '@/models';

const CURSOR_PATTERN = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z)_(\d+)$/;

/**
 * Keyset cursor of a listing page: `<ISO date>_<id>` of its last row.
 * The id breaks ties between transactions sharing a date.
 */
export function encodeCursor(last: Pick<Transaction, 'date' | 'id'>): string {
  return `${last.date.toISOString()}_${last.id}`;
}

/**
 * @returns null when the value is not a cursor this service issued
 */
export function decodeCursor(value: string): TransactionCursor | null {
  const match = CURSOR_PATTERN.exec(value);
  if (!match?.[1] || !match[2]) {
    return null;
  }

  const date = new Date(match[1]);
  const id = Number(match[2]);
  if (Number.isNaN(date.getTime()) || !Number.isSafeInteger(id) || id <= 0) {
    return null;
  }
  return { date, id };
}
