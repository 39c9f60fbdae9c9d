import { PoolClient } from 'pg';
import { query } from '@/config/database';
import { OWNER_DOMAINS, OwnerDomain } from '@/constants/transactions';
import {
  PositionKey,
  Transaction,
  TransactionCursor,
  TransactionFilters,
  TransactionPage,
  TransactionWrite,
} from '@/models';
import { NotFoundError } from '@/errors';
import { encodeCursor } from '@/utils/cursor';
import { ITransactionRepository } from './interfaces/ITransactionRepository';

// "order" is reserved in SQL, the column is is_order
const TRANSACTION_COLUMNS = `
  id,
  user_id AS "userId",
  type,
  date,
  instrument_id AS "instrumentId",
  instrument2_id AS "instrument2Id",
  trim_scale(quantity)::text AS "quantity",
  trim_scale(quantity2)::text AS "quantity2",
  trim_scale(price)::text AS "price",
  trim_scale(price_usd)::text AS "priceUsd",
  is_order AS "order",
  comment,
  portfolio_id AS "portfolioId",
  portfolio2_id AS "portfolio2Id",
  wallet_id AS "walletId",
  wallet2_id AS "wallet2Id",
  related_transaction_id AS "relatedTransactionId",
  is_mirror AS "isMirror",
  trim_scale(transferred_amount)::text AS "transferredAmount"
`;

function writeParams(data: TransactionWrite): unknown[] {
  return [
    data.type,
    data.date,
    data.instrumentId,
    data.instrument2Id,
    data.quantity,
    data.quantity2,
    data.price,
    data.priceUsd,
    data.order,
    data.comment,
    data.portfolioId,
    data.portfolio2Id,
    data.walletId,
    data.wallet2Id,
    data.relatedTransactionId,
    data.isMirror,
    data.transferredAmount,
  ];
}

function ownerColumns(domain: OwnerDomain): { primary: string; secondary: string } {
  return domain === OWNER_DOMAINS.PORTFOLIO
    ? { primary: 'portfolio_id', secondary: 'portfolio2_id' }
    : { primary: 'wallet_id', secondary: 'wallet2_id' };
}

/**
 * Transaction Repository
 * NUMERIC columns come back as strings and are kept that way
 */
export class TransactionRepository implements ITransactionRepository {
  async create(userId: number, data: TransactionWrite, client: PoolClient): Promise<Transaction> {
    const result = await query<Transaction>(
      `
      INSERT INTO transactions (
        type, date, instrument_id, instrument2_id, quantity, quantity2, price, price_usd,
        is_order, comment, portfolio_id, portfolio2_id, wallet_id, wallet2_id,
        related_transaction_id, is_mirror, transferred_amount, user_id
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18)
      RETURNING ${TRANSACTION_COLUMNS}
      `,
      [...writeParams(data), userId],
      client
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error('INSERT INTO transactions returned no row');
    }
    return row;
  }

  async update(id: number, data: TransactionWrite, client: PoolClient): Promise<Transaction> {
    const result = await query<Transaction>(
      `
      UPDATE transactions SET
        type = $1, date = $2, instrument_id = $3, instrument2_id = $4, quantity = $5,
        quantity2 = $6, price = $7, price_usd = $8, is_order = $9, comment = $10,
        portfolio_id = $11, portfolio2_id = $12, wallet_id = $13, wallet2_id = $14,
        related_transaction_id = $15, is_mirror = $16, transferred_amount = $17,
        updated_at = NOW()
      WHERE id = $18
      RETURNING ${TRANSACTION_COLUMNS}
      `,
      [...writeParams(data), id],
      client
    );

    const row = result.rows[0];
    if (!row) {
      throw new NotFoundError(`Transaction with ID ${id} not found`);
    }
    return row;
  }

  async setRelated(
    id: number,
    relatedTransactionId: number | null,
    client: PoolClient
  ): Promise<Transaction> {
    const result = await query<Transaction>(
      `
      UPDATE transactions SET related_transaction_id = $2, updated_at = NOW()
      WHERE id = $1
      RETURNING ${TRANSACTION_COLUMNS}
      `,
      [id, relatedTransactionId],
      client
    );

    const row = result.rows[0];
    if (!row) {
      throw new NotFoundError(`Transaction with ID ${id} not found`);
    }
    return row;
  }

  async delete(id: number, client: PoolClient): Promise<void> {
    await query('DELETE FROM transactions WHERE id = $1', [id], client);
  }

  async findById(id: number, userId: number): Promise<Transaction | null> {
    const result = await query<Transaction>(
      `SELECT ${TRANSACTION_COLUMNS} FROM transactions WHERE id = $1 AND user_id = $2`,
      [id, userId]
    );
    return result.rows[0] ?? null;
  }

  async findByIdForUpdate(
    id: number,
    userId: number,
    client: PoolClient
  ): Promise<Transaction | null> {
    const result = await query<Transaction>(
      `SELECT ${TRANSACTION_COLUMNS} FROM transactions WHERE id = $1 AND user_id = $2 FOR UPDATE`,
      [id, userId],
      client
    );
    return result.rows[0] ?? null;
  }

  /**
   * Keyset pagination on (date, id): rows sharing the boundary date are not
   * skipped, and deep pages use the (user_id, date, id) index instead of OFFSET scans
   */
  async listByUser(
    userId: number,
    filters: TransactionFilters,
    limit: number,
    cursor?: TransactionCursor
  ): Promise<TransactionPage> {
    const params: unknown[] = [userId];
    const conditions = ['user_id = $1'];
    const bind = (value: unknown): string => {
      params.push(value);
      return `$${params.length}`;
    };

    if (filters.portfolioId !== undefined) {
      conditions.push(`portfolio_id = ${bind(filters.portfolioId)}`);
    }
    if (filters.walletId !== undefined) {
      conditions.push(`wallet_id = ${bind(filters.walletId)}`);
    }
    if (filters.instrumentId !== undefined) {
      const instrument = bind(filters.instrumentId);
      conditions.push(`(instrument_id = ${instrument} OR instrument2_id = ${instrument})`);
    }
    if (filters.type !== undefined) {
      conditions.push(`type = ${bind(filters.type)}`);
    }
    if (cursor) {
      conditions.push(`(date, id) < (${bind(cursor.date)}, ${bind(cursor.id)})`);
    }

    const result = await query<Transaction>(
      `
      SELECT ${TRANSACTION_COLUMNS}
      FROM transactions
      WHERE ${conditions.join(' AND ')}
      ORDER BY date DESC, id DESC
      LIMIT ${bind(limit + 1)}
      `,
      params
    );

    const transactions = result.rows;
    const hasMore = transactions.length > limit;

    // Drop the extra row used to detect another page
    if (hasMore) {
      transactions.pop();
    }

    const last = transactions[transactions.length - 1];

    return {
      transactions,
      nextCursor: hasMore && last ? encodeCursor(last) : null,
      hasMore,
    };
  }

  /**
   * Only the owner-side column is matched: the counterparty sees a transfer
   * through its mirrored record
   */
  async findByPosition(
    domain: OwnerDomain,
    key: PositionKey,
    userId: number
  ): Promise<Transaction[]> {
    const { primary } = ownerColumns(domain);
    const result = await query<Transaction>(
      `
      SELECT ${TRANSACTION_COLUMNS}
      FROM transactions
      WHERE user_id = $1
        AND ${primary} = $2
        AND (instrument_id = $3 OR instrument2_id = $3)
      ORDER BY date ASC, id ASC
      `,
      [userId, key.ownerId, key.instrumentId]
    );
    return result.rows;
  }

  async countByOwner(domain: OwnerDomain, ownerId: number): Promise<number> {
    const { primary, secondary } = ownerColumns(domain);
    const result = await query<{ count: string }>(
      `SELECT COUNT(*) AS count FROM transactions WHERE ${primary} = $1 OR ${secondary} = $1`,
      [ownerId]
    );
    return parseInt(result.rows[0]?.count ?? '0', 10);
  }
}
