import { PoolClient } from 'pg';
import { query } from '@/config/database';
import { Wallet, WalletInput } from '@/models';
import { ConflictError, NotFoundError } from '@/errors';
import { isUniqueViolation } from '@/utils/pgErrors';
import { IWalletRepository } from './interfaces/IWalletRepository';

const WALLET_COLUMNS = `id, user_id AS "userId", name, comment`;

/**
 * Wallet Repository
 * Names are unique per user (wallets_user_id_name_key)
 */
export class WalletRepository implements IWalletRepository {
  async findByIdAndUser(id: number, userId: number, client?: PoolClient): Promise<Wallet | null> {
    const result = await query<Wallet>(
      `SELECT ${WALLET_COLUMNS} FROM wallets WHERE id = $1 AND user_id = $2`,
      [id, userId],
      client
    );
    return result.rows[0] ?? null;
  }

  async listByUser(userId: number): Promise<Wallet[]> {
    const result = await query<Wallet>(
      `SELECT ${WALLET_COLUMNS} FROM wallets WHERE user_id = $1 ORDER BY id ASC`,
      [userId]
    );
    return result.rows;
  }

  async existsByName(userId: number, name: string, excludeId?: number): Promise<boolean> {
    const result = await query<{ exists: boolean }>(
      `
      SELECT EXISTS (
        SELECT 1 FROM wallets
        WHERE user_id = $1 AND name = $2 AND ($3::int IS NULL OR id <> $3::int)
      ) AS exists
      `,
      [userId, name, excludeId ?? null]
    );
    return result.rows[0]?.exists ?? false;
  }

  async create(userId: number, input: WalletInput): Promise<Wallet> {
    try {
      const result = await query<Wallet>(
        `
        INSERT INTO wallets (user_id, name, comment)
        VALUES ($1, $2, $3)
        RETURNING ${WALLET_COLUMNS}
        `,
        [userId, input.name, input.comment]
      );
      const row = result.rows[0];
      if (!row) {
        throw new Error('INSERT INTO wallets returned no row');
      }
      return row;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`Wallet named "${input.name}" already exists`);
      }
      throw error;
    }
  }

  async update(id: number, input: WalletInput): Promise<Wallet> {
    try {
      const result = await query<Wallet>(
        `
        UPDATE wallets SET name = $2, comment = $3, updated_at = NOW()
        WHERE id = $1
        RETURNING ${WALLET_COLUMNS}
        `,
        [id, input.name, input.comment]
      );
      const row = result.rows[0];
      if (!row) {
        throw new NotFoundError(`Wallet with ID ${id} not found`);
      }
      return row;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`Wallet named "${input.name}" already exists`);
      }
      throw error;
    }
  }

  async delete(id: number): Promise<void> {
    await query('DELETE FROM wallets WHERE id = $1', [id]);
  }
}
