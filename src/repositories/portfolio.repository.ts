import { PoolClient } from 'pg';
import { query } from '@/config/database';
import { Portfolio, PortfolioInput } from '@/models';
import { ConflictError, NotFoundError } from '@/errors';
import { isUniqueViolation } from '@/utils/pgErrors';
import { IPortfolioRepository } from './interfaces/IPortfolioRepository';

const PORTFOLIO_COLUMNS = `id, user_id AS "userId", name, market, comment`;

/**
 * Portfolio Repository
 * Names are unique per user (portfolios_user_id_name_key)
 */
export class PortfolioRepository implements IPortfolioRepository {
  async findByIdAndUser(id: number, userId: number, client?: PoolClient): Promise<Portfolio | null> {
    const result = await query<Portfolio>(
      `SELECT ${PORTFOLIO_COLUMNS} FROM portfolios WHERE id = $1 AND user_id = $2`,
      [id, userId],
      client
    );
    return result.rows[0] ?? null;
  }

  async listByUser(userId: number): Promise<Portfolio[]> {
    const result = await query<Portfolio>(
      `SELECT ${PORTFOLIO_COLUMNS} FROM portfolios WHERE user_id = $1 ORDER BY id ASC`,
      [userId]
    );
    return result.rows;
  }

  async existsByName(userId: number, name: string, excludeId?: number): Promise<boolean> {
    const result = await query<{ exists: boolean }>(
      `
      SELECT EXISTS (
        SELECT 1 FROM portfolios
        WHERE user_id = $1 AND name = $2 AND ($3::int IS NULL OR id <> $3::int)
      ) AS exists
      `,
      [userId, name, excludeId ?? null]
    );
    return result.rows[0]?.exists ?? false;
  }

  async create(userId: number, input: PortfolioInput): Promise<Portfolio> {
    try {
      const result = await query<Portfolio>(
        `
        INSERT INTO portfolios (user_id, name, market, comment)
        VALUES ($1, $2, $3, $4)
        RETURNING ${PORTFOLIO_COLUMNS}
        `,
        [userId, input.name, input.market, input.comment]
      );
      const row = result.rows[0];
      if (!row) {
        throw new Error('INSERT INTO portfolios returned no row');
      }
      return row;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`Portfolio named "${input.name}" already exists`);
      }
      throw error;
    }
  }

  async update(id: number, input: PortfolioInput): Promise<Portfolio> {
    try {
      const result = await query<Portfolio>(
        `
        UPDATE portfolios SET name = $2, market = $3, comment = $4, updated_at = NOW()
        WHERE id = $1
        RETURNING ${PORTFOLIO_COLUMNS}
        `,
        [id, input.name, input.market, input.comment]
      );
      const row = result.rows[0];
      if (!row) {
        throw new NotFoundError(`Portfolio with ID ${id} not found`);
      }
      return row;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`Portfolio named "${input.name}" already exists`);
      }
      throw error;
    }
  }

  async delete(id: number): Promise<void> {
    await query('DELETE FROM portfolios WHERE id = $1', [id]);
  }
}
