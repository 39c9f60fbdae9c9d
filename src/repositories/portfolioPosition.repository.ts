import { PoolClient } from 'pg';
import { query } from '@/config/database';
import { OwnedPosition, PortfolioPosition, PositionKey } from '@/models';
import { ConflictError, NotFoundError } from '@/errors';
import { IPortfolioPositionRepository } from './interfaces/IPositionRepository';

// trim_scale: NUMERIC(60, 18) pads every value to 18 fractional digits
const POSITION_COLUMNS = `
  pp.id,
  pp.portfolio_id AS "ownerId",
  pp.instrument_id AS "instrumentId",
  trim_scale(pp.quantity)::text AS "quantity",
  trim_scale(pp.amount)::text AS "amount",
  trim_scale(pp.buy_orders)::text AS "buyOrders",
  trim_scale(pp.sell_orders)::text AS "sellOrders"
`;

/**
 * Portfolio Position Repository
 * One row per (portfolio, instrument), enforced by a unique constraint
 */
export class PortfolioPositionRepository implements IPortfolioPositionRepository {
  async findForUpdate(key: PositionKey, client: PoolClient): Promise<PortfolioPosition | null> {
    const result = await query<PortfolioPosition>(
      `
      SELECT ${POSITION_COLUMNS}
      FROM portfolio_positions pp
      WHERE pp.portfolio_id = $1 AND pp.instrument_id = $2
      FOR UPDATE
      `,
      [key.ownerId, key.instrumentId],
      client
    );
    return result.rows[0] ?? null;
  }

  /**
   * ON CONFLICT DO NOTHING returns no row when another transaction inserted the
   * key after our SELECT ... FOR UPDATE found nothing
   */
  async insert(key: PositionKey, client?: PoolClient): Promise<PortfolioPosition> {
    const result = await query<PortfolioPosition>(
      `
      INSERT INTO portfolio_positions AS pp (portfolio_id, instrument_id, quantity, amount, buy_orders, sell_orders)
      VALUES ($1, $2, 0, 0, 0, 0)
      ON CONFLICT (portfolio_id, instrument_id) DO NOTHING
      RETURNING ${POSITION_COLUMNS}
      `,
      [key.ownerId, key.instrumentId],
      client
    );

    const row = result.rows[0];
    if (!row) {
      throw new ConflictError(
        `Position for portfolio ${key.ownerId} and instrument ${key.instrumentId} was created concurrently`
      );
    }
    return row;
  }

  async save(position: PortfolioPosition, client: PoolClient): Promise<PortfolioPosition> {
    const result = await query<PortfolioPosition>(
      `
      UPDATE portfolio_positions AS pp
      SET quantity = $2, amount = $3, buy_orders = $4, sell_orders = $5, updated_at = NOW()
      WHERE pp.id = $1
      RETURNING ${POSITION_COLUMNS}
      `,
      [position.id, position.quantity, position.amount, position.buyOrders, position.sellOrders],
      client
    );

    const row = result.rows[0];
    if (!row) {
      throw new NotFoundError(`Portfolio position with ID ${position.id} not found`);
    }
    return row;
  }

  async findByKey(key: PositionKey, client?: PoolClient): Promise<PortfolioPosition | null> {
    const result = await query<PortfolioPosition>(
      `
      SELECT ${POSITION_COLUMNS}
      FROM portfolio_positions pp
      WHERE pp.portfolio_id = $1 AND pp.instrument_id = $2
      `,
      [key.ownerId, key.instrumentId],
      client
    );
    return result.rows[0] ?? null;
  }

  async findByOwner(ownerId: number): Promise<PortfolioPosition[]> {
    const result = await query<PortfolioPosition>(
      `
      SELECT ${POSITION_COLUMNS}
      FROM portfolio_positions pp
      WHERE pp.portfolio_id = $1
      ORDER BY pp.instrument_id ASC
      `,
      [ownerId]
    );
    return result.rows;
  }

  async findByInstrumentAndUser(
    instrumentId: number,
    userId: number
  ): Promise<OwnedPosition<PortfolioPosition>[]> {
    const result = await query<OwnedPosition<PortfolioPosition>>(
      `
      SELECT ${POSITION_COLUMNS}, p.name AS "ownerName"
      FROM portfolio_positions pp
      JOIN portfolios p ON p.id = pp.portfolio_id
      WHERE pp.instrument_id = $1 AND p.user_id = $2
      ORDER BY p.id ASC
      `,
      [instrumentId, userId]
    );
    return result.rows;
  }

  async findInstrumentIds(userId: number): Promise<number[]> {
    const result = await query<{ instrumentId: number }>(
      `
      SELECT DISTINCT pp.instrument_id AS "instrumentId"
      FROM portfolio_positions pp
      JOIN portfolios p ON p.id = pp.portfolio_id
      WHERE p.user_id = $1
      ORDER BY "instrumentId" ASC
      `,
      [userId]
    );
    return result.rows.map((row) => row.instrumentId);
  }

  async delete(id: number): Promise<void> {
    await query('DELETE FROM portfolio_positions WHERE id = $1', [id]);
  }
}
