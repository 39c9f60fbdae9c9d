import { PoolClient } from 'pg';
import { query } from '@/config/database';
import { OwnedPosition, PositionKey, WalletPosition } from '@/models';
import { ConflictError, NotFoundError } from '@/errors';
import { IWalletPositionRepository } from './interfaces/IPositionRepository';

// trim_scale: NUMERIC(60, 18) pads every value to 18 fractional digits
const POSITION_COLUMNS = `
  wp.id,
  wp.wallet_id AS "ownerId",
  wp.instrument_id AS "instrumentId",
  trim_scale(wp.quantity)::text AS "quantity",
  trim_scale(wp.buy_orders)::text AS "buyOrders",
  trim_scale(wp.sell_orders)::text AS "sellOrders"
`;

/**
 * Wallet Position Repository
 * Same contract as portfolio positions, without cost basis
 */
export class WalletPositionRepository implements IWalletPositionRepository {
  async findForUpdate(key: PositionKey, client: PoolClient): Promise<WalletPosition | null> {
    const result = await query<WalletPosition>(
      `
      SELECT ${POSITION_COLUMNS}
      FROM wallet_positions wp
      WHERE wp.wallet_id = $1 AND wp.instrument_id = $2
      FOR UPDATE
      `,
      [key.ownerId, key.instrumentId],
      client
    );
    return result.rows[0] ?? null;
  }

  async insert(key: PositionKey, client?: PoolClient): Promise<WalletPosition> {
    const result = await query<WalletPosition>(
      `
      INSERT INTO wallet_positions AS wp (wallet_id, instrument_id, quantity, buy_orders, sell_orders)
      VALUES ($1, $2, 0, 0, 0)
      ON CONFLICT (wallet_id, instrument_id) DO NOTHING
      RETURNING ${POSITION_COLUMNS}
      `,
      [key.ownerId, key.instrumentId],
      client
    );

    const row = result.rows[0];
    if (!row) {
      throw new ConflictError(
        `Position for wallet ${key.ownerId} and instrument ${key.instrumentId} was created concurrently`
      );
    }
    return row;
  }

  async save(position: WalletPosition, client: PoolClient): Promise<WalletPosition> {
    const result = await query<WalletPosition>(
      `
      UPDATE wallet_positions AS wp
      SET quantity = $2, buy_orders = $3, sell_orders = $4, updated_at = NOW()
      WHERE wp.id = $1
      RETURNING ${POSITION_COLUMNS}
      `,
      [position.id, position.quantity, position.buyOrders, position.sellOrders],
      client
    );

    const row = result.rows[0];
    if (!row) {
      throw new NotFoundError(`Wallet position with ID ${position.id} not found`);
    }
    return row;
  }

  async findByKey(key: PositionKey, client?: PoolClient): Promise<WalletPosition | null> {
    const result = await query<WalletPosition>(
      `
      SELECT ${POSITION_COLUMNS}
      FROM wallet_positions wp
      WHERE wp.wallet_id = $1 AND wp.instrument_id = $2
      `,
      [key.ownerId, key.instrumentId],
      client
    );
    return result.rows[0] ?? null;
  }

  async findByOwner(ownerId: number): Promise<WalletPosition[]> {
    const result = await query<WalletPosition>(
      `
      SELECT ${POSITION_COLUMNS}
      FROM wallet_positions wp
      WHERE wp.wallet_id = $1
      ORDER BY wp.instrument_id ASC
      `,
      [ownerId]
    );
    return result.rows;
  }

  async findByInstrumentAndUser(
    instrumentId: number,
    userId: number
  ): Promise<OwnedPosition<WalletPosition>[]> {
    const result = await query<OwnedPosition<WalletPosition>>(
      `
      SELECT ${POSITION_COLUMNS}, w.name AS "ownerName"
      FROM wallet_positions wp
      JOIN wallets w ON w.id = wp.wallet_id
      WHERE wp.instrument_id = $1 AND w.user_id = $2
      ORDER BY w.id ASC
      `,
      [instrumentId, userId]
    );
    return result.rows;
  }

  async findInstrumentIds(userId: number): Promise<number[]> {
    const result = await query<{ instrumentId: number }>(
      `
      SELECT DISTINCT wp.instrument_id AS "instrumentId"
      FROM wallet_positions wp
      JOIN wallets w ON w.id = wp.wallet_id
      WHERE w.user_id = $1
      ORDER BY "instrumentId" ASC
      `,
      [userId]
    );
    return result.rows.map((row) => row.instrumentId);
  }

  async delete(id: number): Promise<void> {
    await query('DELETE FROM wallet_positions WHERE id = $1', [id]);
  }
}
