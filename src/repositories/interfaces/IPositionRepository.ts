import { PoolClient } from 'pg';
import { OwnedPosition, PortfolioPosition, Position, PositionKey, WalletPosition } from '@/models';

/**
 * Position Repository Interface
 * One ledger table keyed uniquely by (owner, instrument)
 */
export interface IPositionRepository<P extends Position> {
  /**
   * Read a position and lock its row until the unit of work ends
   */
  findForUpdate(key: PositionKey, client: PoolClient): Promise<P | null>;

  /**
   * Insert a zero-initialised position
   * @throws ConflictError when the key already exists (or a concurrent request created it first)
   */
  insert(key: PositionKey, client?: PoolClient): Promise<P>;

  /**
   * Persist quantity, amount and order totals of a resolved position
   */
  save(position: P, client: PoolClient): Promise<P>;

  findByKey(key: PositionKey, client?: PoolClient): Promise<P | null>;

  /**
   * Every position of one owner, ordered by instrument id
   */
  findByOwner(ownerId: number): Promise<P[]>;

  /**
   * Positions of one instrument across all owners of a user, with owner names
   */
  findByInstrumentAndUser(instrumentId: number, userId: number): Promise<OwnedPosition<P>[]>;

  /**
   * Distinct instruments held by any owner of the user, ascending
   */
  findInstrumentIds(userId: number): Promise<number[]>;

  delete(id: number): Promise<void>;
}

export type IPortfolioPositionRepository = IPositionRepository<PortfolioPosition>;
export type IWalletPositionRepository = IPositionRepository<WalletPosition>;
