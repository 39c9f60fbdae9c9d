import { PoolClient } from 'pg';
import { OwnerDomain } from '@/constants/transactions';
import {
  PositionKey,
  Transaction,
  TransactionCursor,
  TransactionFilters,
  TransactionPage,
  TransactionWrite,
} from '@/models';

/**
 * Transaction Repository Interface
 */
export interface ITransactionRepository {
  create(userId: number, data: TransactionWrite, client: PoolClient): Promise<Transaction>;

  /**
   * Overwrite every writable field of a transaction
   */
  update(id: number, data: TransactionWrite, client: PoolClient): Promise<Transaction>;

  /**
   * Point a transaction at its mirrored sibling (or clear the link)
   */
  setRelated(id: number, relatedTransactionId: number | null, client: PoolClient): Promise<Transaction>;

  delete(id: number, client: PoolClient): Promise<void>;

  findById(id: number, userId: number): Promise<Transaction | null>;

  /**
   * Read a transaction of the user and lock its row until the unit of work ends
   */
  findByIdForUpdate(id: number, userId: number, client: PoolClient): Promise<Transaction | null>;

  /**
   * Keyset pagination by (date, id), newest first
   * @param cursor - Last row of the previous page
   */
  listByUser(
    userId: number,
    filters: TransactionFilters,
    limit: number,
    cursor?: TransactionCursor
  ): Promise<TransactionPage>;

  /**
   * Transactions referencing a position in one domain, oldest first
   */
  findByPosition(domain: OwnerDomain, key: PositionKey, userId: number): Promise<Transaction[]>;

  /**
   * Number of transactions referencing an owner as either party
   */
  countByOwner(domain: OwnerDomain, ownerId: number): Promise<number>;
}
