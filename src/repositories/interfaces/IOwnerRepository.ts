import { PoolClient } from 'pg';
import { Owner } from '@/models';

/**
 * Owner Repository Interface
 * Contract shared by portfolios and wallets; `I` is the writable field set
 */
export interface IOwnerRepository<O extends Owner, I> {
  /**
   * Find an owner belonging to the user
   * @returns The owner, or null when absent or owned by someone else
   */
  findByIdAndUser(id: number, userId: number, client?: PoolClient): Promise<O | null>;

  /**
   * All owners of a user, ordered by id
   */
  listByUser(userId: number): Promise<O[]>;

  /**
   * Whether the user already has an owner with this name
   * @param excludeId - Ignore this owner (rename to the same name)
   */
  existsByName(userId: number, name: string, excludeId?: number): Promise<boolean>;

  /**
   * @throws ConflictError when the name is taken (unique constraint)
   */
  create(userId: number, input: I): Promise<O>;

  /**
   * @throws ConflictError when the new name is taken
   * @throws NotFoundError when the owner no longer exists
   */
  update(id: number, input: I): Promise<O>;

  delete(id: number): Promise<void>;
}
