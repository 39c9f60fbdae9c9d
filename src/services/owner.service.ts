import { OwnerDomain } from '@/constants/transactions';
import { Distribution, Owner, Position, Transaction } from '@/models';
import { ConflictError, NotFoundError } from '@/errors';
import {
  IOwnerRepository,
  IPositionRepository,
  ITransactionRepository,
} from '@/repositories/interfaces';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { DistributionService } from './distribution.service';

const logger = createLogger('OwnerService');

export type OwnerWithPositions<O extends Owner, P extends Position> = O & { positions: P[] };

export interface PositionDetail<P extends Position> {
  position: P;
  transactions: Transaction[];
  distribution: Distribution;
}

/**
 * Behaviour shared by portfolios and wallets: per-user CRUD with unique
 * names, position listings and the detail view of one position.
 */
export abstract class OwnerService<O extends Owner, I extends { name: string }, P extends Position> {
  protected abstract readonly domain: OwnerDomain;
  protected abstract readonly label: 'Portfolio' | 'Wallet';

  constructor(
    protected ownerRepo: IOwnerRepository<O, I>,
    protected positionRepo: IPositionRepository<P>,
    protected transactionRepo: ITransactionRepository,
    protected distributionService: DistributionService
  ) {}

  async list(userId: number): Promise<OwnerWithPositions<O, P>[]> {
    const owners = await this.ownerRepo.listByUser(userId);
    return await Promise.all(owners.map((owner) => this.withPositions(owner)));
  }

  async get(userId: number, id: number): Promise<OwnerWithPositions<O, P>> {
    return await this.withPositions(await this.findOwned(userId, id));
  }

  /**
   * @throws ConflictError when the user already has one with this name
   */
  async create(userId: number, input: I): Promise<O> {
    if (await this.ownerRepo.existsByName(userId, input.name)) {
      throw new ConflictError(`${this.label} named "${input.name}" already exists`);
    }
    const owner = await this.ownerRepo.create(userId, input);
    logger.info({ userId, domain: this.domain, ownerId: owner.id }, `${this.label} created`);
    return owner;
  }

  async update(userId: number, id: number, input: I): Promise<O> {
    await this.findOwned(userId, id);
    if (await this.ownerRepo.existsByName(userId, input.name, id)) {
      throw new ConflictError(`${this.label} named "${input.name}" already exists`);
    }
    return await this.ownerRepo.update(id, input);
  }

  /**
   * @throws ConflictError while transactions still reference the owner
   */
  async delete(userId: number, id: number): Promise<void> {
    await this.findOwned(userId, id);
    const references = await this.transactionRepo.countByOwner(this.domain, id);
    if (references > 0) {
      throw new ConflictError(
        `${this.label} ${id} is referenced by ${references} transaction(s); delete them first`
      );
    }
    await this.ownerRepo.delete(id);
    logger.info({ userId, domain: this.domain, ownerId: id }, `${this.label} deleted`);
  }

  /**
   * One position with the transactions that built it and the instrument's
   * distribution across the user's owners of this domain
   */
  async getPosition(userId: number, ownerId: number, instrumentId: number): Promise<PositionDetail<P>> {
    await this.findOwned(userId, ownerId);
    const key = { ownerId, instrumentId };

    const position = await this.positionRepo.findByKey(key);
    if (!position) {
      throw new NotFoundError(
        `${this.label} ${ownerId} has no position in instrument ${instrumentId}`
      );
    }

    const [transactions, distribution] = await Promise.all([
      this.transactionRepo.findByPosition(this.domain, key, userId),
      this.distributionService.distribute(instrumentId, userId, this.domain),
    ]);

    return { position, transactions, distribution };
  }

  /**
   * Open an empty position so the instrument shows up before any transaction
   *
   * @throws ConflictError when the owner already has a position in the instrument
   */
  async addPosition(userId: number, ownerId: number, instrumentId: number): Promise<P> {
    await this.findOwned(userId, ownerId);
    const key = { ownerId, instrumentId };

    if (await this.positionRepo.findByKey(key)) {
      throw new ConflictError(
        `${this.label} ${ownerId} already has a position in instrument ${instrumentId}`
      );
    }
    const position = await this.positionRepo.insert(key);
    logger.info({ userId, domain: this.domain, ownerId, instrumentId }, 'Position opened');
    return position;
  }

  /**
   * @throws ConflictError while transactions still build the position
   */
  async removePosition(userId: number, ownerId: number, instrumentId: number): Promise<void> {
    await this.findOwned(userId, ownerId);
    const key = { ownerId, instrumentId };

    const position = await this.positionRepo.findByKey(key);
    if (!position) {
      throw new NotFoundError(
        `${this.label} ${ownerId} has no position in instrument ${instrumentId}`
      );
    }

    const transactions = await this.transactionRepo.findByPosition(this.domain, key, userId);
    if (transactions.length > 0) {
      throw new ConflictError(
        `Position in instrument ${instrumentId} is built by ${transactions.length} transaction(s); delete them first`
      );
    }

    await this.positionRepo.delete(position.id);
    logger.info({ userId, domain: this.domain, ownerId, instrumentId }, 'Position removed');
  }

  protected async findOwned(userId: number, id: number): Promise<O> {
    const owner = await this.ownerRepo.findByIdAndUser(id, userId);
    if (!owner) {
      throw new NotFoundError(`${this.label} with ID ${id} not found`);
    }
    return owner;
  }

  private async withPositions(owner: O): Promise<OwnerWithPositions<O, P>> {
    const positions = await this.positionRepo.findByOwner(owner.id);
    return { ...owner, positions };
  }
}
