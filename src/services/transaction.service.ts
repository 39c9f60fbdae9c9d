import { PoolClient } from 'pg';
import { transaction } from '@/config/database';
import {
  TransactionType,
  isTrade,
  isTransfer,
  oppositeTransferType,
} from '@/constants/transactions';
import {
  InstrumentDistribution,
  Transaction,
  TransactionData,
  TransactionFilters,
  TransactionInput,
  TransactionPage,
  TransactionWrite,
} from '@/models';
import { BusinessRuleError, NotFoundError, ValidationError } from '@/errors';
import { IMetrics } from '@/interfaces/IMetrics';
import {
  IPortfolioPositionRepository,
  IPortfolioRepository,
  ITransactionRepository,
  IWalletPositionRepository,
  IWalletRepository,
} from '@/repositories/interfaces';
import { validateTransaction } from '@/validators/transaction.validator';
import { decodeCursor } from '@/utils/cursor';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { AffectedPositions, LedgerSession } from './ledgerSession';
import { DistributionService } from './distribution.service';

const logger = createLogger('TransactionService');

export interface LedgerResult extends AffectedPositions {
  transaction: Transaction;
}

export interface LedgerUpdateResult extends LedgerResult {
  previous: Transaction;
}

type LedgerOperation = 'create' | 'update' | 'delete' | 'execute';

/**
 * Writable fields of a stored transaction
 */
function toWrite(stored: Transaction): TransactionWrite {
  const { id: _id, userId: _userId, ...write } = stored;
  return write;
}

/**
 * The sibling record of a transfer: the same movement seen from the other owner.
 * Mirrors never move positions; the primary carries the whole effect.
 */
function mirrorOf(primary: Transaction): TransactionWrite {
  return {
    ...toWrite(primary),
    type: oppositeTransferType(primary.type),
    portfolioId: primary.portfolio2Id,
    portfolio2Id: primary.portfolioId,
    walletId: primary.wallet2Id,
    wallet2Id: primary.walletId,
    relatedTransactionId: primary.id,
    isMirror: true,
    transferredAmount: null,
  };
}

/**
 * Transaction Service
 *
 * Every mutation runs in one database transaction: the transaction rows and
 * every position change commit together or not at all. Update cancels the
 * stored effect and applies the new one inside the same unit of work.
 */
export class TransactionService {
  constructor(
    private transactionRepo: ITransactionRepository,
    private portfolioRepo: IPortfolioRepository,
    private walletRepo: IWalletRepository,
    private portfolioPositionRepo: IPortfolioPositionRepository,
    private walletPositionRepo: IWalletPositionRepository,
    private distributionService: DistributionService,
    private metrics: IMetrics
  ) {}

  /**
   * Record a transaction and apply its effect
   *
   * @throws ValidationError when the type is unknown or required fields are missing
   * @throws NotFoundError when a referenced owner does not belong to the user
   */
  async create(userId: number, input: TransactionInput): Promise<LedgerResult> {
    const data = validateTransaction(input);

    const result = await transaction(async (client) => {
      await this.assertOwnership(userId, data, client);
      const session = this.openSession(client);

      const transferredAmount = await session.apply({ ...data, transferredAmount: null }, false);
      const created = await this.transactionRepo.create(
        userId,
        { ...data, relatedTransactionId: null, isMirror: false, transferredAmount },
        client
      );
      const stored = isTransfer(created.type)
        ? await this.createMirror(userId, created, client)
        : created;

      await session.flush();
      return { transaction: stored, ...(await session.affected([stored])) };
    });

    this.record('create', result.transaction.type);
    logger.info(
      { userId, transactionId: result.transaction.id, type: result.transaction.type },
      'Transaction created'
    );
    return result;
  }

  /**
   * Replace a transaction: cancel the stored effect, then apply the new one
   *
   * @throws BusinessRuleError when the transaction is a mirrored transfer record
   */
  async update(userId: number, id: number, input: TransactionInput): Promise<LedgerUpdateResult> {
    const data = validateTransaction(input);

    const result = await transaction(async (client) => {
      const previous = await this.findForUpdate(id, userId, client);
      if (previous.isMirror) {
        throw new BusinessRuleError(
          `Transaction ${id} mirrors transfer ${previous.relatedTransactionId}; update the original instead`
        );
      }
      await this.assertOwnership(userId, data, client);

      const session = this.openSession(client);
      await session.apply(previous, true);
      const transferredAmount = await session.apply({ ...data, transferredAmount: null }, false);

      const updated = await this.transactionRepo.update(
        id,
        {
          ...data,
          relatedTransactionId: previous.relatedTransactionId,
          isMirror: false,
          transferredAmount,
        },
        client
      );
      const stored = await this.syncMirror(userId, updated, client);

      await session.flush();
      return {
        previous,
        transaction: stored,
        ...(await session.affected([previous, stored])),
      };
    });

    this.record('update', result.transaction.type);
    logger.info(
      { userId, transactionId: id, from: result.previous.type, to: result.transaction.type },
      'Transaction updated'
    );
    return result;
  }

  /**
   * Reverse a transaction's effect and remove it. Deleting either record of a
   * mirrored transfer removes both.
   */
  async delete(userId: number, id: number): Promise<LedgerResult> {
    const result = await transaction(async (client) => {
      const found = await this.findForUpdate(id, userId, client);
      const primary =
        found.isMirror && found.relatedTransactionId !== null
          ? await this.findForUpdate(found.relatedTransactionId, userId, client)
          : found;

      const session = this.openSession(client);
      if (!primary.isMirror) {
        await session.apply(primary, true);
      }

      if (primary.relatedTransactionId !== null) {
        await this.transactionRepo.delete(primary.relatedTransactionId, client);
      }
      await this.transactionRepo.delete(primary.id, client);

      await session.flush();
      return { transaction: primary, ...(await session.affected([primary])) };
    });

    this.record('delete', result.transaction.type);
    logger.info(
      { userId, transactionId: result.transaction.id, type: result.transaction.type },
      'Transaction deleted'
    );
    return result;
  }

  /**
   * Turn a pending Buy/Sell order into an executed trade dated now
   *
   * @throws BusinessRuleError when the transaction is not a pending trade
   */
  async executeOrder(userId: number, id: number): Promise<LedgerUpdateResult> {
    const result = await transaction(async (client) => {
      const previous = await this.findForUpdate(id, userId, client);
      if (!isTrade(previous.type) || !previous.order) {
        throw new BusinessRuleError(`Transaction ${id} is not a pending order`);
      }

      const executed: TransactionWrite = { ...toWrite(previous), order: false, date: new Date() };

      const session = this.openSession(client);
      await session.apply(previous, true);
      await session.apply(executed, false);

      const updated = await this.transactionRepo.update(id, executed, client);

      await session.flush();
      return {
        previous,
        transaction: updated,
        ...(await session.affected([updated])),
      };
    });

    this.record('execute', result.transaction.type);
    logger.info({ userId, transactionId: id }, 'Pending order executed');
    return result;
  }

  async getById(userId: number, id: number): Promise<Transaction> {
    const found = await this.transactionRepo.findById(id, userId);
    if (!found) {
      throw new NotFoundError(`Transaction with ID ${id} not found`);
    }
    return found;
  }

  /**
   * @param cursor - nextCursor of the previous page
   * @throws ValidationError when the cursor is malformed
   */
  async list(
    userId: number,
    filters: TransactionFilters,
    limit: number,
    cursor?: string
  ): Promise<TransactionPage> {
    if (cursor === undefined) {
      return await this.transactionRepo.listByUser(userId, filters, limit);
    }

    const position = decodeCursor(cursor);
    if (!position) {
      throw new ValidationError('Invalid cursor', { cursor });
    }
    return await this.transactionRepo.listByUser(userId, filters, limit, position);
  }

  /**
   * How the user's holdings of one instrument split across portfolios and wallets
   */
  async getDistribution(instrumentId: number, userId: number): Promise<InstrumentDistribution> {
    return await this.distributionService.getDistribution(instrumentId, userId);
  }

  private openSession(client: PoolClient): LedgerSession {
    return new LedgerSession(this.portfolioPositionRepo, this.walletPositionRepo, client);
  }

  private async findForUpdate(id: number, userId: number, client: PoolClient): Promise<Transaction> {
    const found = await this.transactionRepo.findByIdForUpdate(id, userId, client);
    if (!found) {
      throw new NotFoundError(`Transaction with ID ${id} not found`);
    }
    return found;
  }

  /**
   * Every owner a transaction references must belong to the caller
   */
  private async assertOwnership(
    userId: number,
    data: TransactionData,
    client: PoolClient
  ): Promise<void> {
    const portfolioIds = [data.portfolioId, data.portfolio2Id].filter(
      (ownerId): ownerId is number => ownerId !== null
    );
    const walletIds = [data.walletId, data.wallet2Id].filter(
      (ownerId): ownerId is number => ownerId !== null
    );

    await Promise.all([
      ...portfolioIds.map(async (portfolioId) => {
        const portfolio = await this.portfolioRepo.findByIdAndUser(portfolioId, userId, client);
        if (!portfolio) {
          throw new NotFoundError(`Portfolio with ID ${portfolioId} not found`);
        }
      }),
      ...walletIds.map(async (walletId) => {
        const wallet = await this.walletRepo.findByIdAndUser(walletId, userId, client);
        if (!wallet) {
          throw new NotFoundError(`Wallet with ID ${walletId} not found`);
        }
      }),
    ]);
  }

  private async createMirror(
    userId: number,
    primary: Transaction,
    client: PoolClient
  ): Promise<Transaction> {
    const mirror = await this.transactionRepo.create(userId, mirrorOf(primary), client);
    return await this.transactionRepo.setRelated(primary.id, mirror.id, client);
  }

  /**
   * Keep the mirrored record in step with its primary after an update:
   * rewrite it, create it when the type became a transfer, drop it otherwise
   */
  private async syncMirror(
    userId: number,
    updated: Transaction,
    client: PoolClient
  ): Promise<Transaction> {
    const mirrorId = updated.relatedTransactionId;

    if (isTransfer(updated.type)) {
      if (mirrorId === null) {
        return await this.createMirror(userId, updated, client);
      }
      await this.transactionRepo.update(mirrorId, mirrorOf(updated), client);
      return updated;
    }

    if (mirrorId === null) {
      return updated;
    }
    const unlinked = await this.transactionRepo.setRelated(updated.id, null, client);
    await this.transactionRepo.delete(mirrorId, client);
    return unlinked;
  }

  private record(operation: LedgerOperation, type: TransactionType): void {
    this.metrics.incrementCounter('ledger_operations_total', 1, { operation, type });
  }
}
