import { PoolClient } from 'pg';
import { OWNER_DOMAINS } from '@/constants/transactions';
import { PortfolioPosition, TransactionWrite, WalletPosition } from '@/models';
import {
  IPortfolioPositionRepository,
  IWalletPositionRepository,
} from '@/repositories/interfaces';
import { affectedPositions } from '@/ledger/affectedPositions';
import { applyPortfolioDelta, planPortfolioChanges, portfolioLegs } from '@/ledger/portfolioMutator';
import { applyWalletDelta, planWalletChanges, walletLegs } from '@/ledger/walletMutator';
import { LedgerEntry } from '@/ledger/types';
import { Decimal, toDecimalString } from '@/utils/decimal';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { PositionResolver } from './positionResolver';

const logger = createLogger('LedgerSession');

export interface AffectedPositions {
  portfolioPositions: PortfolioPosition[];
  walletPositions: WalletPosition[];
}

/**
 * Unit of work over both position ledgers, bound to one database client.
 *
 * apply() resolves every leg of an entry concurrently, plans the arithmetic
 * against the resolved state, then applies the changes in order. Nothing is
 * written until flush(), which the caller runs before committing.
 */
export class LedgerSession {
  readonly portfolios: PositionResolver<PortfolioPosition>;
  readonly wallets: PositionResolver<WalletPosition>;

  constructor(
    portfolioPositionRepo: IPortfolioPositionRepository,
    walletPositionRepo: IWalletPositionRepository,
    client: PoolClient
  ) {
    this.portfolios = new PositionResolver<PortfolioPosition>(portfolioPositionRepo, client);
    this.wallets = new PositionResolver<WalletPosition>(walletPositionRepo, client);
  }

  /**
   * @param cancel - Reverse a previously applied entry
   * @returns Cost basis moved by a portfolio transfer (string), null otherwise
   */
  async apply(entry: LedgerEntry, cancel: boolean): Promise<string | null> {
    await Promise.all([
      ...portfolioLegs(entry).map((key) => this.portfolios.resolve(key)),
      ...walletLegs(entry).map((key) => this.wallets.resolve(key)),
    ]);

    const portfolioPlan = planPortfolioChanges(entry, cancel, (key) => this.portfolios.get(key));
    for (const change of portfolioPlan.changes) {
      this.portfolios.update(change.key, (position) => applyPortfolioDelta(position, change.delta));
    }

    const walletPlan = planWalletChanges(entry, cancel);
    for (const change of walletPlan.changes) {
      this.wallets.update(change.key, (position) => applyWalletDelta(position, change.delta));
    }

    logger.debug(
      {
        type: entry.type,
        cancel,
        portfolioChanges: portfolioPlan.changes.length,
        walletChanges: walletPlan.changes.length,
      },
      'Ledger entry applied'
    );

    return formatTransferred(portfolioPlan.transferredAmount);
  }

  async flush(): Promise<void> {
    await this.portfolios.flush();
    await this.wallets.flush();
  }

  /**
   * Current state of the positions the given transactions reference
   */
  async affected(transactions: readonly TransactionWrite[]): Promise<AffectedPositions> {
    const [portfolioPositions, walletPositions] = await Promise.all([
      this.portfolios.lookup(affectedPositions(transactions, OWNER_DOMAINS.PORTFOLIO)),
      this.wallets.lookup(affectedPositions(transactions, OWNER_DOMAINS.WALLET)),
    ]);
    return { portfolioPositions, walletPositions };
  }
}

function formatTransferred(amount: Decimal | null): string | null {
  return amount === null ? null : toDecimalString(amount);
}
