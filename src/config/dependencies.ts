/**
 * Dependency Container
 * Instantiates and wires all repositories and services
 *
 * This is the single source of truth for dependency injection.
 * All concrete implementations are created here and injected into services.
 */

// Repository implementations
import { PortfolioRepository } from '@/repositories/portfolio.repository';
import { WalletRepository } from '@/repositories/wallet.repository';
import { PortfolioPositionRepository } from '@/repositories/portfolioPosition.repository';
import { WalletPositionRepository } from '@/repositories/walletPosition.repository';
import { TransactionRepository } from '@/repositories/transaction.repository';

// Service implementations
import { DistributionService } from '@/services/distribution.service';
import { TransactionService } from '@/services/transaction.service';
import { PortfolioService } from '@/services/portfolio.service';
import { WalletService } from '@/services/wallet.service';

import { metrics } from '@/adapters/metrics/MetricsFactory';

// ============================================================================
// REPOSITORIES
// ============================================================================

export const portfolioRepository = new PortfolioRepository();
export const walletRepository = new WalletRepository();
export const portfolioPositionRepository = new PortfolioPositionRepository();
export const walletPositionRepository = new WalletPositionRepository();
export const transactionRepository = new TransactionRepository();

// ============================================================================
// SERVICES
// ============================================================================

/**
 * Distribution Service
 * Instrument holdings across a user's portfolios and wallets
 */
export const distributionService = new DistributionService(
  portfolioPositionRepository,
  walletPositionRepository
);

/**
 * Transaction Service
 * Create, update, delete and execute ledger transactions
 */
export const transactionService = new TransactionService(
  transactionRepository,
  portfolioRepository,
  walletRepository,
  portfolioPositionRepository,
  walletPositionRepository,
  distributionService,
  metrics
);

export const portfolioService = new PortfolioService(
  portfolioRepository,
  portfolioPositionRepository,
  transactionRepository,
  distributionService
);

export const walletService = new WalletService(
  walletRepository,
  walletPositionRepository,
  transactionRepository,
  distributionService
);
