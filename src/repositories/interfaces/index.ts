/**
 * Repository Interfaces
 * Barrel export for all repository interface contracts
 */

export * from './IOwnerRepository';
export * from './IPortfolioRepository';
export * from './IWalletRepository';
export * from './IPositionRepository';
export * from './ITransactionRepository';
