/**
 * Central export point for all models
 * Allows clean imports: import { Transaction, PortfolioPosition } from '@/models'
 */

export * from './Transaction';
export * from './Owner';
export * from './Position';
export * from './Distribution';
