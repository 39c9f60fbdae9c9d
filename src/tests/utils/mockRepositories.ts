/**
 * Mock Repository Factories
 * Every method is jest.fn() and can be configured with .mockResolvedValue()
 */

import {
  IPortfolioPositionRepository,
  IPortfolioRepository,
  ITransactionRepository,
  IWalletPositionRepository,
} from '@/repositories/interfaces';
import { PortfolioPosition, Transaction } from '@/models';
import { TRANSACTION_TYPES } from '@/constants/transactions';

export function createMockPortfolioRepository(): jest.Mocked<IPortfolioRepository> {
  return {
    findByIdAndUser: jest.fn(),
    listByUser: jest.fn(),
    existsByName: jest.fn(),
    create: jest.fn(),
    update: jest.fn(),
    delete: jest.fn(),
  };
}

export function createMockPortfolioPositionRepository(): jest.Mocked<IPortfolioPositionRepository> {
  return {
    findForUpdate: jest.fn(),
    insert: jest.fn(),
    save: jest.fn(),
    findByKey: jest.fn(),
    findByOwner: jest.fn(),
    findByInstrumentAndUser: jest.fn(),
    findInstrumentIds: jest.fn(),
    delete: jest.fn(),
  };
}

export function createMockWalletPositionRepository(): jest.Mocked<IWalletPositionRepository> {
  return {
    findForUpdate: jest.fn(),
    insert: jest.fn(),
    save: jest.fn(),
    findByKey: jest.fn(),
    findByOwner: jest.fn(),
    findByInstrumentAndUser: jest.fn(),
    findInstrumentIds: jest.fn(),
    delete: jest.fn(),
  };
}

export function createMockTransactionRepository(): jest.Mocked<ITransactionRepository> {
  return {
    create: jest.fn(),
    update: jest.fn(),
    setRelated: jest.fn(),
    delete: jest.fn(),
    findById: jest.fn(),
    findByIdForUpdate: jest.fn(),
    listByUser: jest.fn(),
    findByPosition: jest.fn(),
    countByOwner: jest.fn(),
  };
}

/**
 * Zero portfolio position with the given overrides
 */
export function portfolioPosition(overrides: Partial<PortfolioPosition> = {}): PortfolioPosition {
  return {
    id: 1,
    ownerId: 1,
    instrumentId: 1,
    quantity: '0',
    amount: '0',
    buyOrders: '0',
    sellOrders: '0',
    ...overrides,
  };
}

/**
 * Executed Input of 1 unit, overridable field by field
 */
export function storedTransaction(overrides: Partial<Transaction> = {}): Transaction {
  return {
    id: 1,
    userId: 1,
    type: TRANSACTION_TYPES.INPUT,
    date: new Date('2024-03-01T10:00:00.000Z'),
    instrumentId: 1,
    instrument2Id: null,
    quantity: '1',
    quantity2: null,
    price: null,
    priceUsd: null,
    order: false,
    comment: null,
    portfolioId: 1,
    portfolio2Id: null,
    walletId: null,
    wallet2Id: null,
    relatedTransactionId: null,
    isMirror: false,
    transferredAmount: null,
    ...overrides,
  };
}
