import { InMemoryLedger } from '@/tests/utils/inMemoryLedger';

/**
 * Shape of '@/config/dependencies' in API suites: the services of one
 * in-memory ledger, plus the ledger itself for seeding and resets
 */
export type MockedDependencies = InMemoryLedger['services'] & { mockLedger: InMemoryLedger };

export type LedgerModule = typeof import('@/tests/utils/inMemoryLedger');

export function apiLedger(): InMemoryLedger {
  return jest.requireMock<MockedDependencies>('@/config/dependencies').mockLedger;
}
