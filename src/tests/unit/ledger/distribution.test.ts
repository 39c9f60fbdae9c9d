import { calculateDistribution } from '@/ledger/distribution';
import { OWNER_DOMAINS } from '@/constants/transactions';

const position = (ownerId: number, ownerName: string, quantity: string, amount: string) => ({
  id: ownerId * 10,
  ownerId,
  ownerName,
  instrumentId: 1,
  quantity,
  amount,
  buyOrders: '0',
  sellOrders: '0',
});

describe('calculateDistribution', () => {
  it('should split holdings by quantity and order entries by owner id', () => {
    const distribution = calculateDistribution(1, OWNER_DOMAINS.PORTFOLIO, [
      position(3, 'Trading', '10', '400'),
      position(1, 'Long term', '5', '100'),
    ]);

    expect(distribution).toEqual({
      instrumentId: 1,
      domain: 'portfolio',
      totalQuantity: '15',
      totalAmount: '500',
      entries: [
        { ownerId: 1, ownerName: 'Long term', quantity: '5', amount: '100', percentage: 33.33 },
        { ownerId: 3, ownerName: 'Trading', quantity: '10', amount: '400', percentage: 66.67 },
      ],
    });
  });

  it('should leave amounts out of the wallet domain', () => {
    const distribution = calculateDistribution(1, OWNER_DOMAINS.WALLET, [
      { id: 1, ownerId: 4, ownerName: 'Cold storage', instrumentId: 1, quantity: '2', buyOrders: '0', sellOrders: '0' },
    ]);

    expect(distribution.totalAmount).toBeNull();
    expect(distribution.entries).toEqual([
      { ownerId: 4, ownerName: 'Cold storage', quantity: '2', amount: null, percentage: 100 },
    ]);
  });

  it('should report zero percentages when the total is zero', () => {
    const distribution = calculateDistribution(1, OWNER_DOMAINS.PORTFOLIO, [
      position(1, 'Long', '3', '0'),
      position(2, 'Short', '-3', '0'),
    ]);

    expect(distribution.totalQuantity).toBe('0');
    expect(distribution.entries.map((entry) => entry.percentage)).toEqual([0, 0]);
  });

  it('should keep percentages summing to 100 within rounding', () => {
    const distribution = calculateDistribution(1, OWNER_DOMAINS.PORTFOLIO, [
      position(1, 'A', '1', '0'),
      position(2, 'B', '1', '0'),
      position(3, 'C', '1', '0'),
    ]);

    const sum = distribution.entries.reduce((total, entry) => total + entry.percentage, 0);
    expect(distribution.entries.map((entry) => entry.percentage)).toEqual([33.33, 33.33, 33.33]);
    expect(Math.abs(sum - 100)).toBeLessThanOrEqual(0.01 * distribution.entries.length);
  });

  it('should be empty without positions', () => {
    expect(calculateDistribution(9, OWNER_DOMAINS.WALLET, [])).toEqual({
      instrumentId: 9,
      domain: 'wallet',
      totalQuantity: '0',
      totalAmount: null,
      entries: [],
    });
  });
});
