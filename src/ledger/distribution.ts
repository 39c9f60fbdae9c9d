import { OWNER_DOMAINS, OwnerDomain } from '@/constants/transactions';
import { Distribution, OwnedPosition, Position } from '@/models';
import { ZERO, percentageOf, toDecimal, toDecimalString } from '@/utils/decimal';

type DistributedPosition = OwnedPosition<Position> & { amount?: string };

/**
 * Splits the holdings of one instrument across a user's owners.
 *
 * Each owner's share is quantity / totalQuantity × 100 rounded to two decimals,
 * all zero when the total is zero. Cost basis is summed in the portfolio
 * domain only. Entries are ordered by owner id.
 */
export function calculateDistribution(
  instrumentId: number,
  domain: OwnerDomain,
  positions: readonly DistributedPosition[]
): Distribution {
  const withAmount = domain === OWNER_DOMAINS.PORTFOLIO;
  const rows = [...positions].sort((a, b) => a.ownerId - b.ownerId);

  const totalQuantity = rows.reduce((sum, row) => sum.plus(toDecimal(row.quantity)), ZERO);
  const totalAmount = rows.reduce((sum, row) => sum.plus(toDecimal(row.amount ?? null)), ZERO);

  return {
    instrumentId,
    domain,
    totalQuantity: toDecimalString(totalQuantity),
    totalAmount: withAmount ? toDecimalString(totalAmount) : null,
    entries: rows.map((row) => ({
      ownerId: row.ownerId,
      ownerName: row.ownerName,
      quantity: toDecimalString(toDecimal(row.quantity)),
      amount: withAmount ? toDecimalString(toDecimal(row.amount ?? null)) : null,
      percentage: percentageOf(toDecimal(row.quantity), totalQuantity),
    })),
  };
}
