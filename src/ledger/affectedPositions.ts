import { OWNER_DOMAINS, OwnerDomain } from '@/constants/transactions';
import { PositionKey, TransactionWrite } from '@/models';
import { comparePositionKeys, positionKeyId } from './legs';

type AffectedSource = Pick<
  TransactionWrite,
  'instrumentId' | 'instrument2Id' | 'portfolioId' | 'portfolio2Id' | 'walletId' | 'wallet2Id'
>;

function ownerIds(transaction: AffectedSource, domain: OwnerDomain): Array<number | null> {
  return domain === OWNER_DOMAINS.PORTFOLIO
    ? [transaction.portfolioId, transaction.portfolio2Id]
    : [transaction.walletId, transaction.wallet2Id];
}

/**
 * (owner, instrument) pairs the given transactions reference in one domain:
 * owner ids × instrument ids per transaction, without nulls, deduplicated and
 * sorted by owner then instrument.
 *
 * Reports what a call may have changed; it does not consult the mutators.
 */
export function affectedPositions(
  transactions: readonly AffectedSource[],
  domain: OwnerDomain
): PositionKey[] {
  const pairs = new Map<string, PositionKey>();

  for (const transaction of transactions) {
    const instruments = [transaction.instrumentId, transaction.instrument2Id];
    for (const ownerId of ownerIds(transaction, domain)) {
      if (ownerId === null) continue;
      for (const instrumentId of instruments) {
        if (instrumentId === null) continue;
        const key = { ownerId, instrumentId };
        pairs.set(positionKeyId(key), key);
      }
    }
  }

  return [...pairs.values()].sort(comparePositionKeys);
}
