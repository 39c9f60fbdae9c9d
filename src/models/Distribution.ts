import { OwnerDomain } from '@/constants/transactions';

export interface DistributionEntry {
  ownerId: number;
  ownerName: string;
  quantity: string;
  /** Cost basis; null in the wallet domain */
  amount: string | null;
  /** Share of totalQuantity, 0-100 with two decimals */
  percentage: number;
}

export interface Distribution {
  instrumentId: number;
  domain: OwnerDomain;
  totalQuantity: string;
  /** Sum of cost basis; null in the wallet domain */
  totalAmount: string | null;
  entries: DistributionEntry[];
}

export interface InstrumentDistribution {
  instrumentId: number;
  portfolios: Distribution;
  wallets: Distribution;
}
