import { OWNER_DOMAINS, OwnerDomain } from '@/constants/transactions';
import { Distribution, InstrumentDistribution } from '@/models';
import {
  IPortfolioPositionRepository,
  IWalletPositionRepository,
} from '@/repositories/interfaces';
import { calculateDistribution } from '@/ledger/distribution';

/**
 * Distribution Service
 * How one instrument is spread across a user's portfolios and wallets
 */
export class DistributionService {
  constructor(
    private portfolioPositionRepo: IPortfolioPositionRepository,
    private walletPositionRepo: IWalletPositionRepository
  ) {}

  async distribute(
    instrumentId: number,
    userId: number,
    domain: OwnerDomain
  ): Promise<Distribution> {
    const positions =
      domain === OWNER_DOMAINS.PORTFOLIO
        ? await this.portfolioPositionRepo.findByInstrumentAndUser(instrumentId, userId)
        : await this.walletPositionRepo.findByInstrumentAndUser(instrumentId, userId);

    return calculateDistribution(instrumentId, domain, positions);
  }

  /**
   * Instruments the user holds anywhere, portfolios and wallets merged
   */
  async usedInstruments(userId: number): Promise<number[]> {
    const [portfolioIds, walletIds] = await Promise.all([
      this.portfolioPositionRepo.findInstrumentIds(userId),
      this.walletPositionRepo.findInstrumentIds(userId),
    ]);
    return [...new Set([...portfolioIds, ...walletIds])].sort((a, b) => a - b);
  }

  async getDistribution(instrumentId: number, userId: number): Promise<InstrumentDistribution> {
    const [portfolios, wallets] = await Promise.all([
      this.distribute(instrumentId, userId, OWNER_DOMAINS.PORTFOLIO),
      this.distribute(instrumentId, userId, OWNER_DOMAINS.WALLET),
    ]);

    return { instrumentId, portfolios, wallets };
  }
}
