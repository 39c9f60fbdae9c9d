import { OWNER_DOMAINS } from '@/constants/transactions';
import { Portfolio, PortfolioInput, PortfolioPosition } from '@/models';
import { OwnerService } from './owner.service';

/**
 * Portfolio Service
 * Portfolios track quantity and cost basis per instrument
 */
export class PortfolioService extends OwnerService<Portfolio, PortfolioInput, PortfolioPosition> {
  protected readonly domain = OWNER_DOMAINS.PORTFOLIO;
  protected readonly label = 'Portfolio';
}
