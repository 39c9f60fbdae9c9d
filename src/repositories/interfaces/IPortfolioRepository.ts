import { Portfolio, PortfolioInput } from '@/models';
import { IOwnerRepository } from './IOwnerRepository';

export type IPortfolioRepository = IOwnerRepository<Portfolio, PortfolioInput>;
