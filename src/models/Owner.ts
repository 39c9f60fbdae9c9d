/**
 * Portfolio: an investment account tracking quantity and cost basis
 */
export interface Portfolio {
  id: number;
  userId: number;
  name: string;
  market: string | null;
  comment: string | null;
}

export interface PortfolioInput {
  name: string;
  market: string | null;
  comment: string | null;
}

/**
 * Wallet: a custody account tracking quantity only
 */
export interface Wallet {
  id: number;
  userId: number;
  name: string;
  comment: string | null;
}

export interface WalletInput {
  name: string;
  comment: string | null;
}

export type Owner = Portfolio | Wallet;
