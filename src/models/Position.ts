/**
 * Identifies one ledger row: an instrument held by a portfolio or a wallet
 */
export interface PositionKey {
  ownerId: number;
  instrumentId: number;
}

/**
 * Fields shared by both ledgers. Every numeric field is a signed decimal
 * string (PostgreSQL NUMERIC).
 */
export interface Position extends PositionKey {
  id: number;
  quantity: string;
  buyOrders: string;
  sellOrders: string;
}

export type WalletPosition = Position;

export interface PortfolioPosition extends Position {
  /** Cost basis */
  amount: string;
}

/**
 * A position joined with its owner's display name
 */
export type OwnedPosition<P extends Position> = P & { ownerName: string };
