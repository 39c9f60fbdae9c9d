import { z } from 'zod';
import { LEDGER_LIMITS } from '@/config/businessRules';

const name = z.string().trim().min(1).max(LEDGER_LIMITS.MAX_OWNER_NAME_LENGTH);
const comment = z.string().max(LEDGER_LIMITS.MAX_COMMENT_LENGTH).nullish().transform((value) => value ?? null);

/**
 * POST /portfolios and PUT /portfolios/:id
 */
export const portfolioPayloadSchema = z.object({
  name,
  market: z
    .string()
    .trim()
    .max(LEDGER_LIMITS.MAX_MARKET_LENGTH)
    .nullish()
    .transform((value) => value ?? null),
  comment,
});

/**
 * POST /wallets and PUT /wallets/:id
 */
export const walletPayloadSchema = z.object({
  name,
  comment,
});

/**
 * POST /portfolios/:id/positions and POST /wallets/:id/positions
 */
export const openPositionSchema = z.object({
  instrumentId: z.number().int().positive(),
});

export type PortfolioPayload = z.infer<typeof portfolioPayloadSchema>;
export type WalletPayload = z.infer<typeof walletPayloadSchema>;
