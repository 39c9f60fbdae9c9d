import { walletService } from '@/config/dependencies';
import { walletPayloadSchema } from '@/validators/owner.validator';
import { createOwnerController } from './owners.controller';

/**
 * Wallets Controller
 * /api/v1/wallets
 */
export const walletsController = createOwnerController(walletService, walletPayloadSchema, 'wallet');
