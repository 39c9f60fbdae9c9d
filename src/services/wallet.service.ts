import { OWNER_DOMAINS } from '@/constants/transactions';
import { Wallet, WalletInput, WalletPosition } from '@/models';
import { OwnerService } from './owner.service';

/**
 * Wallet Service
 * Wallets track custody quantities only
 */
export class WalletService extends OwnerService<Wallet, WalletInput, WalletPosition> {
  protected readonly domain = OWNER_DOMAINS.WALLET;
  protected readonly label = 'Wallet';
}
