import { Wallet, WalletInput } from '@/models';
import { IOwnerRepository } from './IOwnerRepository';

export type IWalletRepository = IOwnerRepository<Wallet, WalletInput>;
