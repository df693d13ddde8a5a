/**
 * Account Service
 * Account and address bookkeeping around the ledger
 */

import type { AccountsConfig } from '../config/accounts-config.ts';
import {
  AccountsError,
  DuplicateAccountError,
  InvalidAddressError,
  UnknownAccountError,
} from '../errors/index.ts';
import type { Address, IAccountDirectory, User } from '../interfaces/account.interface.ts';
import type { LedgerRecord } from '../interfaces/ledger.interface.ts';
import type { INodeClient } from '../interfaces/node.interface.ts';
import type { Logger } from '../utils/logger.ts';
import { silentLogger } from '../utils/logger.ts';

import type { Ledger } from './ledger.ts';

export interface AccountServiceOptions {
  accounts: IAccountDirectory;
  node: INodeClient;
  ledger: Ledger;
  config: Pick<AccountsConfig, 'autoCreateAddress'>;
  logger?: Logger | undefined;
}

export class AccountService {
  private readonly accounts: IAccountDirectory;
  private readonly node: INodeClient;
  private readonly ledger: Ledger;
  private readonly config: Pick<AccountsConfig, 'autoCreateAddress'>;
  private readonly logger: Logger;

  constructor(options: AccountServiceOptions) {
    this.accounts = options.accounts;
    this.node = options.node;
    this.ledger = options.ledger;
    this.config = options.config;
    this.logger = options.logger ?? silentLogger;
  }

  getAccount(name: string): Promise<User | null> {
    return this.accounts.findUserByName(name);
  }

  findAccount(userId: string): Promise<User | null> {
    return this.accounts.getUser(userId);
  }

  /**
   * Create an account; with `autoCreateAddress` it also gets its first address
   */
  async createAccount(name: string): Promise<User> {
    const trimmed = name.trim();
    if (trimmed === '') {
      throw new AccountsError('Account name must not be empty', 'INVALID_ACCOUNT_NAME');
    }
    if (await this.accounts.findUserByName(trimmed)) {
      throw new DuplicateAccountError(trimmed);
    }

    const user = await this.accounts.createUser(trimmed);
    this.logger.info('Created account', { userId: user.id, name: user.name });

    if (this.config.autoCreateAddress) {
      await this.createAddress(user.id);
    }
    return user;
  }

  async getOrCreateAccount(name: string): Promise<User> {
    return (await this.accounts.findUserByName(name.trim())) ?? this.createAccount(name);
  }

  /**
   * Ask the node for a fresh address. Without a user it stays a pool-only address.
   */
  async createAddress(userId: string | null = null): Promise<Address> {
    if (userId !== null) {
      await this.requireUser(userId);
    }
    const address = await this.node.getNewAddress();
    const saved = await this.accounts.saveAddress(address, userId);
    this.logger.info('Created address', { address, userId });
    return saved;
  }

  async setAddressUser(userId: string, address: string): Promise<Address> {
    await this.requireUser(userId);
    if (!(await this.accounts.getAddress(address))) {
      throw new InvalidAddressError(address);
    }
    return this.accounts.saveAddress(address, userId);
  }

  addresses(userId: string): Promise<Address[]> {
    return this.accounts.listAddresses(userId);
  }

  async balance(userId: string): Promise<number> {
    await this.requireUser(userId);
    return this.ledger.balance(userId);
  }

  /**
   * Move satoshis between two accounts without touching the chain
   */
  async transfer(fromUserId: string, toUserId: string, amount: number): Promise<LedgerRecord> {
    await this.requireUser(fromUserId);
    await this.requireUser(toUserId);
    return this.ledger.recordInternalTransfer(fromUserId, toUserId, amount);
  }

  private async requireUser(userId: string): Promise<User> {
    const user = await this.accounts.getUser(userId);
    if (!user) {
      throw new UnknownAccountError(userId);
    }
    return user;
  }
}
