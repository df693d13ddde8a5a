/**
 * Deposit Sync
 * Credits confirmed on-chain receives to the users owning the receiving address
 */

import type { AccountsConfig } from '../config/accounts-config.ts';
import type { IAccountDirectory } from '../interfaces/account.interface.ts';
import type { LedgerRecord } from '../interfaces/ledger.interface.ts';
import type { INodeClient, WalletTransaction } from '../interfaces/node.interface.ts';
import type { Logger } from '../utils/logger.ts';
import { silentLogger } from '../utils/logger.ts';

import { KeyedMutex } from './keyed-mutex.ts';
import type { Ledger } from './ledger.ts';

export interface DepositSyncOptions {
  node: INodeClient;
  ledger: Ledger;
  accounts: IAccountDirectory;
  config: Pick<AccountsConfig, 'depositConfirmations'>;
  logger?: Logger | undefined;
}

export interface SyncWindow {
  /** Wallet transactions to read. Defaults to 100. */
  count?: number | undefined;
  skip?: number | undefined;
}

export class DepositSync {
  private readonly node: INodeClient;
  private readonly ledger: Ledger;
  private readonly accounts: IAccountDirectory;
  private readonly config: Pick<AccountsConfig, 'depositConfirmations'>;
  private readonly logger: Logger;
  private readonly lock = new KeyedMutex();

  constructor(options: DepositSyncOptions) {
    this.node = options.node;
    this.ledger = options.ledger;
    this.accounts = options.accounts;
    this.config = options.config;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Record deposits not yet in the ledger and return the new records.
   * Running it again over the same window records nothing.
   */
  sync(window: SyncWindow = {}): Promise<LedgerRecord[]> {
    return this.lock.runExclusive('deposits', async () => {
      const transactions = await this.node.listTransactions(
        window.count ?? 100,
        window.skip ?? 0,
      );

      const recorded: LedgerRecord[] = [];
      for (const transaction of transactions) {
        if (!this.isCreditable(transaction) || transaction.address === undefined) continue;

        const owner = await this.accounts.getAddress(transaction.address);
        if (!owner || owner.userId === null) continue;

        const related = await this.ledger.findByExternalTxId(transaction.txid);
        if (alreadyRecorded(related, transaction) || isPayoutChange(related, transaction)) {
          continue;
        }

        recorded.push(
          await this.ledger.recordOnChainReceive(
            owner.userId,
            transaction.amount,
            transaction.address,
            transaction.txid,
            transaction.vout,
          ),
        );
      }

      this.logger.info('Deposit sync finished', {
        scanned: transactions.length,
        recorded: recorded.length,
      });
      return recorded;
    });
  }

  private isCreditable(transaction: WalletTransaction): boolean {
    return transaction.category === 'receive' &&
      transaction.amount > 0 &&
      transaction.confirmations > 0 &&
      transaction.confirmations >= this.config.depositConfirmations;
  }
}

/**
 * An output is credited once, whoever owns its address now
 */
function alreadyRecorded(related: LedgerRecord[], transaction: WalletTransaction): boolean {
  return related.some((record) =>
    record.type === 'on-chain-receive' && record.outputIndex === transaction.vout
  );
}

/**
 * Outputs of our own payouts other than the destination are change
 * already netted into the payer's debit
 */
function isPayoutChange(related: LedgerRecord[], transaction: WalletTransaction): boolean {
  return related.some((record) =>
    record.type === 'on-chain-send' && record.counterpartyAddress !== transaction.address
  );
}
