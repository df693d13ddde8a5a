/**
 * Ledger
 * Derives per-user balances from append-only records and appends new value
 * movements under a per-user lock
 */

import { randomUUID } from 'node:crypto';

import { InsufficientBalanceError, InvalidTransferError } from '../errors/index.ts';
import type {
  ILedgerStore,
  LedgerRecord,
  LedgerRecordType,
} from '../interfaces/ledger.interface.ts';
import { assertNonNegativeSatoshis, assertPositiveSatoshis } from '../utils/amount.ts';
import type { Logger } from '../utils/logger.ts';
import { silentLogger } from '../utils/logger.ts';

import { KeyedMutex } from './keyed-mutex.ts';

/**
 * Effect of a record on the given user's balance, in satoshis
 */
export function signedAmountFor(record: LedgerRecord, userId: string): number {
  let delta = 0;
  if (record.userId === userId) {
    switch (record.type) {
      case 'internal-transfer':
        delta -= record.amount;
        break;
      case 'on-chain-send':
        delta -= record.amount + record.fee;
        break;
      case 'on-chain-receive':
        delta += record.amount;
        break;
    }
  }
  if (record.counterpartyUserId === userId && record.type === 'internal-transfer') {
    delta += record.amount;
  }
  return delta;
}

/**
 * Balance operations bound to one user while that user's lock is held
 */
export interface LedgerSession {
  readonly userId: string;
  balance(): Promise<number>;
  recordInternalTransfer(toUserId: string, amount: number): Promise<LedgerRecord>;
  recordOnChainSend(
    amount: number,
    fee: number,
    destinationAddress: string,
    externalTxId: string,
  ): Promise<LedgerRecord>;
}

export interface LedgerOptions {
  store: ILedgerStore;
  logger?: Logger | undefined;
  now?: (() => Date) | undefined;
  generateId?: (() => string) | undefined;
}

interface NewRecord {
  type: LedgerRecordType;
  userId: string;
  amount: number;
  fee?: number;
  counterpartyUserId?: string | null;
  counterpartyAddress?: string | null;
  externalTxId?: string | null;
  outputIndex?: number | null;
}

export class Ledger {
  private readonly store: ILedgerStore;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private readonly locks = new KeyedMutex();

  constructor(options: LedgerOptions) {
    this.store = options.store;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  async balance(userId: string): Promise<number> {
    const records = await this.store.query({ userId, side: 'any' });
    return records.reduce((sum, record) => sum + signedAmountFor(record, userId), 0);
  }

  /**
   * Every record the user is party to, in append order
   */
  history(userId: string): Promise<LedgerRecord[]> {
    return this.store.query({ userId, side: 'any' });
  }

  /**
   * Records of any user tied to one on-chain transaction
   */
  findByExternalTxId(externalTxId: string): Promise<LedgerRecord[]> {
    return this.store.query({ externalTxId });
  }

  /**
   * Run `fn` while holding the user's lock. Balance checks and appends made
   * through the session cannot interleave with other debits of that user.
   */
  withUserLock<T>(userId: string, fn: (session: LedgerSession) => Promise<T>): Promise<T> {
    return this.locks.runExclusive(`user:${userId}`, () => fn(this.createSession(userId)));
  }

  recordInternalTransfer(
    fromUserId: string,
    toUserId: string,
    amount: number,
  ): Promise<LedgerRecord> {
    return this.withUserLock(
      fromUserId,
      (session) => session.recordInternalTransfer(toUserId, amount),
    );
  }

  recordOnChainSend(
    userId: string,
    amount: number,
    fee: number,
    destinationAddress: string,
    externalTxId: string,
  ): Promise<LedgerRecord> {
    return this.withUserLock(
      userId,
      (session) => session.recordOnChainSend(amount, fee, destinationAddress, externalTxId),
    );
  }

  /**
   * Credit a confirmed deposit. No balance check applies.
   */
  async recordOnChainReceive(
    userId: string,
    amount: number,
    address: string,
    externalTxId: string,
    outputIndex: number,
  ): Promise<LedgerRecord> {
    assertPositiveSatoshis(amount);
    const record = await this.append({
      type: 'on-chain-receive',
      userId,
      amount,
      counterpartyAddress: address,
      externalTxId,
      outputIndex,
    });
    this.logger.info('Recorded deposit', { userId, amount, externalTxId, outputIndex });
    return record;
  }

  private createSession(userId: string): LedgerSession {
    return {
      userId,
      balance: () => this.balance(userId),
      recordInternalTransfer: async (toUserId, amount) => {
        assertPositiveSatoshis(amount);
        if (toUserId === userId) {
          throw new InvalidTransferError(`User ${userId} cannot transfer to itself`);
        }
        await this.assertBalance(userId, amount);
        const record = await this.append({
          type: 'internal-transfer',
          userId,
          amount,
          counterpartyUserId: toUserId,
        });
        this.logger.info('Recorded internal transfer', {
          from: userId,
          to: toUserId,
          amount,
        });
        return record;
      },
      recordOnChainSend: async (amount, fee, destinationAddress, externalTxId) => {
        assertPositiveSatoshis(amount);
        assertNonNegativeSatoshis(fee, 'fee');
        if (!destinationAddress || !externalTxId) {
          throw new InvalidTransferError(
            'On-chain send needs a destination address and transaction id',
          );
        }
        await this.assertBalance(userId, amount + fee);
        const record = await this.append({
          type: 'on-chain-send',
          userId,
          amount,
          fee,
          counterpartyAddress: destinationAddress,
          externalTxId,
        });
        this.logger.info('Recorded on-chain send', {
          userId,
          amount,
          fee,
          destinationAddress,
          externalTxId,
        });
        return record;
      },
    };
  }

  private async assertBalance(userId: string, required: number): Promise<void> {
    const available = await this.balance(userId);
    if (available < required) {
      throw new InsufficientBalanceError(userId, required, available);
    }
  }

  private async append(entry: NewRecord): Promise<LedgerRecord> {
    const record: LedgerRecord = Object.freeze({
      id: this.generateId(),
      type: entry.type,
      userId: entry.userId,
      amount: entry.amount,
      fee: entry.fee ?? 0,
      counterpartyUserId: entry.counterpartyUserId ?? null,
      counterpartyAddress: entry.counterpartyAddress ?? null,
      externalTxId: entry.externalTxId ?? null,
      outputIndex: entry.outputIndex ?? null,
      createdAt: this.now(),
    });
    await this.store.append(record);
    return record;
  }
}
