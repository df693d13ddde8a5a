/**
 * Ledger Type Definitions
 */

export type LedgerRecordType =
  | 'internal-transfer'
  | 'on-chain-send'
  | 'on-chain-receive';

/**
 * Append-only value movement. `amount` and `fee` are non-negative satoshis;
 * the direction follows from `type` and from which side of the record a user is on.
 */
export interface LedgerRecord {
  readonly id: string;
  readonly type: LedgerRecordType;
  /** Owning user: sender of transfers and sends, recipient of receives */
  readonly userId: string;
  readonly amount: number;
  readonly fee: number;
  /** Recipient of an internal transfer */
  readonly counterpartyUserId: string | null;
  /** Destination of a send, receiving address of a receive */
  readonly counterpartyAddress: string | null;
  readonly externalTxId: string | null;
  /** Output index of a receive */
  readonly outputIndex: number | null;
  readonly createdAt: Date;
}

export type LedgerSide = 'owner' | 'counterparty' | 'any';

export interface LedgerFilter {
  userId?: string | undefined;
  /** Which side `userId` must match. Defaults to 'any'. */
  side?: LedgerSide | undefined;
  type?: LedgerRecordType | undefined;
  externalTxId?: string | undefined;
}

/**
 * Append-only persistence for ledger records
 */
export interface ILedgerStore {
  append(record: LedgerRecord): Promise<void>;
  /**
   * Records matching every given filter field, in append order
   */
  query(filter: LedgerFilter): Promise<LedgerRecord[]>;
}
