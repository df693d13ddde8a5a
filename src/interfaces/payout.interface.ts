/**
 * Payout Workflow Types
 */

import type { LedgerRecord } from './ledger.interface.ts';
import type { BuiltTransaction } from './transaction.interface.ts';

export enum PayoutState {
  CREATED = 'created',
  BUILT = 'built',
  SIGNED = 'signed',
  BROADCAST = 'broadcast',
  RECORDED = 'recorded',
  FAILED = 'failed',
}

export enum PayoutFailureKind {
  INSUFFICIENT_BALANCE = 'InsufficientBalance',
  INSUFFICIENT_FUNDS = 'InsufficientFunds',
  NO_CHANGE_ADDRESS = 'NoChangeAddress',
  INVALID_REQUEST = 'InvalidRequest',
  BUILD_FAILED = 'BuildFailed',
  SIGNING_FAILED = 'SigningFailed',
  BROADCAST_FAILED = 'BroadcastFailed',
  LEDGER_INCONSISTENCY = 'LedgerInconsistency',
}

export interface PayoutRequest {
  userId: string;
  destination: string;
  /** Satoshis */
  amount: number;
  /** Overrides the configured transaction fee */
  fee?: number | undefined;
}

/**
 * In-flight transaction threaded through the workflow steps.
 * Each step returns a new value; nothing is kept between payouts.
 */
export interface PendingTransaction {
  readonly request: Readonly<PayoutRequest>;
  readonly fee: number;
  readonly built: BuiltTransaction;
  readonly signedHex?: string | undefined;
  readonly txid?: string | undefined;
}

export interface PayoutSuccess {
  ok: true;
  txid: string;
  record: LedgerRecord;
  transaction: BuiltTransaction;
  states: PayoutState[];
}

export interface PayoutFailure {
  ok: false;
  kind: PayoutFailureKind;
  message: string;
  /** State the workflow was in when it failed */
  state: PayoutState;
  states: PayoutState[];
  /** Set when the transaction reached the network (LedgerInconsistency) */
  txid?: string | undefined;
  cause?: unknown;
}

export type PayoutResult = PayoutSuccess | PayoutFailure;

/**
 * Called when a broadcast transaction could not be recorded
 */
export type ReconciliationHandler = (failure: PayoutFailure & {
  txid: string;
  request: PayoutRequest;
}) => void;
