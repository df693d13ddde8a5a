/**
 * Payout Workflow
 * Sequences build → sign → broadcast → record for one payout request
 *
 * created ──► built ──► signed ──► broadcast ──► recorded
 *    │          │          │            │
 *    └──────────┴──────────┴────────────┴──► failed(kind)
 */

import type { AccountsConfig } from '../config/accounts-config.ts';
import { errorMessage, NegativeChangeError } from '../errors/index.ts';
import type { IAccountDirectory } from '../interfaces/account.interface.ts';
import type { INodeClient, UnspentOutput } from '../interfaces/node.interface.ts';
import {
  type PayoutFailure,
  PayoutFailureKind,
  type PayoutRequest,
  type PayoutResult,
  PayoutState,
  type PendingTransaction,
  type ReconciliationHandler,
} from '../interfaces/payout.interface.ts';
import type { IUTXOSelector } from '../interfaces/selector.interface.ts';
import { SelectionFailureReason } from '../interfaces/selector-result.interface.ts';
import type { ITransactionBuilder } from '../interfaces/transaction.interface.ts';
import { outpointKey } from '../selectors/base-selector.ts';
import { LargestFirstSelector } from '../selectors/largest-first.ts';
import { isValidAddress } from '../utils/address-validator.ts';
import type { Logger } from '../utils/logger.ts';
import { silentLogger } from '../utils/logger.ts';

import { KeyedMutex } from './keyed-mutex.ts';
import type { Ledger, LedgerSession } from './ledger.ts';
import { OutpointReservations } from './outpoint-reservations.ts';
import { TransactionBuilder } from './transaction-builder.ts';

export type PayoutConfig = Pick<
  AccountsConfig,
  | 'transactionFee'
  | 'minConfirmations'
  | 'maxInputs'
  | 'verifyRawTransaction'
  | 'reservationTtlMs'
  | 'network'
>;

export interface PayoutWorkflowOptions {
  node: INodeClient;
  ledger: Ledger;
  accounts: IAccountDirectory;
  config: PayoutConfig;
  selector?: IUTXOSelector | undefined;
  builder?: ITransactionBuilder | undefined;
  /** Share between workflows spending the same pool */
  reservations?: OutpointReservations | undefined;
  /** Share between workflows spending the same pool */
  poolLock?: KeyedMutex | undefined;
  logger?: Logger | undefined;
  onReconciliationRequired?: ReconciliationHandler | undefined;
}

type StepOutcome<T> = { ok: true; value: T } | PayoutFailure;

interface SignedStep {
  pending: PendingTransaction;
  signedHex: string;
  reservationId: string;
}

const POOL_LOCK_KEY = 'pool';

/**
 * Pays a user's balance out to an external address from the shared pool
 *
 * @remarks
 * The user's ledger lock is held for the whole run, so concurrent payouts and
 * transfers of the same user cannot both pass the balance check. The pool
 * lock covers unspent fetch through signing, and the selected outpoints stay
 * reserved until the broadcast has an answer, so no other payout can pick
 * them in between.
 *
 * Every outcome is a {@link PayoutResult}. The only exception is
 * {@link NegativeChangeError}, which signals a bug and is rethrown.
 */
export class PayoutWorkflow {
  private readonly node: INodeClient;
  private readonly ledger: Ledger;
  private readonly accounts: IAccountDirectory;
  private readonly config: PayoutConfig;
  private readonly selector: IUTXOSelector;
  private readonly builder: ITransactionBuilder;
  private readonly reservations: OutpointReservations;
  private readonly poolLock: KeyedMutex;
  private readonly logger: Logger;
  private readonly onReconciliationRequired: ReconciliationHandler | undefined;

  constructor(options: PayoutWorkflowOptions) {
    this.node = options.node;
    this.ledger = options.ledger;
    this.accounts = options.accounts;
    this.config = options.config;
    this.logger = options.logger ?? silentLogger;
    this.selector = options.selector ?? new LargestFirstSelector();
    this.builder = options.builder ??
      new TransactionBuilder({ node: options.node, logger: this.logger });
    this.reservations = options.reservations ??
      new OutpointReservations({ ttlMs: options.config.reservationTtlMs });
    this.poolLock = options.poolLock ?? new KeyedMutex();
    this.onReconciliationRequired = options.onReconciliationRequired;
  }

  async execute(request: PayoutRequest): Promise<PayoutResult> {
    const states: PayoutState[] = [PayoutState.CREATED];
    const fee = request.fee ?? this.config.transactionFee;

    const invalid = this.validateRequest(request, fee);
    if (invalid) {
      return this.fail(states, PayoutFailureKind.INVALID_REQUEST, invalid);
    }

    const user = await this.accounts.getUser(request.userId);
    if (!user) {
      return this.fail(
        states,
        PayoutFailureKind.INVALID_REQUEST,
        `Unknown account: ${request.userId}`,
      );
    }

    return this.ledger.withUserLock(
      request.userId,
      (session) => this.run(request, fee, session, states),
    );
  }

  private async run(
    request: PayoutRequest,
    fee: number,
    session: LedgerSession,
    states: PayoutState[],
  ): Promise<PayoutResult> {
    const required = request.amount + fee;
    const balance = await session.balance();
    if (balance < required) {
      return this.fail(
        states,
        PayoutFailureKind.INSUFFICIENT_BALANCE,
        `Balance ${balance} is below amount plus fee ${required}`,
      );
    }

    const addresses = await this.accounts.listAddresses(request.userId);
    const change = addresses.find((entry) => entry.address !== request.destination);
    if (!change) {
      return this.fail(
        states,
        PayoutFailureKind.NO_CHANGE_ADDRESS,
        `User ${request.userId} has no address to receive change`,
      );
    }

    const signed = await this.poolLock.runExclusive(
      POOL_LOCK_KEY,
      () => this.buildAndSign(request, fee, change.address, states),
    );
    if (!signed.ok) {
      return signed;
    }
    const { pending, signedHex, reservationId } = signed.value;

    // Broadcast runs to a definitive answer; it is never raced or retried here
    let txid: string;
    try {
      txid = await this.node.sendRawTransaction(signedHex);
    } catch (error) {
      this.reservations.release(reservationId);
      return this.fail(
        states,
        PayoutFailureKind.BROADCAST_FAILED,
        `Broadcast failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }
    const broadcast: PendingTransaction = { ...pending, txid };
    this.transition(states, PayoutState.BROADCAST, { txid });

    try {
      const record = await session.recordOnChainSend(
        request.amount,
        fee,
        request.destination,
        txid,
      );
      this.transition(states, PayoutState.RECORDED, { txid, recordId: record.id });
      return {
        ok: true,
        txid,
        record,
        transaction: broadcast.built,
        states: [...states],
      };
    } catch (error) {
      return this.reconciliationRequired(request, states, txid, error);
    }
  }

  /**
   * created → built → signed, under the pool lock
   */
  private async buildAndSign(
    request: PayoutRequest,
    fee: number,
    changeAddress: string,
    states: PayoutState[],
  ): Promise<StepOutcome<SignedStep>> {
    const built = await this.buildStep(request, fee, changeAddress, states);
    if (!built.ok) {
      return built;
    }

    let reservationId: string;
    try {
      reservationId = this.reservations.reserve(
        built.value.built.outpoints.map((outpoint) => outpointKey(outpoint)),
      );
    } catch (error) {
      return this.fail(
        states,
        PayoutFailureKind.BUILD_FAILED,
        `Could not reserve inputs: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    try {
      const signedHex = await this.node.signRawTransaction(built.value.built.rawHex);
      this.transition(states, PayoutState.SIGNED);
      return {
        ok: true,
        value: { pending: { ...built.value, signedHex }, signedHex, reservationId },
      };
    } catch (error) {
      this.reservations.release(reservationId);
      return this.fail(
        states,
        PayoutFailureKind.SIGNING_FAILED,
        `Signing failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  private async buildStep(
    request: PayoutRequest,
    fee: number,
    changeAddress: string,
    states: PayoutState[],
  ): Promise<StepOutcome<PendingTransaction>> {
    const target = request.amount + fee;

    let unspent: UnspentOutput[];
    try {
      unspent = await this.node.listUnspent();
    } catch (error) {
      return this.fail(
        states,
        PayoutFailureKind.BUILD_FAILED,
        `Could not list unspent outputs: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    const selection = this.selector.select(unspent, {
      target,
      minConfirmations: this.config.minConfirmations,
      maxInputs: this.config.maxInputs,
      excludeOutpoints: this.reservations.reservedOutpoints(),
    });
    if (!selection.success) {
      const kind = selection.reason === SelectionFailureReason.INVALID_OPTIONS
        ? PayoutFailureKind.INVALID_REQUEST
        : PayoutFailureKind.INSUFFICIENT_FUNDS;
      return this.fail(states, kind, selection.message);
    }

    try {
      const built = await this.builder.build({
        inputs: selection.inputs,
        destination: request.destination,
        amount: request.amount,
        fee,
        changeAddress,
      });
      if (this.config.verifyRawTransaction) {
        await this.builder.verify(built);
      }
      this.transition(states, PayoutState.BUILT, {
        inputs: built.inputs.length,
        total: built.total,
        change: built.change,
      });
      return { ok: true, value: { request, fee, built } };
    } catch (error) {
      if (error instanceof NegativeChangeError) {
        this.logger.error('Selected inputs do not cover amount plus fee', {
          userId: request.userId,
          total: error.total,
          amount: error.amount,
          fee: error.fee,
        });
        throw error;
      }
      return this.fail(
        states,
        PayoutFailureKind.BUILD_FAILED,
        `Could not build transaction: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  private reconciliationRequired(
    request: PayoutRequest,
    states: PayoutState[],
    txid: string,
    error: unknown,
  ): PayoutFailure {
    const failure = this.fail(
      states,
      PayoutFailureKind.LEDGER_INCONSISTENCY,
      `Transaction ${txid} was broadcast but could not be recorded: ${errorMessage(error)}`,
      { txid, cause: error },
    );

    this.logger.error('Broadcast payout is missing from the ledger; reconcile manually', {
      userId: request.userId,
      destination: request.destination,
      amount: request.amount,
      txid,
      error: errorMessage(error),
    });

    if (this.onReconciliationRequired) {
      try {
        this.onReconciliationRequired({ ...failure, txid, request });
      } catch (handlerError) {
        this.logger.error('Reconciliation handler threw', {
          txid,
          error: errorMessage(handlerError),
        });
      }
    }
    return failure;
  }

  private validateRequest(request: PayoutRequest, fee: number): string | null {
    if (!Number.isSafeInteger(request.amount) || request.amount <= 0) {
      return `Amount must be a positive integer of satoshis: ${request.amount}`;
    }
    if (!Number.isSafeInteger(fee) || fee < 0) {
      return `Fee must be a non-negative integer of satoshis: ${fee}`;
    }
    if (typeof request.destination !== 'string' || request.destination.trim() === '') {
      return 'Destination address is required';
    }
    if (this.config.network && !isValidAddress(request.destination, this.config.network)) {
      return `Invalid ${this.config.network} address: ${request.destination}`;
    }
    return null;
  }

  private transition(
    states: PayoutState[],
    next: PayoutState,
    context: Record<string, unknown> = {},
  ): void {
    this.logger.debug?.(`Payout ${states[states.length - 1]} -> ${next}`, context);
    states.push(next);
  }

  private fail(
    states: PayoutState[],
    kind: PayoutFailureKind,
    message: string,
    extra: { txid?: string | undefined; cause?: unknown } = {},
  ): PayoutFailure {
    const state = states[states.length - 1] ?? PayoutState.CREATED;
    states.push(PayoutState.FAILED);
    this.logger.warn('Payout failed', { kind, state, message, txid: extra.txid });
    return {
      ok: false,
      kind,
      message,
      state,
      states: [...states],
      txid: extra.txid,
      cause: extra.cause,
    };
  }
}
