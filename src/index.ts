/**
 * @module custodial-accounts
 *
 * Custodial sub-accounts over one shared bitcoind wallet. Each user holds a
 * balance derived from an append-only ledger; payouts select pool outputs
 * largest-first, build the raw transaction with change, then sign,
 * broadcast and record it.
 *
 * @example Paying out a user balance
 * ```typescript
 * import { createCustodialAccounts } from 'custodial-accounts';
 *
 * const custody = createCustodialAccounts();
 * const alice = await custody.accounts.getOrCreateAccount('alice');
 * await custody.deposits.sync();
 *
 * const result = await custody.payouts.execute({
 *   userId: alice.id,
 *   destination: 'bc1q...',
 *   amount: 50_000_000,
 * });
 * if (!result.ok) {
 *   console.warn(result.kind, result.message);
 * }
 * ```
 *
 * @example Internal transfer
 * ```typescript
 * await custody.accounts.transfer(alice.id, bob.id, 10_000_000);
 * ```
 */

// Core exports
export { AccountService, type AccountServiceOptions } from './core/account-service.ts';
export {
  createCustodialAccounts,
  type CustodialAccounts,
  type CustodialAccountsOptions,
} from './core/custodial-accounts.ts';
export { DepositSync, type DepositSyncOptions, type SyncWindow } from './core/deposit-sync.ts';
export { KeyedMutex } from './core/keyed-mutex.ts';
export {
  Ledger,
  type LedgerOptions,
  type LedgerSession,
  signedAmountFor,
} from './core/ledger.ts';
export {
  type OutpointReservation,
  OutpointReservations,
  type OutpointReservationsOptions,
  ReservationError,
} from './core/outpoint-reservations.ts';
export {
  type PayoutConfig,
  PayoutWorkflow,
  type PayoutWorkflowOptions,
} from './core/payout-workflow.ts';
export { TransactionBuilder } from './core/transaction-builder.ts';

// Selector exports
export { BaseSelector, outpointKey } from './selectors/base-selector.ts';
export { LargestFirstSelector } from './selectors/largest-first.ts';

// Provider exports
export { BaseNodeClient } from './providers/base-node-client.ts';
export {
  BitcoindRpcClient,
  type BitcoindRpcClientOptions,
  type RpcHttpClient,
} from './providers/bitcoind-rpc-client.ts';

// Store exports
export {
  InMemoryAccountDirectory,
  type InMemoryAccountDirectoryOptions,
} from './stores/in-memory-account-directory.ts';
export { InMemoryLedgerStore, matchesFilter } from './stores/in-memory-ledger-store.ts';
export { JsonlLedgerStore, parseLedgerLine } from './stores/jsonl-ledger-store.ts';

// Type exports
export type { Address, IAccountDirectory, User } from './interfaces/account.interface.ts';
export type {
  ILedgerStore,
  LedgerFilter,
  LedgerRecord,
  LedgerRecordType,
  LedgerSide,
} from './interfaces/ledger.interface.ts';
export type {
  DecodedInput,
  DecodedOutput,
  DecodedTransaction,
  INodeClient,
  NodeClientOptions,
  OutPoint,
  RawTransactionOutputs,
  UnspentOutput,
  WalletTransaction,
  WalletTransactionCategory,
} from './interfaces/node.interface.ts';
export {
  type PayoutFailure,
  PayoutFailureKind,
  type PayoutRequest,
  type PayoutResult,
  PayoutState,
  type PayoutSuccess,
  type PendingTransaction,
  type ReconciliationHandler,
} from './interfaces/payout.interface.ts';
export type { IUTXOSelector, SelectionOptions } from './interfaces/selector.interface.ts';
export {
  createSelectionFailure,
  createSelectionSuccess,
  isSelectionFailure,
  isSelectionSuccess,
  type SelectionFailure,
  SelectionFailureReason,
  type SelectionResult,
  type SelectionSuccess,
} from './interfaces/selector-result.interface.ts';
export type {
  BuildRequest,
  BuiltTransaction,
  ITransactionBuilder,
} from './interfaces/transaction.interface.ts';

// Config exports
export * from './config/index.ts';

// Error exports
export * from './errors/index.ts';

// Utility exports
export {
  isNetworkName,
  isValidAddress,
  type NetworkName,
  resolveNetwork,
} from './utils/address-validator.ts';
export { formatBtc, parseBtc, SATOSHIS_PER_BTC } from './utils/amount.ts';
export {
  ConsoleLogger,
  type ConsoleLoggerOptions,
  createLogger,
  isLogLevel,
  type Logger,
  type LogLevel,
  silentLogger,
} from './utils/logger.ts';
