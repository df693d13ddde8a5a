/**
 * Wiring for a complete custodial accounts instance
 */

import type { AccountsConfig, AccountsConfigOverrides } from '../config/accounts-config.ts';
import { loadConfig, type LoadConfigOptions } from '../config/config-loader.ts';
import type { IAccountDirectory } from '../interfaces/account.interface.ts';
import type { ILedgerStore } from '../interfaces/ledger.interface.ts';
import type { INodeClient } from '../interfaces/node.interface.ts';
import type { ReconciliationHandler } from '../interfaces/payout.interface.ts';
import { BitcoindRpcClient } from '../providers/bitcoind-rpc-client.ts';
import { InMemoryAccountDirectory } from '../stores/in-memory-account-directory.ts';
import { InMemoryLedgerStore } from '../stores/in-memory-ledger-store.ts';
import { createLogger, type Logger } from '../utils/logger.ts';

import { AccountService } from './account-service.ts';
import { DepositSync } from './deposit-sync.ts';
import { Ledger } from './ledger.ts';
import { PayoutWorkflow } from './payout-workflow.ts';

export interface CustodialAccountsOptions {
  config?: AccountsConfigOverrides | undefined;
  loadOptions?: LoadConfigOptions | undefined;
  /** Defaults to a bitcoind client built from `config.rpc` */
  node?: INodeClient | undefined;
  store?: ILedgerStore | undefined;
  accounts?: IAccountDirectory | undefined;
  logger?: Logger | undefined;
  onReconciliationRequired?: ReconciliationHandler | undefined;
}

export interface CustodialAccounts {
  config: AccountsConfig;
  node: INodeClient;
  ledger: Ledger;
  accounts: AccountService;
  payouts: PayoutWorkflow;
  deposits: DepositSync;
}

/**
 * Create the ledger, account service, payout workflow and deposit sync over
 * one node and one store
 *
 * @example
 * ```typescript
 * const custody = createCustodialAccounts({ config: { network: 'mainnet' } });
 * const alice = await custody.accounts.getOrCreateAccount('alice');
 * const result = await custody.payouts.execute({
 *   userId: alice.id,
 *   destination: 'bc1q...',
 *   amount: 50_000_000,
 * });
 * ```
 */
export function createCustodialAccounts(
  options: CustodialAccountsOptions = {},
): CustodialAccounts {
  const config = loadConfig(options.config, options.loadOptions);
  const logger = options.logger ?? createLogger('accounts', config.logLevel);
  const scoped = (scope: string): Logger => logger.child?.(scope) ?? logger;

  const node = options.node ?? new BitcoindRpcClient({
    url: config.rpc.url,
    username: config.rpc.username,
    password: config.rpc.password,
    timeout: config.rpc.timeout,
    retries: config.rpc.retries,
    logger: scoped('rpc'),
  });
  const directory = options.accounts ?? new InMemoryAccountDirectory();
  const ledger = new Ledger({
    store: options.store ?? new InMemoryLedgerStore(),
    logger: scoped('ledger'),
  });

  return {
    config,
    node,
    ledger,
    accounts: new AccountService({
      accounts: directory,
      node,
      ledger,
      config,
      logger: scoped('accounts'),
    }),
    payouts: new PayoutWorkflow({
      node,
      ledger,
      accounts: directory,
      config,
      logger: scoped('payout'),
      onReconciliationRequired: options.onReconciliationRequired,
    }),
    deposits: new DepositSync({
      node,
      ledger,
      accounts: directory,
      config,
      logger: scoped('deposits'),
    }),
  };
}
