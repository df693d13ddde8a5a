/**
 * Accounts Configuration
 * Defaults and validation for the payout engine and its node connection
 */

import type { NetworkName } from '../utils/address-validator.ts';
import type { LogLevel } from '../utils/logger.ts';

export interface RpcConfig {
  url: string;
  username?: string | undefined;
  password?: string | undefined;
  /** Request timeout in milliseconds; never applied to broadcasts */
  timeout: number;
  /** Retries for read-only commands */
  retries: number;
}

export interface AccountsConfig {
  /** Default payout fee in satoshis */
  transactionFee: number;
  /** Give every new account a node-issued address */
  autoCreateAddress: boolean;
  minConfirmations: number;
  maxInputs?: number | undefined;
  /** Confirmations a deposit needs before it is credited */
  depositConfirmations: number;
  /** Decode and compare the raw transaction before signing */
  verifyRawTransaction: boolean;
  /** How long outputs of a broadcast payout stay out of selection */
  reservationTtlMs: number;
  /** When set, destination addresses must be valid on this network */
  network?: NetworkName | undefined;
  logLevel: LogLevel;
  rpc: RpcConfig;
}

export type AccountsConfigOverrides =
  & Partial<Omit<AccountsConfig, 'rpc'>>
  & { rpc?: Partial<RpcConfig> | undefined };

export const DEFAULT_CONFIG: AccountsConfig = {
  transactionFee: 10_000,
  autoCreateAddress: true,
  minConfirmations: 0,
  depositConfirmations: 1,
  verifyRawTransaction: true,
  reservationTtlMs: 10 * 60 * 1000,
  logLevel: 'info',
  rpc: {
    url: 'http://127.0.0.1:8332',
    timeout: 30_000,
    retries: 2,
  },
};

/**
 * Layer overrides onto a base configuration; later layers win
 */
export function mergeConfig(
  base: AccountsConfig,
  ...layers: Array<AccountsConfigOverrides | null | undefined>
): AccountsConfig {
  let merged: AccountsConfig = { ...base, rpc: { ...base.rpc } };
  for (const layer of layers) {
    if (!layer) continue;
    const { rpc, ...rest } = layer;
    merged = {
      ...merged,
      ...definedOnly(rest),
      rpc: { ...merged.rpc, ...definedOnly<Partial<RpcConfig>>(rpc ?? {}) },
    };
  }
  return merged;
}

function definedOnly<T extends object>(value: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(value)) {
    if (isKeyOf(value, key) && value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}

function isKeyOf<T extends object>(value: T, key: PropertyKey): key is keyof T {
  return key in value;
}

export function validateConfig(config: AccountsConfig): string[] {
  const errors: string[] = [];

  if (!Number.isSafeInteger(config.transactionFee) || config.transactionFee < 0) {
    errors.push('transactionFee must be a non-negative integer of satoshis');
  }
  if (!Number.isInteger(config.minConfirmations) || config.minConfirmations < 0) {
    errors.push('minConfirmations must be a non-negative integer');
  }
  if (
    config.maxInputs !== undefined &&
    (!Number.isInteger(config.maxInputs) || config.maxInputs <= 0)
  ) {
    errors.push('maxInputs must be a positive integer');
  }
  if (!Number.isInteger(config.depositConfirmations) || config.depositConfirmations < 0) {
    errors.push('depositConfirmations must be a non-negative integer');
  }
  if (!(config.reservationTtlMs > 0)) {
    errors.push('reservationTtlMs must be positive');
  }

  try {
    const url = new URL(config.rpc.url);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      errors.push(`rpc.url must use http or https: ${config.rpc.url}`);
    }
  } catch {
    errors.push(`rpc.url is not a valid URL: ${config.rpc.url}`);
  }
  if (!(config.rpc.timeout > 0)) {
    errors.push('rpc.timeout must be positive');
  }
  if (!Number.isInteger(config.rpc.retries) || config.rpc.retries < 0) {
    errors.push('rpc.retries must be a non-negative integer');
  }

  return errors;
}
