/**
 * Environment Variable Configuration Validator
 * Reads the accounts and bitcoind settings from the environment with clear
 * error messages
 */

import process from 'node:process';

import { parseBtc } from '../utils/amount.ts';
import { isNetworkName } from '../utils/address-validator.ts';
import { isLogLevel } from '../utils/logger.ts';

import type { AccountsConfigOverrides, RpcConfig } from './accounts-config.ts';

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  config: AccountsConfigOverrides;
}

type EnvSpec =
  | { type: 'btc'; description: string; example: string }
  | { type: 'boolean'; description: string; example: string }
  | { type: 'number'; description: string; example: string; min: number; max: number }
  | { type: 'enum'; description: string; example: string; values: readonly string[] }
  | { type: 'string'; description: string; example: string; secret?: boolean };

/**
 * Recognised environment variables
 */
export const ACCOUNTS_ENV_VARS = {
  ACCOUNTS_TRANSACTION_FEE: {
    type: 'btc',
    description: 'Default payout fee in BTC',
    example: '0.0001',
  },
  ACCOUNTS_AUTOCREATE_ADDRESS: {
    type: 'boolean',
    description: 'Create a node address for every new account',
    example: 'true',
  },
  ACCOUNTS_MIN_CONFIRMATIONS: {
    type: 'number',
    description: 'Confirmations an unspent output needs to be selected',
    example: '1',
    min: 0,
    max: 1000,
  },
  ACCOUNTS_MAX_INPUTS: {
    type: 'number',
    description: 'Maximum inputs per payout transaction',
    example: '50',
    min: 1,
    max: 10000,
  },
  ACCOUNTS_DEPOSIT_CONFIRMATIONS: {
    type: 'number',
    description: 'Confirmations a deposit needs before it is credited',
    example: '3',
    min: 0,
    max: 1000,
  },
  ACCOUNTS_VERIFY_RAW_TX: {
    type: 'boolean',
    description: 'Decode and compare raw transactions before signing',
    example: 'true',
  },
  ACCOUNTS_RESERVATION_TTL_MS: {
    type: 'number',
    description: 'Milliseconds a broadcast payout keeps its inputs reserved',
    example: '600000',
    min: 1000,
    max: 86_400_000,
  },
  ACCOUNTS_NETWORK: {
    type: 'enum',
    description: 'Network destination addresses are checked against',
    example: 'mainnet',
    values: ['mainnet', 'testnet', 'regtest'],
  },
  ACCOUNTS_LOG_LEVEL: {
    type: 'enum',
    description: 'Minimum log level',
    example: 'info',
    values: ['debug', 'info', 'warn', 'error', 'silent'],
  },
  BITCOIND_RPC_URL: {
    type: 'string',
    description: 'bitcoind JSON-RPC endpoint',
    example: 'http://127.0.0.1:8332',
  },
  BITCOIND_RPC_USER: {
    type: 'string',
    description: 'RPC username',
    example: 'rpcuser',
  },
  BITCOIND_RPC_PASSWORD: {
    type: 'string',
    description: 'RPC password',
    example: 'rpcpassword',
    secret: true,
  },
  BITCOIND_RPC_TIMEOUT: {
    type: 'number',
    description: 'RPC request timeout in milliseconds',
    example: '30000',
    min: 1000,
    max: 300_000,
  },
  BITCOIND_RPC_RETRIES: {
    type: 'number',
    description: 'Retries for read-only RPC commands',
    example: '2',
    min: 0,
    max: 10,
  },
} as const satisfies Record<string, EnvSpec>;

export type AccountsEnvVar = keyof typeof ACCOUNTS_ENV_VARS;

/**
 * Validate boolean environment variable
 */
function validateBoolean(
  value: string,
  varName: string,
): { errors: string[]; parsed?: boolean | undefined } {
  const normalized = value.toLowerCase().trim();

  if (['true', '1', 'yes', 'on'].includes(normalized)) {
    return { errors: [], parsed: true };
  }
  if (['false', '0', 'no', 'off'].includes(normalized)) {
    return { errors: [], parsed: false };
  }

  return {
    errors: [
      `${varName}: Invalid boolean value "${value}". Use: true/false, 1/0, yes/no, on/off`,
    ],
  };
}

/**
 * Validate integer environment variable
 */
function validateNumber(
  value: string,
  varName: string,
  options: { min: number; max: number },
): { errors: string[]; parsed?: number | undefined } {
  const parsed = Number(value.trim());

  if (value.trim() === '' || !Number.isInteger(parsed)) {
    return { errors: [`${varName}: Invalid number "${value}"`] };
  }

  const errors: string[] = [];
  if (parsed < options.min) {
    errors.push(`${varName}: Value ${parsed} is below minimum ${options.min}`);
  }
  if (parsed > options.max) {
    errors.push(`${varName}: Value ${parsed} is above maximum ${options.max}`);
  }

  return { errors, parsed: errors.length === 0 ? parsed : undefined };
}

function validateEnum(
  value: string,
  varName: string,
  allowedValues: readonly string[],
): { errors: string[]; parsed?: string | undefined } {
  const normalized = value.toLowerCase().trim();

  if (allowedValues.includes(normalized)) {
    return { errors: [], parsed: normalized };
  }

  return {
    errors: [`${varName}: Invalid value "${value}". Allowed: ${allowedValues.join(', ')}`],
  };
}

function validateBtc(
  value: string,
  varName: string,
): { errors: string[]; parsed?: number | undefined } {
  try {
    const parsed = parseBtc(value);
    if (parsed < 0) {
      return { errors: [`${varName}: Amount must not be negative`] };
    }
    return { errors: [], parsed };
  } catch {
    return { errors: [`${varName}: Invalid BTC amount "${value}"`] };
  }
}

/**
 * Load and validate configuration from environment variables
 */
export function validateEnvironment(
  env: Record<string, string | undefined> = process.env,
): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const config: AccountsConfigOverrides = {};
  const rpc: Partial<RpcConfig> = {};

  const read = (name: AccountsEnvVar): string | undefined => {
    const value = env[name];
    return value !== undefined && value.trim() !== '' ? value : undefined;
  };

  const fee = read('ACCOUNTS_TRANSACTION_FEE');
  if (fee !== undefined) {
    const result = validateBtc(fee, 'ACCOUNTS_TRANSACTION_FEE');
    errors.push(...result.errors);
    config.transactionFee = result.parsed;
  }

  const autoCreate = read('ACCOUNTS_AUTOCREATE_ADDRESS');
  if (autoCreate !== undefined) {
    const result = validateBoolean(autoCreate, 'ACCOUNTS_AUTOCREATE_ADDRESS');
    errors.push(...result.errors);
    config.autoCreateAddress = result.parsed;
  }

  const verify = read('ACCOUNTS_VERIFY_RAW_TX');
  if (verify !== undefined) {
    const result = validateBoolean(verify, 'ACCOUNTS_VERIFY_RAW_TX');
    errors.push(...result.errors);
    config.verifyRawTransaction = result.parsed;
  }

  const numberVars = [
    ['ACCOUNTS_MIN_CONFIRMATIONS', (n: number) => (config.minConfirmations = n)],
    ['ACCOUNTS_MAX_INPUTS', (n: number) => (config.maxInputs = n)],
    ['ACCOUNTS_DEPOSIT_CONFIRMATIONS', (n: number) => (config.depositConfirmations = n)],
    ['ACCOUNTS_RESERVATION_TTL_MS', (n: number) => (config.reservationTtlMs = n)],
    ['BITCOIND_RPC_TIMEOUT', (n: number) => (rpc.timeout = n)],
    ['BITCOIND_RPC_RETRIES', (n: number) => (rpc.retries = n)],
  ] as const;

  for (const [name, assign] of numberVars) {
    const value = read(name);
    if (value === undefined) continue;
    const result = validateNumber(value, name, ACCOUNTS_ENV_VARS[name]);
    errors.push(...result.errors);
    if (result.parsed !== undefined) {
      assign(result.parsed);
    }
  }

  const network = read('ACCOUNTS_NETWORK');
  if (network !== undefined) {
    const result = validateEnum(network, 'ACCOUNTS_NETWORK', ACCOUNTS_ENV_VARS.ACCOUNTS_NETWORK.values);
    errors.push(...result.errors);
    if (result.parsed !== undefined && isNetworkName(result.parsed)) {
      config.network = result.parsed;
    }
  }

  const logLevel = read('ACCOUNTS_LOG_LEVEL');
  if (logLevel !== undefined) {
    const result = validateEnum(
      logLevel,
      'ACCOUNTS_LOG_LEVEL',
      ACCOUNTS_ENV_VARS.ACCOUNTS_LOG_LEVEL.values,
    );
    errors.push(...result.errors);
    if (result.parsed !== undefined && isLogLevel(result.parsed)) {
      config.logLevel = result.parsed;
    }
  }

  const url = read('BITCOIND_RPC_URL');
  if (url !== undefined) {
    try {
      new URL(url);
      rpc.url = url;
    } catch {
      errors.push(`BITCOIND_RPC_URL: Invalid URL "${url}"`);
    }
  }

  const user = read('BITCOIND_RPC_USER');
  const password = read('BITCOIND_RPC_PASSWORD');
  rpc.username = user;
  rpc.password = password;
  if ((user === undefined) !== (password === undefined)) {
    warnings.push('BITCOIND_RPC_USER and BITCOIND_RPC_PASSWORD should be set together');
  }

  if (Object.values(rpc).some((value) => value !== undefined)) {
    config.rpc = rpc;
  }

  return { valid: errors.length === 0, errors, warnings, config };
}

/**
 * Human-readable list of the recognised variables
 */
export function getEnvironmentConfigDocumentation(): string {
  const lines = Object.entries(ACCOUNTS_ENV_VARS).map(([name, spec]) =>
    `   ${name}=${spec.example}\n      ${spec.description}`
  );
  return `Environment Variables:\n${lines.join('\n')}`;
}
