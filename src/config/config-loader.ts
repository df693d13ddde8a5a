/**
 * Configuration Loader
 * Loads configuration with priority:
 * 1. Runtime options (passed to loadConfig)
 * 2. Environment variables
 * 3. Config file (.accounts.json, accounts.config.json or config/accounts.json)
 * 4. Default values
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import process from 'node:process';

import { ConfigurationError, errorMessage } from '../errors/index.ts';
import { isNetworkName } from '../utils/address-validator.ts';
import { parseBtc } from '../utils/amount.ts';
import { isLogLevel } from '../utils/logger.ts';
import {
  getOptionalBoolean,
  getOptionalNumber,
  getOptionalString,
  isRecord,
} from '../utils/type-guards.ts';

import {
  type AccountsConfig,
  type AccountsConfigOverrides,
  DEFAULT_CONFIG,
  mergeConfig,
  validateConfig,
} from './accounts-config.ts';
import { getEnvironmentConfigDocumentation, validateEnvironment } from './env-validator.ts';

export const CONFIG_FILE_NAMES = [
  '.accounts.json',
  'accounts.config.json',
  path.join('config', 'accounts.json'),
];

export interface LoadConfigOptions {
  /** Directory searched for config files. Defaults to the working directory. */
  cwd?: string | undefined;
  env?: Record<string, string | undefined> | undefined;
}

export class ConfigLoader {
  /**
   * Load configuration. Runtime overrides are in satoshis; the config file and
   * the environment give `transactionFee` in BTC.
   */
  static loadConfig(
    overrides?: AccountsConfigOverrides,
    options: LoadConfigOptions = {},
  ): AccountsConfig {
    return new ConfigLoader(options).load(overrides);
  }

  private readonly cwd: string;
  private readonly env: Record<string, string | undefined>;

  constructor(options: LoadConfigOptions = {}) {
    this.cwd = options.cwd ?? process.cwd();
    this.env = options.env ?? process.env;
  }

  load(overrides?: AccountsConfigOverrides): AccountsConfig {
    const fileConfig = this.loadConfigFile();

    const envResult = validateEnvironment(this.env);
    if (!envResult.valid) {
      throw new ConfigurationError(envResult.errors);
    }
    for (const warning of envResult.warnings) {
      console.warn(warning);
    }

    const config = mergeConfig(DEFAULT_CONFIG, fileConfig, envResult.config, overrides);

    const validationErrors = validateConfig(config);
    if (validationErrors.length > 0) {
      throw new ConfigurationError(validationErrors);
    }

    return config;
  }

  private loadConfigFile(): AccountsConfigOverrides | null {
    for (const name of CONFIG_FILE_NAMES) {
      const configPath = path.join(this.cwd, name);
      if (!fs.existsSync(configPath)) continue;

      let parsed: unknown;
      try {
        parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
      } catch (e) {
        throw new ConfigurationError([`Failed to read ${configPath}: ${errorMessage(e)}`]);
      }
      return parseConfigFile(parsed, configPath);
    }
    return null;
  }

  /**
   * Get configuration documentation
   */
  static getConfigDocumentation(): string {
    return getEnvironmentConfigDocumentation() + `

Configuration File:
   Create .accounts.json or accounts.config.json in the project root:
   {
     "transactionFee": "0.0001",
     "autoCreateAddress": true,
     "network": "mainnet",
     "rpc": { "url": "http://127.0.0.1:8332", "username": "rpcuser", "password": "rpcpassword" }
   }

Configuration Priority Order:
1. Runtime Configuration (Highest Priority): ConfigLoader.loadConfig({ transactionFee: 5000 })
2. Environment Variables
3. Configuration File
4. Defaults (Lowest Priority)
    `;
  }
}

/**
 * Convert a parsed config file into overrides, rejecting values of the wrong type
 */
export function parseConfigFile(parsed: unknown, source: string): AccountsConfigOverrides {
  if (!isRecord(parsed)) {
    throw new ConfigurationError([`${source}: expected a JSON object`]);
  }

  const errors: string[] = [];
  const overrides: AccountsConfigOverrides = {};

  const fee = parsed.transactionFee;
  if (fee !== undefined) {
    if (typeof fee === 'string' || typeof fee === 'number') {
      try {
        overrides.transactionFee = parseBtc(fee);
      } catch (e) {
        errors.push(`transactionFee: ${errorMessage(e)}`);
      }
    } else {
      errors.push('transactionFee must be a BTC amount');
    }
  }

  const booleans = ['autoCreateAddress', 'verifyRawTransaction'] as const;
  for (const key of booleans) {
    if (parsed[key] === undefined) continue;
    const value = getOptionalBoolean(parsed[key]);
    if (value === undefined) {
      errors.push(`${key} must be a boolean`);
    } else {
      overrides[key] = value;
    }
  }

  const numbers = [
    'minConfirmations',
    'maxInputs',
    'depositConfirmations',
    'reservationTtlMs',
  ] as const;
  for (const key of numbers) {
    if (parsed[key] === undefined) continue;
    const value = getOptionalNumber(parsed[key]);
    if (value === undefined) {
      errors.push(`${key} must be a number`);
    } else {
      overrides[key] = value;
    }
  }

  const network = getOptionalString(parsed.network);
  if (network !== undefined) {
    if (isNetworkName(network)) {
      overrides.network = network;
    } else {
      errors.push(`network must be mainnet, testnet or regtest`);
    }
  }

  const logLevel = getOptionalString(parsed.logLevel);
  if (logLevel !== undefined) {
    if (isLogLevel(logLevel)) {
      overrides.logLevel = logLevel;
    } else {
      errors.push(`logLevel is not a known level: ${logLevel}`);
    }
  }

  if (isRecord(parsed.rpc)) {
    overrides.rpc = {
      url: getOptionalString(parsed.rpc.url),
      username: getOptionalString(parsed.rpc.username),
      password: getOptionalString(parsed.rpc.password),
      timeout: getOptionalNumber(parsed.rpc.timeout),
      retries: getOptionalNumber(parsed.rpc.retries),
    };
  } else if (parsed.rpc !== undefined) {
    errors.push('rpc must be an object');
  }

  if (errors.length > 0) {
    throw new ConfigurationError(errors.map((error) => `${source}: ${error}`));
  }
  return overrides;
}

export function loadConfig(
  overrides?: AccountsConfigOverrides,
  options?: LoadConfigOptions,
): AccountsConfig {
  return ConfigLoader.loadConfig(overrides, options);
}
