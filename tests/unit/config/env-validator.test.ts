import { describe, expect, it } from 'vitest';

import {
  getEnvironmentConfigDocumentation,
  validateEnvironment,
} from '../../../src/config/env-validator';

describe('validateEnvironment', () => {
  it('should produce no overrides for an empty environment', () => {
    expect(validateEnvironment({})).toEqual({
      valid: true,
      errors: [],
      warnings: [],
      config: {},
    });
  });

  it('should read every setting', () => {
    const result = validateEnvironment({
      ACCOUNTS_TRANSACTION_FEE: '0.0002',
      ACCOUNTS_AUTOCREATE_ADDRESS: 'no',
      ACCOUNTS_MIN_CONFIRMATIONS: '1',
      ACCOUNTS_MAX_INPUTS: '20',
      ACCOUNTS_DEPOSIT_CONFIRMATIONS: '3',
      ACCOUNTS_VERIFY_RAW_TX: 'off',
      ACCOUNTS_RESERVATION_TTL_MS: '60000',
      ACCOUNTS_NETWORK: 'Regtest',
      ACCOUNTS_LOG_LEVEL: 'debug',
      BITCOIND_RPC_URL: 'http://127.0.0.1:18443',
      BITCOIND_RPC_USER: 'rpcuser',
      BITCOIND_RPC_PASSWORD: 'test-secret',
      BITCOIND_RPC_TIMEOUT: '5000',
      BITCOIND_RPC_RETRIES: '0',
    });

    expect(result.errors).toEqual([]);
    expect(result.config).toEqual({
      transactionFee: 20_000,
      autoCreateAddress: false,
      minConfirmations: 1,
      maxInputs: 20,
      depositConfirmations: 3,
      verifyRawTransaction: false,
      reservationTtlMs: 60_000,
      network: 'regtest',
      logLevel: 'debug',
      rpc: {
        url: 'http://127.0.0.1:18443',
        username: 'rpcuser',
        password: 'test-secret',
        timeout: 5_000,
        retries: 0,
      },
    });
  });

  it('should report invalid values with the variable name', () => {
    const result = validateEnvironment({
      ACCOUNTS_TRANSACTION_FEE: 'lots',
      ACCOUNTS_MIN_CONFIRMATIONS: 'abc',
      ACCOUNTS_MAX_INPUTS: '0',
      ACCOUNTS_VERIFY_RAW_TX: 'maybe',
      ACCOUNTS_NETWORK: 'signet',
      BITCOIND_RPC_URL: 'not a url',
    });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'ACCOUNTS_TRANSACTION_FEE: Invalid BTC amount "lots"',
      'ACCOUNTS_VERIFY_RAW_TX: Invalid boolean value "maybe". Use: true/false, 1/0, yes/no, on/off',
      'ACCOUNTS_MIN_CONFIRMATIONS: Invalid number "abc"',
      'ACCOUNTS_MAX_INPUTS: Value 0 is below minimum 1',
      'ACCOUNTS_NETWORK: Invalid value "signet". Allowed: mainnet, testnet, regtest',
      'BITCOIND_RPC_URL: Invalid URL "not a url"',
    ]);
  });

  it('should reject a negative fee', () => {
    const result = validateEnvironment({ ACCOUNTS_TRANSACTION_FEE: '-0.1' });

    expect(result.errors).toEqual(['ACCOUNTS_TRANSACTION_FEE: Amount must not be negative']);
  });

  it('should warn when only one RPC credential is set', () => {
    const result = validateEnvironment({ BITCOIND_RPC_USER: 'rpcuser' });

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      'BITCOIND_RPC_USER and BITCOIND_RPC_PASSWORD should be set together',
    ]);
    expect(result.config.rpc).toEqual({ username: 'rpcuser', password: undefined });
  });

  it('should document every variable', () => {
    const docs = getEnvironmentConfigDocumentation();

    expect(docs).toContain('   ACCOUNTS_TRANSACTION_FEE=0.0001\n      Default payout fee in BTC');
    expect(docs).toContain('   BITCOIND_RPC_RETRIES=2');
  });
});
