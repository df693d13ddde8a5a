import type { UnspentOutput } from '../../src/interfaces/node.interface';

export const TXID_A = 'a'.repeat(64);
export const TXID_B = 'b'.repeat(64);
export const TXID_C = 'c'.repeat(64);
export const TXID_D = 'd'.repeat(64);

/**
 * Spendable, confirmed pool output
 */
export function createUnspent(
  txid: string,
  amount: number,
  overrides: Partial<UnspentOutput> = {},
): UnspentOutput {
  return {
    txid,
    vout: 0,
    amount,
    spendable: true,
    confirmations: 6,
    ...overrides,
  };
}

/**
 * Pool outputs of 5000, 3000 and 2000 satoshis
 */
export function createSmallPool(): UnspentOutput[] {
  return [
    createUnspent(TXID_C, 2_000),
    createUnspent(TXID_A, 5_000),
    createUnspent(TXID_B, 3_000),
  ];
}
