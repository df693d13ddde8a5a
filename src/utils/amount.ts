/**
 * Amount conversion between BTC decimals and integer satoshis.
 * Every amount inside the library is a satoshi integer.
 */

import { InvalidAmountError } from '../errors/index.ts';

export const SATOSHIS_PER_BTC = 100_000_000;
export const BTC_DECIMALS = 8;

const DECIMAL_PATTERN = /^(-)?(\d+)(?:\.(\d{1,8}))?$/;

/**
 * Parse a BTC amount ("0.5001", 0.5001) into satoshis without floating-point
 * arithmetic on the value.
 */
export function parseBtc(value: string | number): number {
  let text: string;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new InvalidAmountError(value);
    }
    text = value.toFixed(BTC_DECIMALS);
  } else {
    text = value.trim();
  }

  const match = DECIMAL_PATTERN.exec(text);
  if (!match) {
    throw new InvalidAmountError(value);
  }

  const [, sign, whole = '0', fraction = ''] = match;
  const satoshis = Number(whole) * SATOSHIS_PER_BTC +
    Number(fraction.padEnd(BTC_DECIMALS, '0'));

  if (!Number.isSafeInteger(satoshis)) {
    throw new InvalidAmountError(value, `Amount out of range: ${String(value)}`);
  }
  return sign ? -satoshis : satoshis;
}

/**
 * Format satoshis as a BTC decimal string with eight places
 */
export function formatBtc(satoshis: number): string {
  assertInteger(satoshis);
  const sign = satoshis < 0 ? '-' : '';
  const abs = Math.abs(satoshis);
  const whole = Math.floor(abs / SATOSHIS_PER_BTC);
  const fraction = String(abs % SATOSHIS_PER_BTC).padStart(BTC_DECIMALS, '0');
  return `${sign}${whole}.${fraction}`;
}

function assertInteger(value: number): void {
  if (!Number.isSafeInteger(value)) {
    throw new InvalidAmountError(value, `Amount must be an integer number of satoshis: ${value}`);
  }
}

/**
 * Throw unless `value` is a satoshi count greater than zero
 */
export function assertPositiveSatoshis(value: number, label = 'amount'): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new InvalidAmountError(value, `${label} must be a positive integer of satoshis: ${value}`);
  }
}

/**
 * Throw unless `value` is a satoshi count of zero or more
 */
export function assertNonNegativeSatoshis(value: number, label = 'amount'): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidAmountError(
      value,
      `${label} must be a non-negative integer of satoshis: ${value}`,
    );
  }
}
