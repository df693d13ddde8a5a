/**
 * Address format checks against a configured bitcoin network
 */

import * as bitcoin from 'bitcoinjs-lib';
import type { Network } from 'bitcoinjs-lib';
import * as ecc from 'tiny-secp256k1';

export type NetworkName = 'mainnet' | 'testnet' | 'regtest';

let eccInitialized = false;

/**
 * Taproot output scripts need the ECC library registered with bitcoinjs-lib
 */
function ensureEccLib(): void {
  if (!eccInitialized) {
    bitcoin.initEccLib(ecc);
    eccInitialized = true;
  }
}

export function isNetworkName(value: string): value is NetworkName {
  return value === 'mainnet' || value === 'testnet' || value === 'regtest';
}

export function resolveNetwork(name: NetworkName): Network {
  switch (name) {
    case 'testnet':
      return bitcoin.networks.testnet;
    case 'regtest':
      return bitcoin.networks.regtest;
    case 'mainnet':
      return bitcoin.networks.bitcoin;
  }
}

export function isValidAddress(address: string, network: NetworkName): boolean {
  ensureEccLib();
  try {
    bitcoin.address.toOutputScript(address, resolveNetwork(network));
    return true;
  } catch {
    return false;
  }
}
