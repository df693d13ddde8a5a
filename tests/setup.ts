/**
 * Global test setup for all test suites
 */

import * as bitcoin from 'bitcoinjs-lib';
import * as ecc from 'tiny-secp256k1';

// Required for taproot output scripts in address checks
bitcoin.initEccLib(ecc);
