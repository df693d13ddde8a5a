/**
 * UTXO Selection Strategy Interface
 */

import type { UnspentOutput } from './node.interface.ts';
import type {
  SelectionFailure,
  SelectionResult,
  SelectionSuccess,
} from './selector-result.interface.ts';

export type { SelectionFailure, SelectionResult, SelectionSuccess };

export interface SelectionOptions {
  /** Satoshis to cover: payout amount plus fee */
  target: number;
  minConfirmations?: number | undefined;
  maxInputs?: number | undefined;
  /** Outpoints (`txid:vout`) that must not be selected */
  excludeOutpoints?: ReadonlySet<string> | undefined;
}

export interface IUTXOSelector {
  /**
   * Select outputs covering the target.
   * Always returns a structured result (never null)
   */
  select(unspent: UnspentOutput[], options: SelectionOptions): SelectionResult;

  getName(): string;
}
