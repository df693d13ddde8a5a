/**
 * Base UTXO Selector
 * Common functionality for all selection algorithms
 */

import type { UnspentOutput } from '../interfaces/node.interface.ts';
import type { IUTXOSelector, SelectionOptions } from '../interfaces/selector.interface.ts';
import type { SelectionResult } from '../interfaces/selector-result.interface.ts';
import {
  createSelectionFailure,
  SelectionFailureReason,
} from '../interfaces/selector-result.interface.ts';

export function outpointKey(utxo: { txid: string; vout: number }): string {
  return `${utxo.txid}:${utxo.vout}`;
}

export abstract class BaseSelector implements IUTXOSelector {
  abstract select(unspent: UnspentOutput[], options: SelectionOptions): SelectionResult;
  abstract getName(): string;

  /**
   * Keep spendable outputs that meet the confirmation requirement and are
   * not reserved by another payout
   */
  protected filterEligibleUTXOs(
    unspent: UnspentOutput[],
    options: SelectionOptions,
  ): UnspentOutput[] {
    const minConfirmations = options.minConfirmations ?? 0;
    return unspent.filter((utxo) =>
      utxo.spendable === true &&
      (utxo.confirmations ?? 0) >= minConfirmations &&
      !options.excludeOutpoints?.has(outpointKey(utxo))
    );
  }

  /**
   * Sort by amount, then txid and vout ascending so equal amounts always come
   * out in the same order
   */
  protected sortByAmount(unspent: UnspentOutput[], descending = true): UnspentOutput[] {
    return [...unspent].sort((a, b) => {
      if (a.amount !== b.amount) {
        return descending ? b.amount - a.amount : a.amount - b.amount;
      }
      if (a.txid !== b.txid) {
        return a.txid < b.txid ? -1 : 1;
      }
      return a.vout - b.vout;
    });
  }

  protected sumUTXOs(unspent: readonly UnspentOutput[]): number {
    return unspent.reduce((sum, utxo) => sum + utxo.amount, 0);
  }

  /**
   * Check if options are valid and return failure result if not
   */
  protected checkOptionsValidity(options: SelectionOptions): SelectionResult | null {
    if (!Number.isSafeInteger(options.target) || options.target <= 0) {
      return createSelectionFailure(
        SelectionFailureReason.INVALID_OPTIONS,
        'Target must be a positive integer of satoshis',
        { target: options.target },
      );
    }

    if (
      options.maxInputs !== undefined &&
      (!Number.isInteger(options.maxInputs) || options.maxInputs <= 0)
    ) {
      return createSelectionFailure(
        SelectionFailureReason.INVALID_OPTIONS,
        'Max inputs must be positive',
        { maxInputs: options.maxInputs },
      );
    }

    return null;
  }
}
