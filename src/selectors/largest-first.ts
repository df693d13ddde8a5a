/**
 * Largest-First UTXO Selection
 * Accumulates outputs from the largest down until the target is covered
 */

import type { UnspentOutput } from '../interfaces/node.interface.ts';
import type { SelectionOptions } from '../interfaces/selector.interface.ts';
import type { SelectionResult } from '../interfaces/selector-result.interface.ts';
import {
  createSelectionFailure,
  createSelectionSuccess,
  SelectionFailureReason,
} from '../interfaces/selector-result.interface.ts';

import { BaseSelector } from './base-selector.ts';

/**
 * Greedy largest-first selection
 *
 * @remarks
 * Minimizes the number of inputs. Stops as soon as the accumulated amount
 * reaches the target, so `[5, 3, 2]` with target 6 selects `[5, 3]`. When the
 * candidates run out first the full sum is compared against the target and the
 * selection fails; an undersized selection is never returned.
 *
 * The target must already include the fee.
 *
 * @example
 * ```typescript
 * const selector = new LargestFirstSelector();
 * const result = selector.select(unspent, { target: amount + fee });
 * ```
 */
export class LargestFirstSelector extends BaseSelector {
  getName(): string {
    return 'largest-first';
  }

  select(unspent: UnspentOutput[], options: SelectionOptions): SelectionResult {
    const validationFailure = this.checkOptionsValidity(options);
    if (validationFailure) {
      return validationFailure;
    }

    const eligible = this.filterEligibleUTXOs(unspent, options);
    if (eligible.length === 0) {
      return createSelectionFailure(
        SelectionFailureReason.NO_UTXOS_AVAILABLE,
        'No spendable unspent outputs available',
        {
          utxoCount: unspent.length,
          reservedCount: options.excludeOutpoints?.size ?? 0,
          minConfirmations: options.minConfirmations,
          requiredAmount: options.target,
        },
      );
    }

    const sorted = this.sortByAmount(eligible, true);
    const selected: UnspentOutput[] = [];
    let accumulated = 0;

    for (const utxo of sorted) {
      if (accumulated >= options.target) {
        break;
      }
      if (options.maxInputs !== undefined && selected.length >= options.maxInputs) {
        break;
      }
      selected.push(utxo);
      accumulated += utxo.amount;
    }

    if (accumulated >= options.target) {
      return createSelectionSuccess(selected);
    }

    const available = this.sumUTXOs(sorted);
    if (available >= options.target) {
      return createSelectionFailure(
        SelectionFailureReason.MAX_INPUTS_EXCEEDED,
        `Target needs more than ${options.maxInputs} inputs`,
        {
          availableBalance: available,
          requiredAmount: options.target,
          maxInputs: options.maxInputs,
          spendableCount: sorted.length,
        },
      );
    }

    return createSelectionFailure(
      SelectionFailureReason.INSUFFICIENT_FUNDS,
      'Insufficient funds to meet target value',
      {
        availableBalance: available,
        requiredAmount: options.target,
        spendableCount: sorted.length,
      },
    );
  }
}
