/**
 * UTXO Selection Result Interface
 * Structured responses for both success and failure cases
 */

import type { UnspentOutput } from './node.interface.ts';

/**
 * Reasons why selection might fail
 */
export enum SelectionFailureReason {
  INSUFFICIENT_FUNDS = 'INSUFFICIENT_FUNDS',
  NO_UTXOS_AVAILABLE = 'NO_UTXOS_AVAILABLE',
  MAX_INPUTS_EXCEEDED = 'MAX_INPUTS_EXCEEDED',
  INVALID_OPTIONS = 'INVALID_OPTIONS',
}

export interface SelectionSuccess {
  success: true;
  inputs: UnspentOutput[];
  /** Sum of the selected amounts in satoshis */
  total: number;
  inputCount: number;
}

/**
 * Failed selection result with debugging information
 */
export interface SelectionFailure {
  success: false;
  reason: SelectionFailureReason;
  message: string;
  details?: {
    availableBalance?: number;
    requiredAmount?: number;
    utxoCount?: number;
    spendableCount?: number;
    reservedCount?: number;
    maxInputs?: number;
    minConfirmations?: number;
    target?: number;
  };
}

export type SelectionResult = SelectionSuccess | SelectionFailure;

export function createSelectionSuccess(inputs: UnspentOutput[]): SelectionSuccess {
  return {
    success: true,
    inputs,
    total: inputs.reduce((sum, utxo) => sum + utxo.amount, 0),
    inputCount: inputs.length,
  };
}

export function createSelectionFailure(
  reason: SelectionFailureReason,
  message: string,
  details?: SelectionFailure['details'],
): SelectionFailure {
  return {
    success: false,
    reason,
    message,
    details,
  };
}

export function isSelectionSuccess(
  result: SelectionResult,
): result is SelectionSuccess {
  return result.success === true;
}

export function isSelectionFailure(
  result: SelectionResult,
): result is SelectionFailure {
  return result.success === false;
}
