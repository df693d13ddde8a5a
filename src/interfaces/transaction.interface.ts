/**
 * Raw Transaction Building Interface
 */

import type { OutPoint, RawTransactionOutputs, UnspentOutput } from './node.interface.ts';

export interface BuildRequest {
  inputs: UnspentOutput[];
  destination: string;
  /** Satoshis paid to the destination */
  amount: number;
  /** Satoshis left to the miners */
  fee: number;
  changeAddress: string;
}

/**
 * Unsigned transaction plus the bookkeeping that produced it
 */
export interface BuiltTransaction {
  readonly rawHex: string;
  readonly inputs: readonly UnspentOutput[];
  readonly outpoints: readonly OutPoint[];
  readonly outputs: Readonly<RawTransactionOutputs>;
  readonly destination: string;
  readonly changeAddress: string;
  readonly amount: number;
  readonly fee: number;
  /** Sum of the consumed inputs */
  readonly total: number;
  /** 0 when no change output was added */
  readonly change: number;
}

export interface ITransactionBuilder {
  build(request: BuildRequest): Promise<BuiltTransaction>;
  /**
   * Decode the raw hex through the node and confirm it spends and pays
   * exactly what was built
   */
  verify(built: BuiltTransaction): Promise<void>;
}
