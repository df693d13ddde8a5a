/**
 * Raw Transaction Builder
 * Turns selected inputs into a createRawTransaction request with correct change
 */

import {
  InvalidTransactionError,
  NegativeChangeError,
} from '../errors/index.ts';
import type {
  INodeClient,
  OutPoint,
  RawTransactionOutputs,
} from '../interfaces/node.interface.ts';
import type {
  BuildRequest,
  BuiltTransaction,
  ITransactionBuilder,
} from '../interfaces/transaction.interface.ts';
import { assertNonNegativeSatoshis, assertPositiveSatoshis } from '../utils/amount.ts';
import type { Logger } from '../utils/logger.ts';
import { silentLogger } from '../utils/logger.ts';

/**
 * Builds unsigned pool transactions through the node
 *
 * @remarks
 * `change = Σinputs - amount - fee`. A zero change adds no change output.
 * Negative change throws {@link NegativeChangeError}: the selector is given
 * `amount + fee` as its target, so it can only happen through a caller bug.
 *
 * @example
 * ```typescript
 * const builder = new TransactionBuilder({ node });
 * const built = await builder.build({
 *   inputs: selection.inputs,
 *   destination: 'bc1q...',
 *   amount: 50_000_000,
 *   fee: 10_000,
 *   changeAddress: 'bc1q...',
 * });
 * ```
 */
export class TransactionBuilder implements ITransactionBuilder {
  private readonly node: INodeClient;
  private readonly logger: Logger;

  constructor(config: { node: INodeClient; logger?: Logger | undefined }) {
    this.node = config.node;
    this.logger = config.logger ?? silentLogger;
  }

  async build(request: BuildRequest): Promise<BuiltTransaction> {
    const { inputs, destination, amount, fee, changeAddress } = request;

    if (inputs.length === 0) {
      throw new InvalidTransactionError('Transaction must have at least one input');
    }
    assertPositiveSatoshis(amount);
    assertNonNegativeSatoshis(fee, 'fee');
    if (destination === changeAddress) {
      throw new InvalidTransactionError(
        `Destination ${destination} cannot also receive the change`,
      );
    }

    const total = inputs.reduce((sum, input) => sum + input.amount, 0);
    const change = total - amount - fee;
    if (change < 0) {
      throw new NegativeChangeError(total, amount, fee);
    }

    const outputs: RawTransactionOutputs = { [destination]: amount };
    if (change > 0) {
      outputs[changeAddress] = change;
    }

    const outpoints: OutPoint[] = inputs.map(({ txid, vout }) => ({ txid, vout }));
    const rawHex = await this.node.createRawTransaction(outpoints, outputs);

    this.logger.debug?.('Built raw transaction', {
      inputCount: inputs.length,
      total,
      amount,
      fee,
      change,
    });

    return {
      rawHex,
      inputs: [...inputs],
      outpoints,
      outputs,
      destination,
      changeAddress,
      amount,
      fee,
      total,
      change,
    };
  }

  async verify(built: BuiltTransaction): Promise<void> {
    const decoded = await this.node.decodeRawTransaction(built.rawHex);

    const expectedInputs = new Set(built.outpoints.map((o) => `${o.txid}:${o.vout}`));
    const actualInputs = new Set(decoded.vin.map((i) => `${i.txid}:${i.vout}`));
    if (
      expectedInputs.size !== actualInputs.size ||
      [...expectedInputs].some((outpoint) => !actualInputs.has(outpoint))
    ) {
      throw new InvalidTransactionError('Decoded transaction spends different inputs');
    }

    const expectedOutputs = Object.entries(built.outputs);
    if (decoded.vout.length !== expectedOutputs.length) {
      throw new InvalidTransactionError(
        `Decoded transaction has ${decoded.vout.length} outputs, expected ${expectedOutputs.length}`,
      );
    }
    for (const [address, amount] of expectedOutputs) {
      const match = decoded.vout.find((output) =>
        output.amount === amount && output.addresses.includes(address)
      );
      if (!match) {
        throw new InvalidTransactionError(
          `Decoded transaction does not pay ${amount} to ${address}`,
        );
      }
    }
  }
}
