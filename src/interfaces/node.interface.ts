/**
 * Node Collaborator Interface
 * The capability set the engine needs from the wallet node that holds the pool
 */

/**
 * Unspent output reported by the node. Amounts are satoshis.
 */
export interface UnspentOutput {
  txid: string;
  vout: number;
  amount: number;
  spendable: boolean;
  confirmations?: number | undefined;
  address?: string | undefined;
}

/**
 * Outpoint reference used as a raw transaction input
 */
export interface OutPoint {
  txid: string;
  vout: number;
}

/**
 * Output map for createRawTransaction: address -> satoshis
 */
export type RawTransactionOutputs = Record<string, number>;

export interface DecodedInput {
  txid: string;
  vout: number;
}

export interface DecodedOutput {
  n: number;
  amount: number;
  addresses: string[];
}

/**
 * Structured transaction returned by decodeRawTransaction
 */
export interface DecodedTransaction {
  txid: string;
  vin: DecodedInput[];
  vout: DecodedOutput[];
}

export type WalletTransactionCategory =
  | 'send'
  | 'receive'
  | 'generate'
  | 'immature'
  | 'orphan'
  | 'move';

/**
 * Entry of the node's wallet transaction list
 */
export interface WalletTransaction {
  txid: string;
  vout: number;
  address?: string | undefined;
  category: WalletTransactionCategory;
  amount: number;
  confirmations: number;
}

export interface INodeClient {
  /**
   * List the pool's unspent outputs
   */
  listUnspent(): Promise<UnspentOutput[]>;

  /**
   * Create an unsigned raw transaction and return its hex
   */
  createRawTransaction(
    inputs: OutPoint[],
    outputs: RawTransactionOutputs,
  ): Promise<string>;

  decodeRawTransaction(rawHex: string): Promise<DecodedTransaction>;

  /**
   * Sign a raw transaction with the wallet's keys and return the signed hex.
   * Rejects when the node cannot produce a complete signature.
   */
  signRawTransaction(rawHex: string): Promise<string>;

  /**
   * Broadcast a signed transaction and return its txid
   */
  sendRawTransaction(signedHex: string): Promise<string>;

  /**
   * Issue a fresh receiving address from the wallet
   */
  getNewAddress(): Promise<string>;

  listTransactions(count: number, skip: number): Promise<WalletTransaction[]>;
}

export interface NodeClientOptions {
  timeout?: number | undefined;
  retries?: number | undefined;
  retryDelay?: number | undefined;
  maxRetryDelay?: number | undefined;
}
