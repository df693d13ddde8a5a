/**
 * Base Node Client
 * Timeout and retry plumbing shared by node client implementations
 */

import type {
  DecodedTransaction,
  INodeClient,
  NodeClientOptions,
  OutPoint,
  RawTransactionOutputs,
  UnspentOutput,
  WalletTransaction,
} from '../interfaces/node.interface.ts';

export abstract class BaseNodeClient implements INodeClient {
  protected timeout: number;
  protected retries: number;
  protected retryDelay: number;
  protected maxRetryDelay: number;

  constructor(options: NodeClientOptions = {}) {
    this.timeout = options.timeout ?? 30000;
    this.retries = options.retries ?? 2;
    this.retryDelay = options.retryDelay ?? 500;
    this.maxRetryDelay = options.maxRetryDelay ?? 5000;
  }

  abstract listUnspent(): Promise<UnspentOutput[]>;
  abstract createRawTransaction(
    inputs: OutPoint[],
    outputs: RawTransactionOutputs,
  ): Promise<string>;
  abstract decodeRawTransaction(rawHex: string): Promise<DecodedTransaction>;
  abstract signRawTransaction(rawHex: string): Promise<string>;
  abstract sendRawTransaction(signedHex: string): Promise<string>;
  abstract getNewAddress(): Promise<string>;
  abstract listTransactions(count: number, skip: number): Promise<WalletTransaction[]>;

  /**
   * Execute a read-only request with retry logic. Never use for commands
   * with side effects.
   */
  protected async executeWithRetry<T>(
    fn: () => Promise<T>,
    retries = this.retries,
  ): Promise<T> {
    let lastError: unknown;
    let delay = this.retryDelay;

    for (let i = 0; i <= retries; i++) {
      try {
        return await this.executeWithTimeout(fn);
      } catch (error) {
        lastError = error;

        if (i < retries) {
          await this.sleep(delay);
          delay = Math.min(delay * 2, this.maxRetryDelay); // Exponential backoff
        }
      }
    }

    throw lastError instanceof Error ? lastError : new Error('Request failed after retries');
  }

  /**
   * Execute request with timeout
   */
  protected async executeWithTimeout<T>(
    fn: () => Promise<T>,
    timeout = this.timeout,
  ): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    try {
      return await Promise.race([
        fn(),
        new Promise<T>((_, reject) => {
          timer = setTimeout(() => reject(new Error('Request timeout')), timeout);
        }),
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  protected sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
