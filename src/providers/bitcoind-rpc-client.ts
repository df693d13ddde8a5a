/**
 * bitcoind JSON-RPC client
 * Implements the node capability set over HTTP, converting BTC decimals to
 * satoshis at the boundary
 */

import axios from 'axios';
import type { AxiosInstance } from 'axios';

import { errorMessage, NodeCommandError } from '../errors/index.ts';
import type {
  DecodedOutput,
  DecodedTransaction,
  NodeClientOptions,
  OutPoint,
  RawTransactionOutputs,
  UnspentOutput,
  WalletTransaction,
  WalletTransactionCategory,
} from '../interfaces/node.interface.ts';
import { formatBtc, parseBtc } from '../utils/amount.ts';
import type { Logger } from '../utils/logger.ts';
import { silentLogger } from '../utils/logger.ts';
import {
  getOptionalBoolean,
  getOptionalNumber,
  getOptionalString,
  isRecord,
  isStringArray,
} from '../utils/type-guards.ts';

import { BaseNodeClient } from './base-node-client.ts';

const RPC_METHOD_NOT_FOUND = -32601;

const WALLET_CATEGORIES: readonly WalletTransactionCategory[] = [
  'send',
  'receive',
  'generate',
  'immature',
  'orphan',
  'move',
];

export type RpcHttpClient = Pick<AxiosInstance, 'post'>;

export interface BitcoindRpcClientOptions extends NodeClientOptions {
  url: string;
  username?: string | undefined;
  password?: string | undefined;
  /** Wallet name for multi-wallet nodes (`/wallet/<name>`) */
  wallet?: string | undefined;
  http?: RpcHttpClient | undefined;
  logger?: Logger | undefined;
}

interface CallOptions {
  /** Read-only commands may be retried */
  retry: boolean;
  /** Broadcasts run to a definitive answer without a client-side timeout */
  timeout: boolean;
}

export class BitcoindRpcClient extends BaseNodeClient {
  private readonly url: string;
  private readonly auth: { username: string; password: string } | undefined;
  private readonly http: RpcHttpClient;
  private readonly logger: Logger;
  private nextId = 1;

  constructor(options: BitcoindRpcClientOptions) {
    super(options);
    const base = options.url.replace(/\/+$/, '');
    this.url = options.wallet ? `${base}/wallet/${encodeURIComponent(options.wallet)}` : base;
    this.auth = options.username !== undefined
      ? { username: options.username, password: options.password ?? '' }
      : undefined;
    this.http = options.http ?? axios.create();
    this.logger = options.logger ?? silentLogger;
  }

  async listUnspent(): Promise<UnspentOutput[]> {
    const result = await this.call('listunspent', [], { retry: true, timeout: true });
    return this.expectArray('listunspent', result).map((entry) => parseUnspent(entry));
  }

  async createRawTransaction(
    inputs: OutPoint[],
    outputs: RawTransactionOutputs,
  ): Promise<string> {
    const btcOutputs: Record<string, string> = {};
    for (const [address, satoshis] of Object.entries(outputs)) {
      btcOutputs[address] = formatBtc(satoshis);
    }
    const result = await this.call(
      'createrawtransaction',
      [inputs.map(({ txid, vout }) => ({ txid, vout })), btcOutputs],
      { retry: false, timeout: true },
    );
    return this.expectString('createrawtransaction', result);
  }

  async decodeRawTransaction(rawHex: string): Promise<DecodedTransaction> {
    const result = await this.call('decoderawtransaction', [rawHex], {
      retry: true,
      timeout: true,
    });
    return parseDecoded(result);
  }

  /**
   * Signs with `signrawtransactionwithwallet`, falling back to the legacy
   * `signrawtransaction` on nodes that predate it
   */
  async signRawTransaction(rawHex: string): Promise<string> {
    let method = 'signrawtransactionwithwallet';
    let result: unknown;
    try {
      result = await this.call(method, [rawHex], { retry: false, timeout: true });
    } catch (error) {
      if (!(error instanceof NodeCommandError) || error.rpcCode !== RPC_METHOD_NOT_FOUND) {
        throw error;
      }
      method = 'signrawtransaction';
      result = await this.call(method, [rawHex], { retry: false, timeout: true });
    }

    if (!isRecord(result)) {
      throw new NodeCommandError(method, 'Unexpected response shape');
    }
    const hex = getOptionalString(result.hex);
    if (!hex) {
      throw new NodeCommandError(method, 'Response carries no signed hex');
    }
    if (getOptionalBoolean(result.complete) === false) {
      const reasons = Array.isArray(result.errors)
        ? result.errors
          .map((entry) => (isRecord(entry) ? getOptionalString(entry.error) : undefined))
          .filter((reason): reason is string => reason !== undefined)
        : [];
      throw new NodeCommandError(
        method,
        `Signature incomplete${reasons.length > 0 ? `: ${reasons.join('; ')}` : ''}`,
      );
    }
    return hex;
  }

  async sendRawTransaction(signedHex: string): Promise<string> {
    const result = await this.call('sendrawtransaction', [signedHex], {
      retry: false,
      timeout: false,
    });
    return this.expectString('sendrawtransaction', result);
  }

  async getNewAddress(): Promise<string> {
    const result = await this.call('getnewaddress', [], { retry: false, timeout: true });
    return this.expectString('getnewaddress', result);
  }

  async listTransactions(count: number, skip: number): Promise<WalletTransaction[]> {
    const result = await this.call('listtransactions', ['*', count, skip], {
      retry: true,
      timeout: true,
    });
    return this.expectArray('listtransactions', result)
      .map((entry) => parseWalletTransaction(entry))
      .filter((entry): entry is WalletTransaction => entry !== null);
  }

  /**
   * Execute a bitcoind command and return its `result`
   */
  private call(method: string, params: unknown[], options: CallOptions): Promise<unknown> {
    const request = () => this.post(method, params);
    if (options.retry) {
      return this.executeWithRetry(request);
    }
    return options.timeout ? this.executeWithTimeout(request) : request();
  }

  private async post(method: string, params: unknown[]): Promise<unknown> {
    const id = this.nextId++;
    this.logger.debug?.('RPC request', { method, id });

    let status: number;
    let body: unknown;
    try {
      const response = await this.http.post<unknown>(
        this.url,
        { jsonrpc: '1.0', id, method, params },
        {
          auth: this.auth,
          headers: { 'Content-Type': 'application/json' },
          validateStatus: () => true,
        },
      );
      status = response.status;
      body = response.data;
    } catch (error) {
      throw new NodeCommandError(method, errorMessage(error));
    }

    if (isRecord(body) && isRecord(body.error)) {
      throw new NodeCommandError(
        method,
        getOptionalString(body.error.message) ?? 'Unknown RPC error',
        { rpcCode: getOptionalNumber(body.error.code), status },
      );
    }
    if (status !== 200) {
      throw new NodeCommandError(method, `HTTP ${status}`, { status });
    }
    if (!isRecord(body) || !('result' in body)) {
      throw new NodeCommandError(method, 'Malformed JSON-RPC response', { status });
    }
    return body.result;
  }

  private expectString(method: string, result: unknown): string {
    if (typeof result !== 'string' || result.length === 0) {
      throw new NodeCommandError(method, 'Expected a string result');
    }
    return result;
  }

  private expectArray(method: string, result: unknown): unknown[] {
    if (!Array.isArray(result)) {
      throw new NodeCommandError(method, 'Expected an array result');
    }
    return result;
  }
}

function parseUnspent(entry: unknown): UnspentOutput {
  const txid = isRecord(entry) ? getOptionalString(entry.txid) : undefined;
  const vout = isRecord(entry) ? getOptionalNumber(entry.vout) : undefined;
  const amount = isRecord(entry) ? getOptionalNumber(entry.amount) : undefined;
  if (!isRecord(entry) || txid === undefined || vout === undefined || amount === undefined) {
    throw new NodeCommandError('listunspent', 'Malformed unspent output');
  }
  return {
    txid,
    vout,
    amount: parseBtc(amount),
    spendable: getOptionalBoolean(entry.spendable) ?? false,
    confirmations: getOptionalNumber(entry.confirmations),
    address: getOptionalString(entry.address),
  };
}

function parseDecoded(result: unknown): DecodedTransaction {
  if (!isRecord(result) || !Array.isArray(result.vin) || !Array.isArray(result.vout)) {
    throw new NodeCommandError('decoderawtransaction', 'Malformed decoded transaction');
  }

  const vin = result.vin.map((input) => {
    const txid = isRecord(input) ? getOptionalString(input.txid) : undefined;
    const vout = isRecord(input) ? getOptionalNumber(input.vout) : undefined;
    if (txid === undefined || vout === undefined) {
      throw new NodeCommandError('decoderawtransaction', 'Malformed input');
    }
    return { txid, vout };
  });

  const vout = result.vout.map((output, index): DecodedOutput => {
    const value = isRecord(output) ? getOptionalNumber(output.value) : undefined;
    if (!isRecord(output) || value === undefined) {
      throw new NodeCommandError('decoderawtransaction', 'Malformed output');
    }
    const script: Record<string, unknown> = isRecord(output.scriptPubKey)
      ? output.scriptPubKey
      : {};
    const single = getOptionalString(script.address);
    const addresses = single !== undefined
      ? [single]
      : isStringArray(script.addresses)
      ? script.addresses
      : [];
    return {
      n: getOptionalNumber(output.n) ?? index,
      amount: parseBtc(value),
      addresses,
    };
  });

  return { txid: getOptionalString(result.txid) ?? '', vin, vout };
}

function isWalletCategory(value: unknown): value is WalletTransactionCategory {
  return WALLET_CATEGORIES.some((category) => category === value);
}

function parseWalletTransaction(entry: unknown): WalletTransaction | null {
  if (!isRecord(entry) || !isWalletCategory(entry.category)) {
    return null;
  }
  const txid = getOptionalString(entry.txid);
  const amount = getOptionalNumber(entry.amount);
  if (txid === undefined || amount === undefined) {
    return null; // move entries carry no txid
  }
  return {
    txid,
    vout: getOptionalNumber(entry.vout) ?? 0,
    address: getOptionalString(entry.address),
    category: entry.category,
    amount: parseBtc(amount),
    confirmations: getOptionalNumber(entry.confirmations) ?? 0,
  };
}
