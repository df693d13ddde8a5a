import { beforeEach, describe, expect, it, type Mock, vi } from 'vitest';

import { NodeCommandError } from '../../../src/errors';
import { BitcoindRpcClient } from '../../../src/providers/bitcoind-rpc-client';
import { TXID_A } from '../../fixtures/unspent';

function rpcResult(result: unknown) {
  return { status: 200, data: { result, error: null, id: 1 } };
}

function rpcError(status: number, code: number, message: string) {
  return { status, data: { result: null, error: { code, message }, id: 1 } };
}

describe('BitcoindRpcClient', () => {
  let post: Mock;
  let client: BitcoindRpcClient;

  beforeEach(() => {
    post = vi.fn();
    client = new BitcoindRpcClient({
      url: 'http://127.0.0.1:8332/',
      username: 'rpcuser',
      password: 'test-secret',
      retryDelay: 1,
      http: { post },
    });
  });

  it('should post JSON-RPC requests with basic auth', async () => {
    post.mockResolvedValueOnce(rpcResult('addr-1'));

    await client.getNewAddress();

    expect(post).toHaveBeenCalledWith(
      'http://127.0.0.1:8332',
      { jsonrpc: '1.0', id: 1, method: 'getnewaddress', params: [] },
      expect.objectContaining({ auth: { username: 'rpcuser', password: 'test-secret' } }),
    );
  });

  it('should address a named wallet', async () => {
    client = new BitcoindRpcClient({ url: 'http://127.0.0.1:8332', wallet: 'pool', http: { post } });
    post.mockResolvedValueOnce(rpcResult('addr-1'));

    await client.getNewAddress();

    expect(post.mock.calls[0]?.[0]).toBe('http://127.0.0.1:8332/wallet/pool');
  });

  it('should convert unspent amounts to satoshis', async () => {
    post.mockResolvedValueOnce(rpcResult([
      {
        txid: TXID_A,
        vout: 1,
        address: 'addr-1',
        amount: 0.5,
        confirmations: 6,
        spendable: true,
      },
    ]));

    expect(await client.listUnspent()).toEqual([
      {
        txid: TXID_A,
        vout: 1,
        amount: 50_000_000,
        spendable: true,
        confirmations: 6,
        address: 'addr-1',
      },
    ]);
  });

  it('should send output amounts as BTC strings', async () => {
    post.mockResolvedValueOnce(rpcResult('0200raw'));

    const raw = await client.createRawTransaction(
      [{ txid: TXID_A, vout: 0 }],
      { addrX: 50_000_000, 'addr-change': 9_990_000 },
    );

    expect(raw).toBe('0200raw');
    expect(post.mock.calls[0]?.[1]).toEqual({
      jsonrpc: '1.0',
      id: 1,
      method: 'createrawtransaction',
      params: [[{ txid: TXID_A, vout: 0 }], { addrX: '0.50000000', 'addr-change': '0.09990000' }],
    });
  });

  it('should decode outputs with either address field', async () => {
    post.mockResolvedValueOnce(rpcResult({
      txid: 'decoded',
      vin: [{ txid: TXID_A, vout: 0 }],
      vout: [
        { value: 0.5, n: 0, scriptPubKey: { address: 'addrX' } },
        { value: 0.0999, n: 1, scriptPubKey: { addresses: ['addr-change'] } },
      ],
    }));

    expect(await client.decodeRawTransaction('0200raw')).toEqual({
      txid: 'decoded',
      vin: [{ txid: TXID_A, vout: 0 }],
      vout: [
        { n: 0, amount: 50_000_000, addresses: ['addrX'] },
        { n: 1, amount: 9_990_000, addresses: ['addr-change'] },
      ],
    });
  });

  it('should map node errors to NodeCommandError', async () => {
    post.mockResolvedValueOnce(rpcError(500, -25, 'bad-txns-inputs-missingorspent'));

    const error = await client.sendRawTransaction('signed').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NodeCommandError);
    expect(error).toMatchObject({
      message: 'Node command sendrawtransaction failed: bad-txns-inputs-missingorspent',
      method: 'sendrawtransaction',
      rpcCode: -25,
      status: 500,
    });
  });

  it('should never retry a broadcast', async () => {
    post.mockRejectedValueOnce(new Error('socket hang up'));

    await expect(client.sendRawTransaction('signed')).rejects.toThrow(
      'Node command sendrawtransaction failed: socket hang up',
    );
    expect(post).toHaveBeenCalledTimes(1);
  });

  it('should retry read-only commands', async () => {
    post.mockRejectedValueOnce(new Error('ECONNRESET')).mockResolvedValueOnce(rpcResult([]));

    expect(await client.listUnspent()).toEqual([]);
    expect(post).toHaveBeenCalledTimes(2);
  });

  it('should report HTTP failures without a JSON-RPC body', async () => {
    post.mockResolvedValueOnce({ status: 401, data: '' });

    await expect(client.getNewAddress()).rejects.toThrow(
      'Node command getnewaddress failed: HTTP 401',
    );
  });

  describe('signRawTransaction', () => {
    it('should return the signed hex', async () => {
      post.mockResolvedValueOnce(rpcResult({ hex: 'signed', complete: true }));

      expect(await client.signRawTransaction('0200raw')).toBe('signed');
      expect(post.mock.calls[0]?.[1]).toMatchObject({ method: 'signrawtransactionwithwallet' });
    });

    it('should fall back to the legacy command on older nodes', async () => {
      post
        .mockResolvedValueOnce(rpcError(404, -32601, 'Method not found'))
        .mockResolvedValueOnce(rpcResult({ hex: 'signed', complete: true }));

      expect(await client.signRawTransaction('0200raw')).toBe('signed');
      expect(post.mock.calls[1]?.[1]).toEqual({
        jsonrpc: '1.0',
        id: 2,
        method: 'signrawtransaction',
        params: ['0200raw'],
      });
    });

    it('should reject an incomplete signature', async () => {
      post.mockResolvedValueOnce(rpcResult({
        hex: 'partial',
        complete: false,
        errors: [{ txid: TXID_A, vout: 0, error: 'Unable to sign input' }],
      }));

      await expect(client.signRawTransaction('0200raw')).rejects.toThrow(
        'Node command signrawtransactionwithwallet failed: Signature incomplete: ' +
          'Unable to sign input',
      );
    });
  });

  it('should list wallet transactions and skip entries without a txid', async () => {
    post.mockResolvedValueOnce(rpcResult([
      {
        address: 'addr-1',
        category: 'receive',
        amount: 0.25,
        vout: 0,
        confirmations: 3,
        txid: 'deposit-1',
      },
      { category: 'move', amount: 0.1 },
    ]));

    expect(await client.listTransactions(10, 0)).toEqual([
      {
        txid: 'deposit-1',
        vout: 0,
        address: 'addr-1',
        category: 'receive',
        amount: 25_000_000,
        confirmations: 3,
      },
    ]);
    expect(post.mock.calls[0]?.[1]).toMatchObject({ params: ['*', 10, 0] });
  });
});
