import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createCustodialAccounts } from '../../../src/core/custodial-accounts';
import { BitcoindRpcClient } from '../../../src/providers/bitcoind-rpc-client';
import { silentLogger } from '../../../src/utils/logger';
import { createUnspent, TXID_A } from '../../fixtures/unspent';
import { FakeNode } from '../../mocks/fake-node';

describe('createCustodialAccounts', () => {
  let cwd: string;

  beforeEach(() => {
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'custody-'));
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
  });

  it('should wire deposits, balances and payouts over one node', async () => {
    const node = new FakeNode([createUnspent(TXID_A, 100_000_000)]);
    const custody = createCustodialAccounts({
      node,
      logger: silentLogger,
      loadOptions: { cwd, env: {} },
    });

    const alice = await custody.accounts.getOrCreateAccount('alice');
    node.walletTransactions = [
      {
        txid: 'deposit-1',
        vout: 0,
        address: 'addr-1',
        category: 'receive',
        amount: 100_000_000,
        confirmations: 3,
      },
    ];
    await custody.deposits.sync();

    const result = await custody.payouts.execute({
      userId: alice.id,
      destination: 'addrX',
      amount: 50_000_000,
    });

    expect(result.ok).toBe(true);
    expect(node.broadcasts[0]?.outputs).toEqual({ addrX: 50_000_000, 'addr-1': 49_990_000 });
    expect(await custody.accounts.balance(alice.id)).toBe(49_990_000);
  });

  it('should build a bitcoind client from the loaded configuration', () => {
    const custody = createCustodialAccounts({
      config: { transactionFee: 5_000 },
      loadOptions: { cwd, env: { BITCOIND_RPC_URL: 'http://node.internal:18443' } },
      logger: silentLogger,
    });

    expect(custody.node).toBeInstanceOf(BitcoindRpcClient);
    expect(custody.config.transactionFee).toBe(5_000);
    expect(custody.config.rpc.url).toBe('http://node.internal:18443');
  });
});
