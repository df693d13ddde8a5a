import { beforeEach, describe, expect, it } from 'vitest';

import { Ledger, signedAmountFor } from '../../../src/core/ledger';
import {
  InsufficientBalanceError,
  InvalidAmountError,
  InvalidTransferError,
} from '../../../src/errors';
import type { LedgerRecord } from '../../../src/interfaces/ledger.interface';
import { InMemoryLedgerStore } from '../../../src/stores/in-memory-ledger-store';

function record(overrides: Partial<LedgerRecord>): LedgerRecord {
  return {
    id: 'r1',
    type: 'internal-transfer',
    userId: 'alice',
    amount: 1_000,
    fee: 0,
    counterpartyUserId: null,
    counterpartyAddress: null,
    externalTxId: null,
    outputIndex: null,
    createdAt: new Date('2024-01-01T00:00:00Z'),
    ...overrides,
  };
}

describe('Ledger', () => {
  let store: InMemoryLedgerStore;
  let ledger: Ledger;
  let ids: number;

  beforeEach(() => {
    store = new InMemoryLedgerStore();
    ids = 0;
    ledger = new Ledger({
      store,
      now: () => new Date('2024-01-01T00:00:00Z'),
      generateId: () => `rec-${++ids}`,
    });
  });

  describe('signedAmountFor', () => {
    it('should debit the sender and credit the recipient of a transfer', () => {
      const transfer = record({ counterpartyUserId: 'bob' });

      expect(signedAmountFor(transfer, 'alice')).toBe(-1_000);
      expect(signedAmountFor(transfer, 'bob')).toBe(1_000);
      expect(signedAmountFor(transfer, 'carol')).toBe(0);
    });

    it('should debit amount plus fee for an on-chain send', () => {
      const send = record({ type: 'on-chain-send', fee: 10, externalTxId: 'tx1' });

      expect(signedAmountFor(send, 'alice')).toBe(-1_010);
    });

    it('should credit an on-chain receive', () => {
      const receive = record({ type: 'on-chain-receive', externalTxId: 'tx1', outputIndex: 0 });

      expect(signedAmountFor(receive, 'alice')).toBe(1_000);
    });
  });

  it('should start every user at zero', async () => {
    expect(await ledger.balance('nobody')).toBe(0);
  });

  it('should keep the sum of balances constant across internal transfers', async () => {
    await ledger.recordOnChainReceive('alice', 100_000_000, 'addr-1', 'deposit-1', 0);

    await ledger.recordInternalTransfer('alice', 'bob', 30_000_000);
    await ledger.recordInternalTransfer('bob', 'carol', 10_000_000);
    await ledger.recordInternalTransfer('carol', 'alice', 5_000_000);

    const balances = await Promise.all(['alice', 'bob', 'carol'].map((id) => ledger.balance(id)));
    expect(balances).toEqual([75_000_000, 20_000_000, 5_000_000]);
    expect(balances.reduce((sum, value) => sum + value, 0)).toBe(100_000_000);
  });

  it('should allow transferring the whole balance', async () => {
    await ledger.recordOnChainReceive('alice', 50_000_000, 'addr-1', 'deposit-1', 0);

    await ledger.recordInternalTransfer('alice', 'bob', 50_000_000);

    expect(await ledger.balance('alice')).toBe(0);
    expect(await ledger.balance('bob')).toBe(50_000_000);
  });

  it('should reject a transfer above the balance and leave the ledger unchanged', async () => {
    await ledger.recordOnChainReceive('alice', 50_000_000, 'addr-1', 'deposit-1', 0);

    await expect(ledger.recordInternalTransfer('alice', 'bob', 50_000_001)).rejects.toThrow(
      InsufficientBalanceError,
    );
    expect(store.all()).toHaveLength(1);
    expect(await ledger.balance('alice')).toBe(50_000_000);
  });

  it('should reject transfers to the same user', async () => {
    await ledger.recordOnChainReceive('alice', 1_000, 'addr-1', 'deposit-1', 0);

    await expect(ledger.recordInternalTransfer('alice', 'alice', 500)).rejects.toThrow(
      InvalidTransferError,
    );
  });

  it('should reject non-positive and fractional amounts', async () => {
    await expect(ledger.recordInternalTransfer('alice', 'bob', 0)).rejects.toThrow(
      InvalidAmountError,
    );
    await expect(ledger.recordInternalTransfer('alice', 'bob', 1.5)).rejects.toThrow(
      InvalidAmountError,
    );
  });

  it('should debit amount plus fee for an on-chain send', async () => {
    await ledger.recordOnChainReceive('alice', 100_000_000, 'addr-1', 'deposit-1', 0);

    const sent = await ledger.recordOnChainSend('alice', 50_000_000, 10_000, 'addrX', 'tx-1');

    expect(sent).toEqual({
      id: 'rec-2',
      type: 'on-chain-send',
      userId: 'alice',
      amount: 50_000_000,
      fee: 10_000,
      counterpartyUserId: null,
      counterpartyAddress: 'addrX',
      externalTxId: 'tx-1',
      outputIndex: null,
      createdAt: new Date('2024-01-01T00:00:00Z'),
    });
    expect(await ledger.balance('alice')).toBe(49_990_000);
  });

  it('should count the fee when checking a send against the balance', async () => {
    await ledger.recordOnChainReceive('alice', 50_000_000, 'addr-1', 'deposit-1', 0);

    await expect(
      ledger.recordOnChainSend('alice', 50_000_000, 10_000, 'addrX', 'tx-1'),
    ).rejects.toThrow(InsufficientBalanceError);
  });

  it('should require a destination and transaction id for a send', async () => {
    await ledger.recordOnChainReceive('alice', 50_000_000, 'addr-1', 'deposit-1', 0);

    await expect(ledger.recordOnChainSend('alice', 1_000, 0, '', 'tx-1')).rejects.toThrow(
      InvalidTransferError,
    );
  });

  it('should return frozen records', async () => {
    const deposit = await ledger.recordOnChainReceive('alice', 1_000, 'addr-1', 'deposit-1', 0);

    expect(Object.isFrozen(deposit)).toBe(true);
  });

  it('should list history from both sides of a transfer', async () => {
    await ledger.recordOnChainReceive('alice', 1_000, 'addr-1', 'deposit-1', 0);
    await ledger.recordInternalTransfer('alice', 'bob', 400);

    const history = await ledger.history('bob');

    expect(history.map((entry) => entry.id)).toEqual(['rec-2']);
  });

  it('should let only one of two concurrent overdrafts through', async () => {
    await ledger.recordOnChainReceive('alice', 100, 'addr-1', 'deposit-1', 0);

    const results = await Promise.allSettled([
      ledger.recordInternalTransfer('alice', 'bob', 60),
      ledger.recordInternalTransfer('alice', 'carol', 60),
    ]);

    expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected']);
    expect(await ledger.balance('alice')).toBe(40);
  });

  it('should serialize balance checks inside a user session', async () => {
    await ledger.recordOnChainReceive('alice', 100, 'addr-1', 'deposit-1', 0);

    const balances = await Promise.all([
      ledger.withUserLock('alice', async (session) => {
        const before = await session.balance();
        await session.recordInternalTransfer('bob', 30);
        return before;
      }),
      ledger.withUserLock('alice', (session) => session.balance()),
    ]);

    expect(balances).toEqual([100, 70]);
  });
});
