import { describe, expect, it } from 'vitest';

import type { LedgerRecord } from '../../../src/interfaces/ledger.interface';
import { InMemoryLedgerStore, matchesFilter } from '../../../src/stores/in-memory-ledger-store';

const transfer: LedgerRecord = {
  id: 'rec-1',
  type: 'internal-transfer',
  userId: 'alice',
  amount: 500,
  fee: 0,
  counterpartyUserId: 'bob',
  counterpartyAddress: null,
  externalTxId: null,
  outputIndex: null,
  createdAt: new Date('2024-01-01T00:00:00Z'),
};

describe('InMemoryLedgerStore', () => {
  it('should match users on the requested side', () => {
    expect(matchesFilter(transfer, { userId: 'bob' })).toBe(true);
    expect(matchesFilter(transfer, { userId: 'bob', side: 'owner' })).toBe(false);
    expect(matchesFilter(transfer, { userId: 'bob', side: 'counterparty' })).toBe(true);
    expect(matchesFilter(transfer, { userId: 'carol' })).toBe(false);
    expect(matchesFilter(transfer, { type: 'on-chain-send' })).toBe(false);
  });

  it('should reject a duplicate record id', async () => {
    const store = new InMemoryLedgerStore();
    await store.append(transfer);

    await expect(store.append(transfer)).rejects.toThrow('Ledger record rec-1 already exists');
    expect(store.all()).toHaveLength(1);
  });
});
