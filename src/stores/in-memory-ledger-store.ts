/**
 * In-memory append-only ledger store
 */

import type {
  ILedgerStore,
  LedgerFilter,
  LedgerRecord,
} from '../interfaces/ledger.interface.ts';

export function matchesFilter(record: LedgerRecord, filter: LedgerFilter): boolean {
  if (filter.userId !== undefined) {
    const side = filter.side ?? 'any';
    const isOwner = record.userId === filter.userId;
    const isCounterparty = record.counterpartyUserId === filter.userId;
    if (side === 'owner' && !isOwner) return false;
    if (side === 'counterparty' && !isCounterparty) return false;
    if (side === 'any' && !isOwner && !isCounterparty) return false;
  }
  if (filter.type !== undefined && record.type !== filter.type) {
    return false;
  }
  if (filter.externalTxId !== undefined && record.externalTxId !== filter.externalTxId) {
    return false;
  }
  return true;
}

export class InMemoryLedgerStore implements ILedgerStore {
  private readonly records: LedgerRecord[] = [];

  append(record: LedgerRecord): Promise<void> {
    if (this.records.some((existing) => existing.id === record.id)) {
      return Promise.reject(new Error(`Ledger record ${record.id} already exists`));
    }
    this.records.push(record);
    return Promise.resolve();
  }

  query(filter: LedgerFilter): Promise<LedgerRecord[]> {
    return Promise.resolve(this.records.filter((record) => matchesFilter(record, filter)));
  }

  /**
   * All records in append order
   */
  all(): LedgerRecord[] {
    return [...this.records];
  }
}
