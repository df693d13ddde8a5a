/**
 * JSON-lines ledger store
 * One record per line, appended to a file and never rewritten
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

import type {
  ILedgerStore,
  LedgerFilter,
  LedgerRecord,
  LedgerRecordType,
} from '../interfaces/ledger.interface.ts';
import { getOptionalNumber, getOptionalString, isRecord } from '../utils/type-guards.ts';

import { matchesFilter } from './in-memory-ledger-store.ts';

const RECORD_TYPES: readonly LedgerRecordType[] = [
  'internal-transfer',
  'on-chain-send',
  'on-chain-receive',
];

function isRecordType(value: unknown): value is LedgerRecordType {
  return RECORD_TYPES.some((type) => type === value);
}

/**
 * Parse one stored line back into a record
 */
export function parseLedgerLine(line: string, lineNumber: number): LedgerRecord {
  const parsed: unknown = JSON.parse(line);
  const id = isRecord(parsed) ? getOptionalString(parsed.id) : undefined;
  const userId = isRecord(parsed) ? getOptionalString(parsed.userId) : undefined;
  const amount = isRecord(parsed) ? getOptionalNumber(parsed.amount) : undefined;
  const createdAt = isRecord(parsed) ? getOptionalString(parsed.createdAt) : undefined;

  if (
    !isRecord(parsed) || !id || !userId || amount === undefined || !createdAt ||
    !isRecordType(parsed.type)
  ) {
    throw new Error(`Malformed ledger record on line ${lineNumber}`);
  }

  return Object.freeze({
    id,
    type: parsed.type,
    userId,
    amount,
    fee: getOptionalNumber(parsed.fee) ?? 0,
    counterpartyUserId: getOptionalString(parsed.counterpartyUserId) ?? null,
    counterpartyAddress: getOptionalString(parsed.counterpartyAddress) ?? null,
    externalTxId: getOptionalString(parsed.externalTxId) ?? null,
    outputIndex: getOptionalNumber(parsed.outputIndex) ?? null,
    createdAt: new Date(createdAt),
  });
}

export class JsonlLedgerStore implements ILedgerStore {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async append(record: LedgerRecord): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    const line = JSON.stringify({
      ...record,
      createdAt: record.createdAt.toISOString(),
    });
    await fs.promises.appendFile(this.filePath, `${line}\n`, 'utf-8');
  }

  async query(filter: LedgerFilter): Promise<LedgerRecord[]> {
    const records = await this.readAll();
    return records.filter((record) => matchesFilter(record, filter));
  }

  private async readAll(): Promise<LedgerRecord[]> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isRecord(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    return content
      .split('\n')
      .map((line, index) => ({ line: line.trim(), lineNumber: index + 1 }))
      .filter(({ line }) => line.length > 0)
      .map(({ line, lineNumber }) => parseLedgerLine(line, lineNumber));
  }
}
