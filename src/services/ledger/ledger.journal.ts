import { promises as fs } from 'fs';
import path from 'path';

import { KeyedMutex } from '../../utils/keyedMutex';
import { LedgerTransaction, TransactionKind } from './ledger.types';

/**
 * Write-ahead log for the embedded store. An entry is appended before the
 * in-memory commit, so a failed append leaves the ledger untouched.
 */
export interface LedgerJournal {
  append(transaction: LedgerTransaction): Promise<void>;
  replay(): Promise<LedgerTransaction[]>;
}

interface JournalRecord {
  transactionId: string;
  clientId: number;
  amount: number;
  kind: TransactionKind;
  description: string;
  executedAt: string;
  sequence: number;
}

const toRecord = (transaction: LedgerTransaction): JournalRecord => ({
  transactionId: transaction.transactionId,
  clientId: transaction.clientId,
  amount: transaction.amount,
  kind: transaction.kind,
  description: transaction.description,
  executedAt: transaction.executedAt.toISOString(),
  sequence: transaction.sequence,
});

const isJournalRecord = (value: unknown): value is JournalRecord => {
  if (typeof value !== 'object' || value === null) return false;
  const record: Record<string, unknown> = Object.fromEntries(Object.entries(value));
  return (
    typeof record.transactionId === 'string' &&
    typeof record.clientId === 'number' &&
    typeof record.amount === 'number' &&
    (record.kind === 'credit' || record.kind === 'debit') &&
    typeof record.description === 'string' &&
    typeof record.executedAt === 'string' &&
    typeof record.sequence === 'number'
  );
};

const isMissingFile = (error: unknown): boolean => {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
};

/**
 * JSON-lines journal on the local filesystem.
 *
 * Appends are serialized; a failed append truncates the file back to its
 * previous length, so a rejected transaction is never replayed.
 */
export class FileLedgerJournal implements LedgerJournal {
  private readonly writes = new KeyedMutex<string>();

  constructor(private readonly filePath: string) {}

  async append(transaction: LedgerTransaction): Promise<void> {
    const line = `${JSON.stringify(toRecord(transaction))}\n`;

    await this.writes.runExclusive(this.filePath, async () => {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      const previousSize = await this.currentSize();

      try {
        await fs.appendFile(this.filePath, line, 'utf-8');
      } catch (error) {
        await this.rollback(previousSize);
        throw error;
      }
    });
  }

  async replay(): Promise<LedgerTransaction[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }

    return raw
      .split('\n')
      .filter((line) => line.trim().length > 0)
      .map((line, index) => {
        const parsed: unknown = JSON.parse(line);
        if (!isJournalRecord(parsed)) {
          throw new Error(`Corrupt ledger journal entry at line ${index + 1} of ${this.filePath}`);
        }
        return { ...parsed, executedAt: new Date(parsed.executedAt) };
      });
  }

  private async rollback(size: number): Promise<void> {
    try {
      await fs.truncate(this.filePath, size);
    } catch (error) {
      if (isMissingFile(error)) {
        return;
      }
      throw new Error(`Ledger journal ${this.filePath} could not be rolled back to ${size} bytes`, {
        cause: error,
      });
    }
  }

  private async currentSize(): Promise<number> {
    try {
      return (await fs.stat(this.filePath)).size;
    } catch (error) {
      if (isMissingFile(error)) {
        return 0;
      }
      throw error;
    }
  }
}
