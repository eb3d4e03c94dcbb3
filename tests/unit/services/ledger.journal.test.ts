/**
 * Unit tests for the file-backed ledger journal
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';

import { FileLedgerJournal } from '../../../src/services/ledger/ledger.journal';
import { LedgerTransaction } from '../../../src/services/ledger/ledger.types';

const sample = (overrides: Partial<LedgerTransaction> = {}): LedgerTransaction => ({
  transactionId: '1',
  clientId: 1,
  amount: 250,
  kind: 'debit',
  description: 'coffee',
  executedAt: new Date('2026-02-10T08:30:00.000Z'),
  sequence: 1,
  ...overrides,
});

describe('FileLedgerJournal', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ledger-journal-'));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should replay nothing when the file does not exist', async () => {
    const journal = new FileLedgerJournal(path.join(dir, 'missing.jsonl'));
    await expect(journal.replay()).resolves.toEqual([]);
  });

  it('should write one JSON line per transaction', async () => {
    const file = path.join(dir, 'journal.jsonl');
    const journal = new FileLedgerJournal(file);

    await journal.append(sample());

    const raw = await fs.readFile(file, 'utf-8');
    expect(raw).toBe(
      '{"transactionId":"1","clientId":1,"amount":250,"kind":"debit","description":"coffee",' +
        '"executedAt":"2026-02-10T08:30:00.000Z","sequence":1}\n'
    );
  });

  it('should create missing parent directories', async () => {
    const file = path.join(dir, 'nested', 'deeper', 'journal.jsonl');
    const journal = new FileLedgerJournal(file);

    await journal.append(sample());

    await expect(journal.replay()).resolves.toHaveLength(1);
  });

  it('should replay entries in append order with dates restored', async () => {
    const journal = new FileLedgerJournal(path.join(dir, 'journal.jsonl'));
    await journal.append(sample());
    await journal.append(sample({ transactionId: '2', kind: 'credit', description: 'refund', sequence: 2 }));

    const entries = await journal.replay();

    expect(entries.map((entry) => entry.transactionId)).toEqual(['1', '2']);
    expect(entries[0].executedAt).toBeInstanceOf(Date);
    expect(entries[0].executedAt.toISOString()).toBe('2026-02-10T08:30:00.000Z');
    expect(entries[1]).toMatchObject({ kind: 'credit', description: 'refund', sequence: 2 });
  });

  it('should ignore blank lines', async () => {
    const file = path.join(dir, 'journal.jsonl');
    const journal = new FileLedgerJournal(file);
    await journal.append(sample());
    await fs.appendFile(file, '\n\n', 'utf-8');

    await expect(journal.replay()).resolves.toHaveLength(1);
  });

  it('should reject an entry with the wrong shape', async () => {
    const file = path.join(dir, 'journal.jsonl');
    await fs.writeFile(file, '{"transactionId":"1","clientId":"one"}\n', 'utf-8');

    await expect(new FileLedgerJournal(file).replay()).rejects.toThrow(
      `Corrupt ledger journal entry at line 1 of ${file}`
    );
  });

  describe('failed appends', () => {
    it('should roll back a line that was written before the append failed', async () => {
      const file = path.join(dir, 'journal.jsonl');
      const journal = new FileLedgerJournal(file);
      await journal.append(sample());
      const before = await fs.readFile(file, 'utf-8');

      jest.spyOn(fs, 'appendFile').mockImplementationOnce(async (target, data) => {
        await fs.writeFile(target, data, { flag: 'a' });
        throw new Error('EIO: close failed');
      });

      await expect(journal.append(sample({ transactionId: '2', sequence: 2 }))).rejects.toThrow(
        'EIO: close failed'
      );

      expect(await fs.readFile(file, 'utf-8')).toBe(before);
      expect((await journal.replay()).map((entry) => entry.transactionId)).toEqual(['1']);
    });

    it('should keep later appends after a rolled back one', async () => {
      const file = path.join(dir, 'journal.jsonl');
      const journal = new FileLedgerJournal(file);

      jest.spyOn(fs, 'appendFile').mockRejectedValueOnce(new Error('ENOSPC'));

      await expect(journal.append(sample())).rejects.toThrow('ENOSPC');
      await journal.append(sample({ transactionId: '2', sequence: 1 }));

      expect((await journal.replay()).map((entry) => entry.transactionId)).toEqual(['2']);
    });

    it('should serialize concurrent appends', async () => {
      const journal = new FileLedgerJournal(path.join(dir, 'journal.jsonl'));

      await Promise.all(
        Array.from({ length: 20 }, (_, i) =>
          journal.append(sample({ transactionId: String(i + 1), sequence: i + 1 }))
        )
      );

      const ids = (await journal.replay()).map((entry) => entry.transactionId);
      expect(ids).toEqual(Array.from({ length: 20 }, (_, i) => String(i + 1)));
    });
  });
});
