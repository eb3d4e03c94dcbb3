import { KeyedMutex } from '../../utils/keyedMutex';
import { createServiceLogger } from '../../observability/logger';
import { LedgerJournal } from './ledger.journal';
import {
  LedgerEntryInput,
  LedgerMutationResult,
  LedgerRepository,
  LedgerSnapshot,
  LedgerTransaction,
  ProvisionedClient,
  isBalanceInRange,
  isWithinLimit,
  signedAmount,
} from './ledger.types';

const log = createServiceLogger('memory-ledger');

interface ClientRow {
  clientId: number;
  limit: number;
  balance: number;
  /** Insertion order, which is also executedAt order */
  transactions: LedgerTransaction[];
}

export interface InMemoryLedgerOptions {
  journal?: LedgerJournal;
  clock?: () => Date;
}

/**
 * Embedded ledger store.
 *
 * Mutations for one client run under that client's mutex; the in-memory
 * commit of balance and log happens in a single synchronous step, so
 * readers never see one without the other.
 */
export class InMemoryLedgerRepository implements LedgerRepository {
  readonly kind = 'memory' as const;

  private readonly rows = new Map<number, ClientRow>();
  private readonly locks = new KeyedMutex<number>();
  private readonly journal?: LedgerJournal;
  private readonly clock: () => Date;
  private lastTransactionId = 0;
  private restored = false;

  constructor(options: InMemoryLedgerOptions = {}) {
    this.journal = options.journal;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Insert clients that do not exist yet, then replay the journal once
   */
  async provision(clients: ProvisionedClient[]): Promise<void> {
    for (const client of clients) {
      if (!this.rows.has(client.clientId)) {
        this.rows.set(client.clientId, {
          clientId: client.clientId,
          limit: client.limit,
          balance: 0,
          transactions: [],
        });
      }
    }

    if (this.journal && !this.restored) {
      await this.restore(this.journal);
    }
    this.restored = true;
  }

  async listClients(): Promise<ProvisionedClient[]> {
    return [...this.rows.values()]
      .map((row) => ({ clientId: row.clientId, limit: row.limit }))
      .sort((a, b) => a.clientId - b.clientId);
  }

  async applyTransaction(clientId: number, entry: LedgerEntryInput): Promise<LedgerMutationResult> {
    const row = this.rows.get(clientId);
    if (!row) {
      return { status: 'not_found' };
    }

    return this.locks.runExclusive(clientId, async (): Promise<LedgerMutationResult> => {
      const nextBalance = row.balance + signedAmount(entry);

      if (entry.kind === 'debit' && !isWithinLimit(nextBalance, row.limit)) {
        return { status: 'limit_exceeded', limit: row.limit, balance: row.balance };
      }
      if (!isBalanceInRange(nextBalance)) {
        return { status: 'out_of_range', limit: row.limit, balance: row.balance };
      }

      // Reserved before the journal write; a failed write leaves a gap, never a duplicate
      this.lastTransactionId += 1;
      const transaction: LedgerTransaction = {
        transactionId: String(this.lastTransactionId),
        clientId,
        amount: entry.amount,
        kind: entry.kind,
        description: entry.description,
        executedAt: this.nextExecutedAt(row),
        sequence: row.transactions.length + 1,
      };

      if (this.journal) {
        await this.journal.append(transaction);
      }

      row.transactions.push(transaction);
      row.balance = nextBalance;

      return { status: 'applied', limit: row.limit, balance: row.balance, transaction };
    });
  }

  async readStatement(clientId: number, size: number): Promise<LedgerSnapshot | null> {
    const row = this.rows.get(clientId);
    if (!row) {
      return null;
    }

    // Synchronous copy: no commit can interleave
    return {
      clientId,
      limit: row.limit,
      balance: row.balance,
      transactions: row.transactions.slice(-size).reverse(),
      takenAt: this.clock(),
    };
  }

  isReady(): boolean {
    return this.restored;
  }

  /**
   * Drop every client and transaction; the next provision starts fresh
   */
  reset(): void {
    this.rows.clear();
    this.lastTransactionId = 0;
    this.restored = false;
  }

  /**
   * executedAt never goes backwards within a client, so insertion order and
   * time order agree even if the wall clock steps back
   */
  private nextExecutedAt(row: ClientRow): Date {
    const now = this.clock();
    const last = row.transactions[row.transactions.length - 1];
    return last && last.executedAt > now ? new Date(last.executedAt.getTime()) : now;
  }

  private async restore(journal: LedgerJournal): Promise<void> {
    const entries = await journal.replay();
    let skipped = 0;

    for (const entry of entries) {
      this.lastTransactionId = Math.max(this.lastTransactionId, Number(entry.transactionId) || 0);

      const row = this.rows.get(entry.clientId);
      if (!row) {
        skipped += 1;
        continue;
      }
      row.transactions.push(entry);
      row.balance += signedAmount(entry);
    }

    log.info({ replayed: entries.length - skipped, skipped }, 'Ledger journal restored');
  }
}
