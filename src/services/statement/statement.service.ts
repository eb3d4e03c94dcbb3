import { config } from '../../config';
import { ApiError } from '../../middlewares/errorHandler';
import {
  createServiceLogger,
  ledgerAtomicUnitDuration,
  ledgerStatementsTotal,
  traceLedgerOperation,
} from '../../observability';
import { ClientRegistry, clientRegistry, ledgerRepository } from '../ledger';
import { LedgerRepository, LedgerSnapshot, LedgerTransaction } from '../ledger/ledger.types';

const log = createServiceLogger('statement');

export interface Statement {
  clientId: number;
  balance: {
    total: number;
    limit: number;
    date: Date;
  };
  /** Newest first, at most statementSize entries */
  latestTransactions: LedgerTransaction[];
}

/**
 * Statement builder: balance, limit and the newest transactions taken from
 * a single consistent read of the store.
 */
export class StatementService {
  constructor(
    private readonly repository: LedgerRepository,
    private readonly registry: ClientRegistry,
    private readonly statementSize: number = config.ledger.statementSize
  ) {}

  async getStatement(clientId: number): Promise<Statement> {
    let provisioned: boolean;
    try {
      provisioned = await this.registry.has(clientId);
    } catch (error) {
      ledgerStatementsTotal.inc({ outcome: 'failed' });
      throw ApiError.storageUnavailable('Ledger storage unavailable', error);
    }

    if (!provisioned) {
      ledgerStatementsTotal.inc({ outcome: 'not_found' });
      throw ApiError.clientNotFound(clientId);
    }

    const snapshot = await traceLedgerOperation(
      'statement.read',
      { 'ledger.client_id': clientId },
      () => this.readSnapshot(clientId)
    );

    if (!snapshot) {
      ledgerStatementsTotal.inc({ outcome: 'not_found' });
      throw ApiError.clientNotFound(clientId);
    }

    ledgerStatementsTotal.inc({ outcome: 'served' });

    return {
      clientId,
      balance: {
        total: snapshot.balance,
        limit: snapshot.limit,
        date: snapshot.takenAt,
      },
      latestTransactions: snapshot.transactions,
    };
  }

  private async readSnapshot(clientId: number): Promise<LedgerSnapshot | null> {
    const stopTimer = ledgerAtomicUnitDuration.startTimer({
      operation: 'statement',
      store: this.repository.kind,
    });

    try {
      return await this.repository.readStatement(clientId, this.statementSize);
    } catch (error) {
      ledgerStatementsTotal.inc({ outcome: 'failed' });
      log.error({ err: error, clientId }, 'Ledger store failed while reading statement');
      throw ApiError.storageUnavailable('Ledger storage unavailable', error);
    } finally {
      stopTimer();
    }
  }
}

export const statementService = new StatementService(ledgerRepository, clientRegistry);
