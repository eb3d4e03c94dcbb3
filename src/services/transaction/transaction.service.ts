import { ApiError } from '../../middlewares/errorHandler';
import {
  createServiceLogger,
  ledgerAtomicUnitDuration,
  ledgerTransactionAmount,
  ledgerTransactionsTotal,
  traceLedgerOperation,
} from '../../observability';
import { ClientRegistry, clientRegistry, ledgerRepository } from '../ledger';
import {
  LedgerEntryInput,
  LedgerMutationResult,
  LedgerRepository,
  LedgerTransaction,
} from '../ledger/ledger.types';
import { validateLedgerEntry } from './transaction.validation';

const log = createServiceLogger('transaction');

export interface AppliedTransaction {
  limit: number;
  balance: number;
  transaction: LedgerTransaction;
}

/**
 * Transaction processor.
 *
 * Rejections are decided before or inside the store's atomic unit and
 * leave no trace. Store failures surface as STORAGE_UNAVAILABLE and are
 * not retried here.
 */
export class TransactionService {
  constructor(
    private readonly repository: LedgerRepository,
    private readonly registry: ClientRegistry
  ) {}

  async applyTransaction(clientId: number, entry: LedgerEntryInput): Promise<AppliedTransaction> {
    const kind = entry.kind === 'credit' || entry.kind === 'debit' ? entry.kind : 'unknown';

    if (!(await this.isProvisioned(clientId))) {
      ledgerTransactionsTotal.inc({ kind, outcome: 'not_found' });
      throw ApiError.clientNotFound(clientId);
    }

    const validationErrors = validateLedgerEntry(entry);
    if (Object.keys(validationErrors).length > 0) {
      ledgerTransactionsTotal.inc({ kind, outcome: 'invalid' });
      throw ApiError.invalidInput('Invalid transaction', validationErrors);
    }

    return traceLedgerOperation(
      'transaction.apply',
      { 'ledger.client_id': clientId, 'ledger.kind': entry.kind, 'ledger.amount': entry.amount },
      async () => {
        const stopTimer = ledgerAtomicUnitDuration.startTimer({
          operation: 'apply',
          store: this.repository.kind,
        });

        let result: LedgerMutationResult;
        try {
          result = await this.repository.applyTransaction(clientId, entry);
        } catch (error) {
          ledgerTransactionsTotal.inc({ kind, outcome: 'failed' });
          log.error({ err: error, clientId, kind }, 'Ledger store failed while applying transaction');
          throw ApiError.storageUnavailable('Ledger storage unavailable', error);
        } finally {
          stopTimer();
        }

        switch (result.status) {
          case 'applied':
            ledgerTransactionsTotal.inc({ kind, outcome: 'applied' });
            ledgerTransactionAmount.observe({ kind }, entry.amount);
            log.debug(
              {
                clientId,
                transactionId: result.transaction.transactionId,
                kind,
                amount: entry.amount,
                balance: result.balance,
              },
              'Transaction applied'
            );
            return { limit: result.limit, balance: result.balance, transaction: result.transaction };

          case 'limit_exceeded':
            ledgerTransactionsTotal.inc({ kind, outcome: 'limit_exceeded' });
            log.debug(
              { clientId, amount: entry.amount, balance: result.balance, limit: result.limit },
              'Debit rejected by overdraft limit'
            );
            throw ApiError.limitExceeded();

          case 'out_of_range':
            ledgerTransactionsTotal.inc({ kind, outcome: 'invalid' });
            log.warn(
              { clientId, amount: entry.amount, balance: result.balance },
              'Transaction rejected: balance would leave the exact integer range'
            );
            throw ApiError.invalidInput('Resulting balance is out of range', {
              value: ['Value would take the balance beyond the supported range'],
            });

          case 'not_found':
            ledgerTransactionsTotal.inc({ kind, outcome: 'not_found' });
            throw ApiError.clientNotFound(clientId);
        }
      }
    );
  }

  private async isProvisioned(clientId: number): Promise<boolean> {
    try {
      return await this.registry.has(clientId);
    } catch (error) {
      log.error({ err: error, clientId }, 'Client registry could not be loaded');
      throw ApiError.storageUnavailable('Ledger storage unavailable', error);
    }
  }
}

export const transactionService = new TransactionService(ledgerRepository, clientRegistry);
