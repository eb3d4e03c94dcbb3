import { Request, Response, NextFunction } from 'express';

import { getClientId } from '../../middlewares/resolveClient';
import { addLogContext } from '../../observability';
import { KIND_TO_CODE, LedgerTransaction, TransactionTypeCode } from '../ledger/ledger.types';
import { statementService, Statement } from './statement.service';

interface StatementTransactionDTO {
  value: number;
  type: TransactionTypeCode;
  description: string;
  executed_at: string;
}

/**
 * Response body of GET /clients/:id/statement
 */
export interface StatementResponseDTO {
  balance: {
    total: number;
    limit: number;
    date: string;
  };
  latest_transactions: StatementTransactionDTO[];
}

export class StatementController {
  private toTransactionDTO(transaction: LedgerTransaction): StatementTransactionDTO {
    return {
      value: transaction.amount,
      type: KIND_TO_CODE[transaction.kind],
      description: transaction.description,
      executed_at: transaction.executedAt.toISOString(),
    };
  }

  private toStatementDTO(statement: Statement): StatementResponseDTO {
    return {
      balance: {
        total: statement.balance.total,
        limit: statement.balance.limit,
        date: statement.balance.date.toISOString(),
      },
      latest_transactions: statement.latestTransactions.map((transaction) =>
        this.toTransactionDTO(transaction)
      ),
    };
  }

  /**
   * Balance and latest transactions
   * GET /clients/:id/statement
   */
  async get(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const clientId = getClientId(res);
      addLogContext({ operation: 'statement' });

      const statement = await statementService.getStatement(clientId);

      res.status(200).json(this.toStatementDTO(statement));
    } catch (error) {
      next(error);
    }
  }
}

export const statementController = new StatementController();
