import { Request, Response, NextFunction } from 'express';
import { matchedData } from 'express-validator';

import { ApiError } from '../../middlewares/errorHandler';
import { getClientId } from '../../middlewares/resolveClient';
import { addLogContext } from '../../observability';
import { toTransactionKind } from '../ledger/ledger.types';
import { transactionService, AppliedTransaction } from './transaction.service';

/**
 * Response body of POST /clients/:id/transactions
 */
export interface TransactionResponseDTO {
  limit: number;
  balance: number;
}

export class TransactionController {
  private toTransactionResponse(applied: AppliedTransaction): TransactionResponseDTO {
    return {
      limit: applied.limit,
      balance: applied.balance,
    };
  }

  /**
   * Apply a credit or debit
   * POST /clients/:id/transactions
   */
  async create(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const clientId = getClientId(res);
      addLogContext({ operation: 'transaction' });

      const { value, type, description } = matchedData(req, { locations: ['body'] });
      const kind = toTransactionKind(type);
      if (!kind) {
        throw ApiError.invalidInput('Validation failed', { type: ["Type must be 'c' or 'd'"] });
      }

      const applied = await transactionService.applyTransaction(clientId, {
        amount: value,
        kind,
        description,
      });

      res.status(200).json(this.toTransactionResponse(applied));
    } catch (error) {
      next(error);
    }
  }
}

export const transactionController = new TransactionController();
