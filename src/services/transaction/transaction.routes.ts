import { Router, Request, Response, NextFunction } from 'express';

import { asyncHandler } from '../../middlewares/errorHandler';
import { resolveClient } from '../../middlewares/resolveClient';
import { validateRequest } from '../../middlewares/validateRequest';

import { transactionController } from './transaction.controller';
import { createTransactionValidation } from './transaction.validation';

const router = Router();

// POST /clients/:id/transactions - Apply a credit or debit
router.post(
  '/:id/transactions',
  asyncHandler(resolveClient),
  createTransactionValidation,
  validateRequest,
  (req: Request, res: Response, next: NextFunction) => transactionController.create(req, res, next)
);

export default router;
