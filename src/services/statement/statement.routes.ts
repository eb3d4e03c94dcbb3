import { Router, Request, Response, NextFunction } from 'express';

import { asyncHandler } from '../../middlewares/errorHandler';
import { resolveClient } from '../../middlewares/resolveClient';

import { statementController } from './statement.controller';

const router = Router();

// GET /clients/:id/statement - Balance, limit and latest transactions
router.get(
  '/:id/statement',
  asyncHandler(resolveClient),
  (req: Request, res: Response, next: NextFunction) => statementController.get(req, res, next)
);

export default router;
