export { transactionService, TransactionService, AppliedTransaction } from './transaction.service';
export { transactionController, TransactionController } from './transaction.controller';
export { default as transactionRoutes } from './transaction.routes';
