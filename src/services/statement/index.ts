export { statementService, StatementService, Statement } from './statement.service';
export { statementController, StatementController } from './statement.controller';
export { default as statementRoutes } from './statement.routes';
