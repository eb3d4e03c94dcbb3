/**
 * Middleware Exports
 *
 * Central export point for all middleware modules.
 */

// Error handling
export {
  errorHandler,
  notFoundHandler,
  ApiError,
  asyncHandler,
  AppError,
} from './errorHandler';

// Request validation
export { validateRequest } from './validateRequest';

// Client resolution
export { resolveClient, getClientId, parseClientId } from './resolveClient';
