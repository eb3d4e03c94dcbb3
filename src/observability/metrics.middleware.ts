import { Request, Response, NextFunction } from 'express';
import { httpRequestsTotal, httpRequestDuration } from './metrics';

/**
 * Collapse client ids and other numeric segments so /clients/3/statement
 * and /clients/4/statement share one label set
 */
export const normalizePath = (path: string): string => {
  return path.replace(/^\/clients\/[^/]+/, '/clients/:id').replace(/\/\d+(?=\/|$)/g, '/:id');
};

export const UNMATCHED_ROUTE = 'unmatched';

/**
 * Label from the original URL: Express resets baseUrl when an error leaves a
 * router. Requests no route matched share one label.
 */
const getRoutePath = (req: Request): string => {
  const route: unknown = req.route;
  if (route === undefined) {
    return UNMATCHED_ROUTE;
  }
  const [pathname] = req.originalUrl.split('?');
  return normalizePath(pathname);
};

/**
 * HTTP metrics middleware
 * Records request count and duration for Prometheus
 */
export const metricsMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  if (req.path === '/metrics') {
    next();
    return;
  }

  const start = process.hrtime.bigint();

  res.on('finish', () => {
    const durationSeconds = Number(process.hrtime.bigint() - start) / 1e9;

    const labels = {
      method: req.method,
      path: getRoutePath(req),
      status: res.statusCode.toString(),
    };

    httpRequestsTotal.inc(labels);
    httpRequestDuration.observe(labels, durationSeconds);
  });

  next();
};
