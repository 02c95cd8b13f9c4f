/**
 * Routes Index
 *
 * Mounts the route modules, health check and error handling on an Express app.
 */

import type { Express, NextFunction, Request, Response } from 'express';
import type { IStorage } from '../storage';
import { createLogger } from '../lib/logger';
import { errorHandler, notFoundHandler } from '../middleware/errorHandler';
import { requestIdMiddleware } from '../middleware/requestId';
import { createRecordsRouter } from './records';

const log = createLogger({ module: 'routes' });

/**
 * Request logging middleware
 */
export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - start;
    const logData = {
      method: req.method,
      path: req.originalUrl,
      statusCode: res.statusCode,
      durationMs: duration,
    };
    const requestLog = req.logger ?? log;

    if (res.statusCode >= 400) {
      requestLog.warn(logData, 'Request completed with error');
    } else if (duration > 1000) {
      requestLog.warn(logData, 'Slow request');
    } else {
      requestLog.debug(logData, 'Request completed');
    }
  });

  next();
}

/**
 * Register all routes with the Express app
 */
export function registerRoutes(app: Express, storage: IStorage): void {
  app.use(requestIdMiddleware);
  app.use(requestLogger);

  // =================================================
  // Mount Route Modules
  // =================================================

  app.use('/api/records', createRecordsRouter(storage));

  // =================================================
  // Health Check
  // =================================================

  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '1.0.0',
    });
  });

  // =================================================
  // Error Handling
  // =================================================

  app.use('/api/*', notFoundHandler);
  app.use(errorHandler);

  log.debug('Routes registered');
}
