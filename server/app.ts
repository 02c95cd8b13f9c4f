import express, { type Express } from 'express';
import type { IStorage } from './storage';
import { registerRoutes } from './routes';

/**
 * Build the Express app around an already opened storage.
 * Kept apart from index.ts so tests can mount it on an ephemeral port.
 */
export function createApp(storage: IStorage): Express {
  const app = express();
  app.set('trust proxy', 1);
  app.disable('x-powered-by');

  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  registerRoutes(app, storage);
  return app;
}
