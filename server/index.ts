// Load environment variables from .env file BEFORE any other imports
import 'dotenv/config';

import { createServer } from 'http';
import { loadConfig } from './config';
import { createApp } from './app';
import { SqliteStorage } from './storage';
import { logger, logError } from './lib/logger';

const log = logger.child({ module: 'server' });

function main(): void {
  const config = loadConfig();

  // Schema is brought up to date before anything else touches the database
  const storage = SqliteStorage.open(config.dbPath);

  const httpServer = createServer(createApp(storage));

  httpServer.listen(config.port, () => {
    log.info({ port: config.port, dbPath: config.dbPath, env: config.nodeEnv }, 'RNC tracker listening');
  });

  const shutdown = (signal: string) => {
    log.info({ signal }, 'Shutting down');
    httpServer.close(() => {
      storage.close();
      process.exit(0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

try {
  main();
} catch (error) {
  logError(log, error, 'Failed to start');
  process.exit(1);
}
