import express, { Express, NextFunction, Request, Response } from 'express';
import { ConfigStore } from './config/config';
import { createBackupRoutes } from './routes/backupRoutes';
import { createConfigRoutes } from './routes/configRoutes';
import { createRunRoutes } from './routes/runRoutes';
import { BackupEvent, EventChannel } from './scheduler/eventChannel';
import { OrchestratorStatus } from './scheduler/orchestrator';
import { logger } from './utils/logger';

export interface AppDeps {
  store: ConfigStore;
  events: EventChannel<BackupEvent>;
  status: () => OrchestratorStatus;
}

/**
 * HTTP API over the config file. Edits and run requests reach the scheduler
 * only as events on the channel.
 */
export function createApp(deps: AppDeps): Express {
  const app = express();

  app.use(express.json());

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  app.use('/api/config', createConfigRoutes(deps));
  app.use('/api/sites', createBackupRoutes(deps));
  app.use('/api', createRunRoutes(deps));

  // Malformed JSON bodies end up here
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    const status = err instanceof SyntaxError ? 400 : 500;
    logger.warn(`${req.method} ${req.path} failed: ${err.message}`);
    res.status(status).json({ error: err.message });
  });

  return app;
}
