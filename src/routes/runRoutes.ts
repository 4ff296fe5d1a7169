import { Router, Request, Response } from 'express';
import { BackupEvent, EventChannel } from '../scheduler/eventChannel';
import { OrchestratorStatus } from '../scheduler/orchestrator';
import { logger } from '../utils/logger';

export interface RunRouteDeps {
  events: EventChannel<BackupEvent>;
  status: () => OrchestratorStatus;
}

export function createRunRoutes({ events, status }: RunRouteDeps): Router {
  const router = Router();

  // POST /api/run
  router.post('/run', (_req: Request, res: Response) => {
    const accepted = events.trySend({ type: 'run-now' });
    if (!accepted) {
      logger.warn('Run request dropped (event buffer full)');
      return res.status(503).json({ accepted: false });
    }
    res.status(202).json({ accepted: true });
  });

  // GET /api/status
  router.get('/status', (_req: Request, res: Response) => {
    res.json(status());
  });

  return router;
}
