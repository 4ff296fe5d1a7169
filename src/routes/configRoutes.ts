import { Router, Request, Response } from 'express';
import { Config, ConfigStore, parseConfig } from '../config/config';
import { BackupEvent, EventChannel } from '../scheduler/eventChannel';
import { describeError } from '../utils/errorHandler';
import { logger } from '../utils/logger';

export interface ConfigRouteDeps {
  store: ConfigStore;
  events: EventChannel<BackupEvent>;
}

export function createConfigRoutes({ store, events }: ConfigRouteDeps): Router {
  const router = Router();

  // GET /api/config
  router.get('/', async (_req: Request, res: Response) => {
    try {
      res.json(await store.load());
    } catch (err) {
      logger.error(`Failed to load config: ${describeError(err)}`);
      res.status(500).json({ error: describeError(err) });
    }
  });

  // PUT /api/config
  router.put('/', async (req: Request, res: Response) => {
    let parsed: Config;
    try {
      parsed = parseConfig(req.body);
    } catch (err) {
      return res.status(400).json({ error: describeError(err) });
    }

    try {
      const saved = await store.save(parsed);
      if (!events.trySend({ type: 'config-changed' })) {
        logger.warn('Config saved but the change notification was dropped (event buffer full)');
      }
      logger.info('Config saved via API');
      res.json(saved);
    } catch (err) {
      logger.error(`Failed to save config: ${describeError(err)}`);
      res.status(500).json({ error: describeError(err) });
    }
  });

  return router;
}
