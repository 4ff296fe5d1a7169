import { Router, Request, Response } from 'express';
import { archiveTimestamp, siteDirectory } from '../backup/archiveNaming';
import { ConfigStore } from '../config/config';
import { listArchives } from '../retention/cleanup';
import { describeError } from '../utils/errorHandler';
import { logger } from '../utils/logger';

export interface BackupRouteDeps {
  store: ConfigStore;
}

export function createBackupRoutes({ store }: BackupRouteDeps): Router {
  const router = Router();

  // GET /api/sites/:name/backups
  router.get('/:name/backups', async (req: Request, res: Response) => {
    const { name } = req.params;

    try {
      const config = await store.load();
      const site = config.Sites.find((s) => s.Name.toLowerCase() === name.toLowerCase());
      if (!site) {
        return res.status(404).json({ error: 'Site not found' });
      }

      const archives = await listArchives(siteDirectory(config.BackupFolder, site.Name), site.Name);
      res.json(
        archives.map((archive) => {
          // null for archives renamed by hand
          const stampedAt = archiveTimestamp(site.Name, archive.name);
          return {
            name: archive.name,
            size: archive.size,
            modifiedAt: new Date(archive.mtimeMs).toISOString(),
            stampedAt: stampedAt ? stampedAt.toISOString() : null,
          };
        })
      );
    } catch (err) {
      logger.error(`Error listing backups for ${name}: ${describeError(err)}`);
      res.status(500).json({ error: 'Failed to list backups' });
    }
  });

  return router;
}
