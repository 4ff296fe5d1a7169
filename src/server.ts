import { Server } from 'http';
import { createApp } from './app';
import { BackupRunner } from './backup/runner';
import { Config, FileConfigStore, loadOrCreate, resolveMaxParallel } from './config/config';
import { runtimeConfig } from './config/runtime';
import { BackupEvent, EventChannel } from './scheduler/eventChannel';
import { Orchestrator } from './scheduler/orchestrator';
import { cleanupOrphanedTempFiles } from './storage/jsonStore';
import { describeError } from './utils/errorHandler';
import { logger } from './utils/logger';

export interface ListenAddress {
  host: string;
  port: number;
}

/**
 * Splits "host:port" (or "[v6]:port", or ":port" for all interfaces).
 */
export function parseListenAddr(addr: string): ListenAddress {
  const match = /^(?:\[([^\]]+)\]|([^:]*)):(\d{1,5})$/.exec(addr.trim());
  if (!match) {
    throw new Error(`invalid listen address "${addr}", expected host:port`);
  }
  const port = parseInt(match[3], 10);
  if (port > 65535) {
    throw new Error(`invalid port in listen address "${addr}"`);
  }
  return { host: match[1] ?? (match[2] || '0.0.0.0'), port };
}

export interface RunningService {
  config: Config;
  orchestrator: Orchestrator;
  server: Server;
  shutdown(): Promise<void>;
}

function listen(app: ReturnType<typeof createApp>, address: ListenAddress): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(address.port, address.host);
    server.once('listening', () => resolve(server));
    server.once('error', reject);
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve) => {
    server.close((err) => {
      if (err) {
        logger.warn(`Error closing HTTP server: ${err.message}`);
      }
      resolve();
    });
  });
}

/**
 * Loads the config, starts the scheduler and the HTTP API. A config that
 * cannot be loaded here is fatal and rejects.
 */
export async function startService(configPath: string): Promise<RunningService> {
  const config = await loadOrCreate(configPath);
  logger.info(`Config loaded from ${configPath}`);

  const orphaned = await cleanupOrphanedTempFiles(config.BackupFolder);
  if (orphaned > 0) {
    logger.info(`Cleaned up ${orphaned} orphaned temp file(s) in ${config.BackupFolder}`);
  }

  const store = new FileConfigStore(configPath);
  const events = new EventChannel<BackupEvent>(runtimeConfig.scheduler.eventBufferSize);
  const runner = new BackupRunner({ maxParallel: resolveMaxParallel() });
  const orchestrator = new Orchestrator({ store, runner, events, initialConfig: config });

  // The listen address is read once; changing it needs a restart
  const address = parseListenAddr(config.WebListenAddr);
  const app = createApp({ store, events, status: () => orchestrator.getStatus() });
  const server = await listen(app, address);
  logger.info(`Web API listening on http://${address.host}:${address.port}`);

  orchestrator.start();

  let stopping: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    if (!stopping) {
      stopping = (async () => {
        events.close();
        await Promise.all([closeServer(server), orchestrator.shutdown()]);
        logger.info('Service stopped');
      })();
    }
    return stopping;
  };

  server.on('error', (err) => {
    logger.error(`HTTP server error: ${describeError(err)}`);
  });

  return { config, orchestrator, server, shutdown };
}
