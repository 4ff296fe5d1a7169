#!/usr/bin/env node
import { Command } from 'commander';
import * as dotenv from 'dotenv';
import * as path from 'path';
import { BackupRunner, summarizeOutcome } from './backup/runner';
import { defaultConfigPath, defaultLogPath, loadOrCreate, resolveMaxParallel } from './config/config';
import { RunningService, startService } from './server';
import { describeError } from './utils/errorHandler';
import { LogLevel, logger, parseLogLevel } from './utils/logger';

dotenv.config();

interface GlobalOptions {
  config: string;
  logFile: string;
  logLevel?: string;
}

const program = new Command();

program
  .name('site-archiver')
  .description('Downloads website backup archives on a schedule and keeps the newest N per site')
  .version('1.0.0')
  .option('-c, --config <path>', 'config file', defaultConfigPath())
  .option('-l, --log-file <path>', 'JSON-lines log file', defaultLogPath())
  .option('--log-level <level>', 'debug, info, warn or error');

function setup(): GlobalOptions {
  const options = program.opts<GlobalOptions>();
  let level: LogLevel | undefined;
  if (options.logLevel !== undefined) {
    const parsed = parseLogLevel(options.logLevel);
    if (!parsed) {
      console.error(`Error: invalid log level "${options.logLevel}"`);
      process.exit(1);
    }
    level = parsed;
  }
  logger.configure({ filePath: path.resolve(options.logFile), level });
  return { ...options, config: path.resolve(options.config) };
}

program
  .command('serve', { isDefault: true })
  .description('run the scheduler and the web API until interrupted')
  .action(async () => {
    const options = setup();

    let service: RunningService;
    try {
      service = await startService(options.config);
    } catch (error) {
      logger.error(`Startup failed: ${describeError(error)}`);
      process.exit(1);
    }

    let shuttingDown = false;
    const gracefulShutdown = async (signal: string): Promise<void> => {
      if (shuttingDown) return;
      shuttingDown = true;
      logger.info(`${signal} received, shutting down gracefully...`);
      await service.shutdown();
      process.exit(0);
    };

    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      process.on(signal, () => {
        gracefulShutdown(signal).catch((error: unknown) => {
          logger.error(`Shutdown failed: ${describeError(error)}`);
          process.exit(1);
        });
      });
    }
  });

program
  .command('run')
  .description('run one backup pass over the enabled sites and exit')
  .action(async () => {
    const options = setup();

    const controller = new AbortController();
    process.once('SIGINT', () => {
      logger.warn('Interrupted, cancelling the run');
      controller.abort();
    });

    try {
      const config = await loadOrCreate(options.config);
      const runner = new BackupRunner({ maxParallel: resolveMaxParallel() });
      const outcomes = await runner.runAll(config, controller.signal);
      for (const outcome of outcomes) {
        logger.debug('Site outcome', summarizeOutcome(outcome));
      }
      process.exit(outcomes.every((outcome) => outcome.status === 'ok') ? 0 : 1);
    } catch (error) {
      logger.error(`Run failed: ${describeError(error)}`);
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error('An unexpected error occurred:', describeError(error));
  process.exit(1);
});
