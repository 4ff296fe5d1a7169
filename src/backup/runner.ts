import axios, { AxiosInstance } from 'axios';
import * as fs from 'fs-extra';
import * as path from 'path';
import { Config, Site } from '../config/config';
import { runtimeConfig } from '../config/runtime';
import { cleanupSite, RetentionResult } from '../retention/cleanup';
import { categorizeError, ErrorCategory } from '../utils/errorCategorizer';
import { BackupError, SiteValidationError, StorageError, describeError } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import { AdmissionGate } from './admissionGate';
import { archiveFileName, siteDirectory } from './archiveNaming';
import { downloadToFile } from './downloader';

export interface RunnerOptions {
  maxParallel?: number;
  httpClient?: AxiosInstance;
  timeoutMs?: number;
  userAgent?: string;
  /** Source of archive timestamps. */
  clock?: () => Date;
}

export interface ArchiveResult {
  site: string;
  path: string;
  bytes: number;
  retention: RetentionResult;
}

export type SiteOutcome =
  | { site: string; status: 'ok'; archive: ArchiveResult }
  | { site: string; status: 'failed'; error: BackupError; category: ErrorCategory }
  | { site: string; status: 'skipped' };

function toBackupError(error: unknown, site: string): BackupError {
  if (error instanceof BackupError) return error;
  return new StorageError(describeError(error), site, { cause: error });
}

/**
 * Executes backup passes. A pass downloads every enabled site of a config
 * snapshot concurrently, at most `maxParallel` at a time, and prunes each
 * site's archives after a successful download.
 */
export class BackupRunner {
  readonly maxParallel: number;
  private readonly client: AxiosInstance;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly clock: () => Date;

  constructor(options: RunnerOptions = {}) {
    const requested = options.maxParallel ?? 0;
    this.maxParallel = Number.isInteger(requested) && requested > 0 ? requested : runtimeConfig.runner.defaultMaxParallel;
    this.client = options.httpClient ?? axios.create();
    this.timeoutMs = options.timeoutMs ?? runtimeConfig.download.timeoutMs;
    this.userAgent = options.userAgent ?? runtimeConfig.download.userAgent;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Runs one pass over `snapshot`. Resolves once every enabled site has
   * finished, failed or been skipped; never rejects.
   */
  async runAll(snapshot: Config, signal?: AbortSignal): Promise<SiteOutcome[]> {
    const sites = snapshot.Sites.filter((site) => site.Enabled);
    if (sites.length === 0) {
      logger.info('Backup: no enabled sites');
      return [];
    }

    logger.info(`Backup: starting run for ${sites.length} site(s) (max_parallel=${this.maxParallel})`);
    const gate = new AdmissionGate(this.maxParallel);

    const outcomes = await Promise.all(sites.map((site) => this.runAdmitted(gate, snapshot, site, signal)));

    const failed = outcomes.filter((outcome) => outcome.status === 'failed').length;
    const skipped = outcomes.filter((outcome) => outcome.status === 'skipped').length;
    logger.info(`Backup: run finished (${outcomes.length - failed - skipped} ok, ${failed} failed, ${skipped} skipped)`);
    return outcomes;
  }

  private async runAdmitted(
    gate: AdmissionGate,
    snapshot: Config,
    site: Site,
    signal?: AbortSignal
  ): Promise<SiteOutcome> {
    if (!(await gate.acquire(signal))) {
      logger.warn(`Backup: site=${site.Name} skipped, run cancelled`);
      return { site: site.Name, status: 'skipped' };
    }

    try {
      const archive = await this.runOne(snapshot, site, signal);
      logger.info(`Backup: site=${archive.site} OK`);
      return { site: site.Name, status: 'ok', archive };
    } catch (error) {
      const backupError = toBackupError(error, site.Name);
      const { errorCategory } = categorizeError(backupError);
      logger.error(`Backup: site=${site.Name} failed (${errorCategory}): ${backupError.message}`);
      return { site: site.Name, status: 'failed', error: backupError, category: errorCategory };
    } finally {
      gate.release();
    }
  }

  /**
   * Downloads one site into
   * `<BackupFolder>/<Name>/backup_<Name>_<dd-MM-yyyy_HH-mm-ss>.zip`,
   * then applies retention to that site's directory.
   */
  async runOne(snapshot: Config, site: Site, signal?: AbortSignal): Promise<ArchiveResult> {
    const name = site.Name.trim();
    if (!name) {
      throw new SiteValidationError('site name is empty', site.Name);
    }
    const url = site.Url.trim();
    if (!url) {
      throw new SiteValidationError('site url is empty', name);
    }
    if (name === '.' || name === '..' || /[\\/]/.test(name)) {
      throw new SiteValidationError(`site name "${name}" cannot be used as a directory name`, name, 'INVALID_NAME');
    }

    const dir = siteDirectory(snapshot.BackupFolder, name);
    try {
      await fs.ensureDir(dir);
    } catch (error) {
      throw new StorageError(`mkdir ${dir}: ${describeError(error)}`, name, { cause: error });
    }

    const finalPath = path.join(dir, archiveFileName(name, this.clock()));
    const download = await downloadToFile(url, finalPath, {
      client: this.client,
      site: name,
      timeoutMs: this.timeoutMs,
      userAgent: this.userAgent,
      snippetBytes: runtimeConfig.download.snippetBytes,
      signal,
    });
    logger.info(`Backup: site=${name} saved ${download.path} (${download.bytes} bytes)`);

    // Best effort: a retention problem never fails the backup itself
    const retention = await cleanupSite(dir, name, snapshot.Retention);
    if (retention.failures.length > 0) {
      logger.warn(`Backup: site=${name} retention finished with ${retention.failures.length} problem(s)`);
    }

    return { site: name, path: download.path, bytes: download.bytes, retention };
  }
}

export interface OutcomeSummary {
  site: string;
  status: SiteOutcome['status'];
  path?: string;
  bytes?: number;
  deleted?: number;
  error?: string;
  category?: ErrorCategory;
}

/**
 * JSON-friendly view of an outcome for logs and the status endpoint.
 */
export function summarizeOutcome(outcome: SiteOutcome): OutcomeSummary {
  switch (outcome.status) {
    case 'ok':
      return {
        site: outcome.site,
        status: 'ok',
        path: outcome.archive.path,
        bytes: outcome.archive.bytes,
        deleted: outcome.archive.retention.deleted.length,
      };
    case 'failed':
      return { site: outcome.site, status: 'failed', error: outcome.error.message, category: outcome.category };
    case 'skipped':
      return { site: outcome.site, status: 'skipped' };
  }
}
