import * as fs from 'fs-extra';
import * as path from 'path';
import { isArchiveOf } from '../backup/archiveNaming';
import { RetentionError, describeError } from '../utils/errorHandler';
import { logger } from '../utils/logger';

export interface ArchiveEntry {
  name: string;
  path: string;
  mtimeMs: number;
  size: number;
}

export interface RetentionResult {
  kept: number;
  deleted: string[];
  failures: RetentionError[];
}

export interface CleanupOptions {
  /** Removes one file. Defaults to fs.unlink. */
  unlink?: (filePath: string) => Promise<void>;
}

/**
 * Archives of `siteName` in `siteDirectory`, in directory-listing order.
 * Entries that cannot be stat'ed are reported through `failures` and skipped.
 */
async function collectArchives(
  siteDirectory: string,
  siteName: string,
  failures: RetentionError[]
): Promise<ArchiveEntry[]> {
  const entries = await fs.readdir(siteDirectory, { withFileTypes: true });
  const archives: ArchiveEntry[] = [];

  for (const entry of entries) {
    if (!entry.isFile() || !isArchiveOf(siteName, entry.name)) continue;

    const filePath = path.join(siteDirectory, entry.name);
    try {
      const stats = await fs.stat(filePath);
      archives.push({ name: entry.name, path: filePath, mtimeMs: stats.mtimeMs, size: stats.size });
    } catch (error) {
      const failure = new RetentionError(`stat failed for ${entry.name}: ${describeError(error)}`, siteName, filePath, {
        cause: error,
      });
      logger.warn(`Retention: ${failure.message}`);
      failures.push(failure);
    }
  }

  return archives;
}

/**
 * Lists the archives of one site, newest first. A missing directory yields an
 * empty list.
 */
export async function listArchives(siteDirectory: string, siteName: string): Promise<ArchiveEntry[]> {
  if (!(await fs.pathExists(siteDirectory))) return [];

  const archives = await collectArchives(siteDirectory, siteName, []);
  return archives.sort((a, b) => b.mtimeMs - a.mtimeMs);
}

/**
 * Keeps the newest `keep` archives of `siteName` in `siteDirectory` and
 * deletes the rest, oldest first.
 *
 * Only files named `backup_<siteName>_*.zip` are considered. A non-positive
 * `keep` deletes nothing. This never throws: every listing, stat or delete
 * failure is logged and returned in `failures`.
 */
export async function cleanupSite(
  siteDirectory: string,
  siteName: string,
  keep: number,
  options: CleanupOptions = {}
): Promise<RetentionResult> {
  const result: RetentionResult = { kept: 0, deleted: [], failures: [] };
  if (keep <= 0) {
    return result;
  }

  let archives: ArchiveEntry[];
  try {
    archives = await collectArchives(siteDirectory, siteName, result.failures);
  } catch (error) {
    const failure = new RetentionError(`cannot list ${siteDirectory}: ${describeError(error)}`, siteName, undefined, {
      cause: error,
    });
    logger.warn(`Retention: ${failure.message}`);
    result.failures.push(failure);
    return result;
  }

  if (archives.length <= keep) {
    result.kept = archives.length;
    return result;
  }

  // Array.prototype.sort is stable, so equal mtimes keep listing order
  archives.sort((a, b) => a.mtimeMs - b.mtimeMs);
  const toDelete = archives.slice(0, archives.length - keep);

  const unlink = options.unlink ?? ((filePath: string) => fs.unlink(filePath));
  for (const archive of toDelete) {
    try {
      await unlink(archive.path);
      result.deleted.push(archive.name);
      logger.info(`Retention: removed old backup ${archive.name}`);
    } catch (error) {
      const failure = new RetentionError(`failed to remove ${archive.name}: ${describeError(error)}`, siteName, archive.path, {
        cause: error,
      });
      logger.warn(`Retention: ${failure.message}`);
      result.failures.push(failure);
    }
  }

  result.kept = archives.length - result.deleted.length;
  return result;
}
