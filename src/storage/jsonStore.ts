import * as fs from 'fs-extra';
import * as path from 'path';
import { logger } from '../utils/logger';
import { runtimeConfig } from '../config/runtime';
import { describeError } from '../utils/errorHandler';

const TEMP_FILE_SUFFIX = '.tmp';

/**
 * Path used for in-flight writes of `filePath`. Nothing else ever writes to it.
 */
export function tempPathFor(filePath: string): string {
  return `${filePath}${TEMP_FILE_SUFFIX}`;
}

/**
 * Flushes a finished temp file to disk and moves it onto its final name.
 */
export async function commitTempFile(tempPath: string, finalPath: string): Promise<void> {
  const fd = await fs.open(tempPath, 'r+');
  try {
    await fs.fsync(fd);
  } finally {
    await fs.close(fd);
  }

  await fs.rename(tempPath, finalPath);
}

/**
 * Removes a temp file after a failed write. Errors are logged, not thrown:
 * the caller is already reporting the original failure.
 */
export async function discardTempFile(tempPath: string): Promise<void> {
  try {
    await fs.remove(tempPath);
  } catch (error) {
    logger.warn(`Failed to remove temp file ${tempPath}: ${error}`);
  }
}

/**
 * Writes JSON to a file atomically.
 * 1) Write pretty-printed JSON plus a trailing newline to `<file>.tmp`
 * 2) fsync
 * 3) Rename to target
 */
export async function writeJsonAtomic<T>(filePath: string, data: T): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.ensureDir(dir);

  const tempPath = tempPathFor(filePath);

  try {
    const content = JSON.stringify(data, null, 2) + '\n';
    await fs.writeFile(tempPath, content, 'utf-8');
    await commitTempFile(tempPath, filePath);
  } catch (error) {
    logger.error(`Failed to write JSON atomically to ${filePath}: ${error}`);
    await discardTempFile(tempPath);
    throw error;
  }
}

async function findTempFiles(directory: string): Promise<string[]> {
  if (!(await fs.pathExists(directory))) return [];

  const found: string[] = [];
  for (const entry of await fs.readdir(directory, { withFileTypes: true })) {
    const entryPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      found.push(...(await findTempFiles(entryPath)));
    } else if (entry.isFile() && entry.name.endsWith(TEMP_FILE_SUFFIX)) {
      found.push(entryPath);
    }
  }
  return found;
}

/**
 * Removes `.tmp` files under `directory` that a stopped process left behind.
 * Files younger than `maxAgeMs` may still be in use and are kept.
 *
 * @returns Number of files removed
 */
export async function cleanupOrphanedTempFiles(
  directory: string,
  maxAgeMs: number = runtimeConfig.storage.tempFileMaxAgeMs
): Promise<number> {
  let candidates: string[];
  try {
    candidates = await findTempFiles(directory);
  } catch (error) {
    logger.warn(`Cannot scan ${directory} for temp files: ${describeError(error)}`);
    return 0;
  }

  const cutoff = Date.now() - maxAgeMs;
  let removed = 0;
  for (const tempPath of candidates) {
    try {
      const { mtimeMs } = await fs.stat(tempPath);
      if (mtimeMs >= cutoff) continue;
      await fs.remove(tempPath);
      removed++;
      logger.debug(`Removed stale temp file ${tempPath}`);
    } catch (error) {
      logger.warn(`Cannot remove stale temp file ${tempPath}: ${describeError(error)}`);
    }
  }
  return removed;
}
