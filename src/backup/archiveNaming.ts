import * as path from 'path';
import { formatArchiveTimestamp, parseArchiveTimestamp } from '../time/timeUtils';

const ARCHIVE_PREFIX = 'backup_';
const ARCHIVE_EXTENSION = '.zip';

export function archivePrefix(siteName: string): string {
  return `${ARCHIVE_PREFIX}${siteName}_`;
}

/**
 * backup_<site>_<dd-MM-yyyy_HH-mm-ss>.zip
 */
export function archiveFileName(siteName: string, at: Date): string {
  return `${archivePrefix(siteName)}${formatArchiveTimestamp(at)}${ARCHIVE_EXTENSION}`;
}

export function siteDirectory(backupFolder: string, siteName: string): string {
  return path.join(path.normalize(backupFolder), siteName);
}

/**
 * True when `fileName` follows the archive convention for `siteName`. Only
 * prefix and extension are checked, so files renamed by hand with the same
 * prefix still count.
 */
export function isArchiveOf(siteName: string, fileName: string): boolean {
  const prefix = archivePrefix(siteName);
  return fileName.startsWith(prefix) && fileName.endsWith(ARCHIVE_EXTENSION);
}

/**
 * Timestamp encoded in an archive name, or null for names that do not carry one.
 */
export function archiveTimestamp(siteName: string, fileName: string): Date | null {
  if (!isArchiveOf(siteName, fileName)) return null;
  const stamp = fileName.slice(archivePrefix(siteName).length, -ARCHIVE_EXTENSION.length);
  return parseArchiveTimestamp(stamp);
}
