import { DateTime } from 'luxon';

/** Day-first layout used in archive file names, e.g. 07-03-2025_14-05-09. */
export const ARCHIVE_TIMESTAMP_FORMAT = 'dd-MM-yyyy_HH-mm-ss';

/**
 * Formats `date` in the local zone for use in an archive file name.
 */
export function formatArchiveTimestamp(date: Date): string {
  return DateTime.fromJSDate(date).toFormat(ARCHIVE_TIMESTAMP_FORMAT);
}

/**
 * Parses the timestamp part of an archive file name back into a Date.
 * Returns null when the text is not in the archive layout.
 */
export function parseArchiveTimestamp(text: string): Date | null {
  const parsed = DateTime.fromFormat(text, ARCHIVE_TIMESTAMP_FORMAT);
  return parsed.isValid ? parsed.toJSDate() : null;
}

export function nowISO(): string {
  return DateTime.now().toISO() || new Date().toISOString();
}
