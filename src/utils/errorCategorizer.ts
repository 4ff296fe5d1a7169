/**
 * Centralized error categorization for per-site outcomes.
 *
 * The runner, the status endpoint and the CLI summary all call `categorizeError()`
 * so a failed site is described the same way everywhere.
 */

import { BackupError, NetworkError, describeError } from './errorHandler';

export type ErrorCategory =
  | 'validation'
  | 'http_status'
  | 'network'
  | 'timeout'
  | 'cancelled'
  | 'storage'
  | 'unknown';

export interface ErrorInfo {
  error: string;
  errorCategory: ErrorCategory;
  httpStatus?: number;
}

/**
 * Inspects an error and returns a structured ErrorInfo.
 *
 * Typed errors are mapped by code first; anything else falls back to
 * pattern matching on the message.
 */
export function categorizeError(error: unknown): ErrorInfo {
  const message = describeError(error);
  const info: ErrorInfo = {
    error: message,
    errorCategory: 'unknown',
  };

  if (error instanceof BackupError) {
    switch (error.code) {
      case 'EMPTY_FIELD':
      case 'INVALID_NAME':
      case 'CONFIG':
        info.errorCategory = 'validation';
        return info;
      case 'HTTP_STATUS':
        info.errorCategory = 'http_status';
        if (error instanceof NetworkError && error.status !== undefined) {
          info.httpStatus = error.status;
        }
        return info;
      case 'NETWORK':
        info.errorCategory = 'network';
        return info;
      case 'TIMEOUT':
        info.errorCategory = 'timeout';
        return info;
      case 'CANCELLED':
        info.errorCategory = 'cancelled';
        return info;
      case 'STORAGE':
      case 'RETENTION':
        info.errorCategory = 'storage';
        return info;
    }
  }

  if (/ECONNREFUSED|ECONNRESET|ENOTFOUND|EAI_AGAIN|socket hang up|network/i.test(message)) {
    info.errorCategory = 'network';
    return info;
  }

  if (/timeout|timed? ?out/i.test(message)) {
    info.errorCategory = 'timeout';
    return info;
  }

  if (/ENOSPC|EACCES|EPERM|EROFS|EISDIR/i.test(message)) {
    info.errorCategory = 'storage';
    return info;
  }

  return info;
}
