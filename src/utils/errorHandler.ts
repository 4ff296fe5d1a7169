import { logger } from './logger';

export type BackupErrorCode =
  | 'CONFIG'
  | 'EMPTY_FIELD'
  | 'INVALID_NAME'
  | 'HTTP_STATUS'
  | 'NETWORK'
  | 'TIMEOUT'
  | 'CANCELLED'
  | 'STORAGE'
  | 'RETENTION';

export class BackupError extends Error {
  constructor(
    message: string,
    public code: BackupErrorCode,
    public site?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'BackupError';
  }
}

/** Config file could not be read, parsed or written. */
export class ConfigError extends BackupError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIG', undefined, options);
    this.name = 'ConfigError';
  }
}

export class SiteValidationError extends BackupError {
  constructor(message: string, site: string, code: 'EMPTY_FIELD' | 'INVALID_NAME' = 'EMPTY_FIELD') {
    super(message, code, site);
    this.name = 'SiteValidationError';
  }
}

export class NetworkError extends BackupError {
  constructor(
    message: string,
    site: string,
    code: 'HTTP_STATUS' | 'NETWORK' | 'TIMEOUT' | 'CANCELLED' = 'NETWORK',
    public status?: number,
    public snippet?: string,
    options?: { cause?: unknown }
  ) {
    super(message, code, site, options);
    this.name = 'NetworkError';
  }
}

export class StorageError extends BackupError {
  constructor(message: string, site: string, options?: { cause?: unknown }) {
    super(message, 'STORAGE', site, options);
    this.name = 'StorageError';
  }
}

export class RetentionError extends BackupError {
  constructor(message: string, site: string, public filePath?: string, options?: { cause?: unknown }) {
    super(message, 'RETENTION', site, options);
    this.name = 'RetentionError';
  }
}

/**
 * Renders any thrown value as a one-line message.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Handles errors with appropriate logging
 */
export function handleError(error: unknown, context: string): void {
  if (error instanceof BackupError) {
    logger.error(`[${context}] ${error.code}: ${error.message}`);
  } else if (error instanceof Error) {
    logger.error(`[${context}] Unexpected error: ${error.message}`);
    if (error.stack) {
      logger.debug(`[${context}] Stack trace: ${error.stack}`);
    }
  } else {
    logger.error(`[${context}] Unexpected error: ${String(error)}`);
  }
}
