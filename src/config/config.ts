import * as fs from 'fs-extra';
import * as path from 'path';
import { writeJsonAtomic } from '../storage/jsonStore';
import { ConfigError, describeError } from '../utils/errorHandler';
import { runtimeConfig } from './runtime';

export interface Site {
  Enabled: boolean;
  Name: string;
  Url: string;
}

/**
 * On-disk config. Field names match the JSON file exactly.
 */
export interface Config {
  WebListenAddr: string;
  IntervalMinutes: number; // 0 disables scheduled runs
  BackupFolder: string;
  Retention: number; // archives kept per site
  Sites: Site[];
}

export interface ConfigStore {
  load(): Promise<Config>;
  save(config: Config): Promise<Config>;
}

export const DEFAULT_LISTEN_ADDR = '127.0.0.1:8123';
export const DEFAULT_RETENTION = 30;
export const DEFAULT_INTERVAL_MINUTES = 5;

const APP_DIR_NAME = 'site-archiver';

function programDataPath(...segments: string[]): string | null {
  const programData = process.env.ProgramData;
  return programData ? path.join(programData, APP_DIR_NAME, ...segments) : null;
}

export function defaultBackupFolder(): string {
  return programDataPath('Backups') ?? 'Backups';
}

export function defaultConfigPath(): string {
  return process.env[runtimeConfig.env.configPath] || programDataPath('config.json') || 'config.json';
}

export function defaultLogPath(): string {
  return process.env[runtimeConfig.env.logPath] || programDataPath('log.json') || 'log.json';
}

export function defaultConfig(): Config {
  return {
    WebListenAddr: DEFAULT_LISTEN_ADDR,
    IntervalMinutes: DEFAULT_INTERVAL_MINUTES,
    BackupFolder: defaultBackupFolder(),
    Retention: DEFAULT_RETENTION,
    Sites: [
      {
        Enabled: true,
        Name: 'Example Site',
        Url: 'http://example.com/backup.zip',
      },
    ],
  };
}

/**
 * Keeps 0 as "disabled" and maps negative values to 1 minute.
 */
export function normalizeInterval(minutes: number): number {
  return minutes < 0 ? 1 : minutes;
}

/**
 * Returns a normalized copy of `config`. Never throws: invalid values are
 * replaced with defaults rather than rejected.
 *
 * Sites with both name and URL empty are dropped, and when two sites share a
 * name (case-insensitive) the first one wins.
 */
export function validateAndNormalize(config: Config): Config {
  const retention = config.Retention > 0 ? config.Retention : DEFAULT_RETENTION;
  const backupFolder = config.BackupFolder.trim() || defaultBackupFolder();
  const listenAddr = config.WebListenAddr.trim() || DEFAULT_LISTEN_ADDR;

  const seen = new Set<string>();
  const sites: Site[] = [];
  for (const site of config.Sites) {
    const name = site.Name.trim();
    const url = site.Url.trim();

    if (!name && !url) continue;

    if (name) {
      const key = name.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);
    }

    sites.push({ Enabled: site.Enabled, Name: name, Url: url });
  }

  return {
    WebListenAddr: listenAddr,
    IntervalMinutes: normalizeInterval(config.IntervalMinutes),
    BackupFolder: backupFolder,
    Retention: retention,
    Sites: sites,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(raw: Record<string, unknown>, key: string, where: string): string {
  const value = raw[key];
  if (value === undefined || value === null) return '';
  if (typeof value !== 'string') {
    throw new ConfigError(`${where}${key} must be a string`);
  }
  return value;
}

function readInteger(raw: Record<string, unknown>, key: string): number {
  const value = raw[key];
  if (value === undefined || value === null) return 0;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ConfigError(`${key} must be an integer`);
  }
  return value;
}

function readBoolean(raw: Record<string, unknown>, key: string, where: string): boolean {
  const value = raw[key];
  if (value === undefined || value === null) return false;
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${where}${key} must be a boolean`);
  }
  return value;
}

/**
 * Turns decoded JSON into a Config. Missing fields take their zero value;
 * a field of the wrong type is a ConfigError. The result is not normalized.
 */
export function parseConfig(raw: unknown): Config {
  if (!isRecord(raw)) {
    throw new ConfigError('config must be a JSON object');
  }

  let rawSites: unknown[] = [];
  if (raw.Sites !== undefined && raw.Sites !== null) {
    if (!Array.isArray(raw.Sites)) {
      throw new ConfigError('Sites must be an array');
    }
    rawSites = raw.Sites;
  }

  const sites: Site[] = rawSites.map((entry, index) => {
    if (!isRecord(entry)) {
      throw new ConfigError(`Sites[${index}] must be an object`);
    }
    const where = `Sites[${index}].`;
    return {
      Enabled: readBoolean(entry, 'Enabled', where),
      Name: readString(entry, 'Name', where),
      Url: readString(entry, 'Url', where),
    };
  });

  return {
    WebListenAddr: readString(raw, 'WebListenAddr', ''),
    IntervalMinutes: readInteger(raw, 'IntervalMinutes'),
    BackupFolder: readString(raw, 'BackupFolder', ''),
    Retention: readInteger(raw, 'Retention'),
    Sites: sites,
  };
}

/**
 * Writes `config` (normalized) as pretty-printed JSON with a trailing newline.
 * The parent directory is created when missing.
 */
export async function saveConfig(configPath: string, config: Config): Promise<Config> {
  const target = configPath.trim();
  if (!target) {
    throw new ConfigError('config path is empty');
  }

  const normalized = validateAndNormalize(config);
  try {
    await writeJsonAtomic(target, normalized);
  } catch (error) {
    throw new ConfigError(`failed to save config ${target}: ${describeError(error)}`, { cause: error });
  }
  return normalized;
}

/**
 * Loads the config at `configPath`. When the file does not exist it is
 * created with the default config, which is returned.
 */
export async function loadOrCreate(configPath: string): Promise<Config> {
  const target = configPath.trim();
  if (!target) {
    throw new ConfigError('config path is empty');
  }

  let content: string;
  try {
    content = await fs.readFile(target, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      try {
        return await saveConfig(target, defaultConfig());
      } catch (saveError) {
        throw new ConfigError(`failed to create default config at ${target}: ${describeError(saveError)}`, {
          cause: saveError,
        });
      }
    }
    throw new ConfigError(`failed to read config ${target}: ${describeError(error)}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`failed to parse config ${target}: ${describeError(error)}`, { cause: error });
  }

  return validateAndNormalize(parseConfig(raw));
}

/**
 * Config store backed by a JSON file on disk.
 */
export class FileConfigStore implements ConfigStore {
  constructor(public readonly configPath: string) {}

  load(): Promise<Config> {
    return loadOrCreate(this.configPath);
  }

  save(config: Config): Promise<Config> {
    return saveConfig(this.configPath, config);
  }
}

/**
 * Parallel download limit from the environment. Unset, unparsable and
 * non-positive values fall back to the default.
 */
export function resolveMaxParallel(env: NodeJS.ProcessEnv = process.env): number {
  const fallback = runtimeConfig.runner.defaultMaxParallel;
  const raw = env[runtimeConfig.runner.maxParallelEnv];
  if (!raw || !/^\s*[+-]?\d+\s*$/.test(raw)) {
    return fallback;
  }
  const value = parseInt(raw, 10);
  return value > 0 ? value : fallback;
}
