import chalk from 'chalk';
import * as fs from 'fs-extra';
import * as path from 'path';
import { runtimeConfig } from '../config/runtime';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

export interface LoggerOptions {
  level?: LogLevel;
  /** JSON-lines sink. Omit to log to the console only. */
  filePath?: string | null;
  toConsole?: boolean;
}

export function parseLogLevel(value: string | undefined): LogLevel | null {
  switch ((value || '').trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return null;
  }
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.message;
  }
  return typeof arg === 'object' ? JSON.stringify(arg, null, 2) : String(arg);
}

function toJsonValue(arg: unknown): unknown {
  if (arg instanceof Error) {
    return { name: arg.name, message: arg.message };
  }
  return arg;
}

class Logger {
  private level: LogLevel = parseLogLevel(process.env[runtimeConfig.env.logLevel]) ?? LogLevel.INFO;
  private filePath: string | null = null;
  private toConsole = true;
  private sinkFailureReported = false;

  configure(options: LoggerOptions): void {
    if (options.level !== undefined) {
      this.level = options.level;
    }
    if (options.toConsole !== undefined) {
      this.toConsole = options.toConsole;
    }
    if (options.filePath !== undefined) {
      this.filePath = options.filePath;
      this.sinkFailureReported = false;
      if (this.filePath) {
        fs.ensureDirSync(path.dirname(this.filePath));
      }
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }

  private formatMessage(level: LogLevel, message: string, args: unknown[]): string {
    const timestamp = new Date().toISOString();
    const formattedArgs = args.map(formatArg).join(' ');
    return `[${timestamp}] [${level}] ${message}${formattedArgs ? ` ${formattedArgs}` : ''}`;
  }

  private writeToFile(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.filePath) return;

    const entry: Record<string, unknown> = {
      time: new Date().toISOString(),
      level,
      msg: message,
    };
    if (args.length > 0) {
      entry.args = args.map(toJsonValue);
    }
    try {
      fs.appendFileSync(this.filePath, JSON.stringify(entry) + '\n');
    } catch (error) {
      // Logging never fails the caller; the broken sink is reported once
      if (!this.sinkFailureReported) {
        this.sinkFailureReported = true;
        console.error(chalk.red(`Cannot write log file ${this.filePath}: ${formatArg(error)}`));
      }
    }
  }

  private emit(level: LogLevel, paint: (text: string) => string, message: string, args: unknown[]): void {
    if (!this.shouldLog(level)) return;

    if (this.toConsole) {
      const formatted = paint(this.formatMessage(level, message, args));
      if (level === LogLevel.ERROR) {
        console.error(formatted);
      } else {
        console.log(formatted);
      }
    }
    this.writeToFile(level, message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.emit(LogLevel.DEBUG, chalk.gray, message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.emit(LogLevel.INFO, chalk.blue, message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.emit(LogLevel.WARN, chalk.yellow, message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.emit(LogLevel.ERROR, chalk.red, message, args);
  }
}

export const logger = new Logger();
