/**
 * Logger utility
 * Redirects all logging to stderr to avoid interfering with the MCP JSON protocol on stdout
 */

import { ErrorHandler } from './errorHandler.js';
import type { CacheWarning, DiagnosticsSink, LogLevelName } from './types.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3
}

const LEVEL_NAMES: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR
};

export class Logger {
  private currentLevel: LogLevel = LogLevel.INFO;

  constructor(private readonly write: (line: string) => void = (line) => process.stderr.write(`${line}\n`)) {}

  setLevel(level: LogLevel | LogLevelName): void {
    this.currentLevel = typeof level === 'string' ? LEVEL_NAMES[level] : level;
  }

  debug(...args: unknown[]): void {
    this.log(LogLevel.DEBUG, '[DEBUG]', args);
  }

  info(...args: unknown[]): void {
    this.log(LogLevel.INFO, '[INFO]', args);
  }

  warn(...args: unknown[]): void {
    this.log(LogLevel.WARN, '[WARN]', args);
  }

  error(...args: unknown[]): void {
    this.log(LogLevel.ERROR, '[ERROR]', args);
  }

  private log(level: LogLevel, prefix: string, args: unknown[]): void {
    if (this.currentLevel <= level) {
      this.write([prefix, ...args.map(formatArg)].join(' '));
    }
  }
}

function formatArg(arg: unknown): string {
  if (typeof arg === 'string') {
    return arg;
  }
  const message = ErrorHandler.messageOf(arg);
  if (message !== undefined) {
    return message;
  }
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

/**
 * 把诊断事件转发到日志
 */
export class LoggerDiagnostics implements DiagnosticsSink {
  constructor(private readonly target: Logger = logger) {}

  warning(event: CacheWarning): void {
    const parts: unknown[] = [`[${event.code}]`, event.message];
    if (event.path) {
      parts.push(event.path);
    }
    this.target.warn(...parts);
  }

  info(message: string): void {
    this.target.info(message);
  }
}

export const logger = new Logger();
