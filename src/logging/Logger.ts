/**
 * Logger
 *
 * Thin wrapper around a winston logger bound to a component name. Level
 * filtering goes through DebugModeRegistry so per-component overrides apply.
 *
 * The winston logger is resolved on every write, so module-level loggers keep
 * working after the factory re-initializes or resets the root logger.
 */

import type winston from 'winston';
import { LogLevel } from './LogLevel.js';
import { shouldLog } from './DebugModeRegistry.js';

/** Global level getter, set by LoggerFactory */
let globalLevelFn: () => LogLevel = () => LogLevel.INFO;

/**
 * @internal
 */
export function setGlobalLevelProvider(fn: () => LogLevel): void {
  globalLevelFn = fn;
}

export class Logger {
  constructor(
    private readonly component: string,
    private readonly resolveWinston: () => winston.Logger
  ) {}

  trace(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.TRACE, 'trace', message, undefined, metadata);
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.DEBUG, 'debug', message, undefined, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.INFO, 'info', message, undefined, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.WARN, 'warn', message, undefined, metadata);
  }

  /**
   * Log an ERROR-level message with an optional Error object.
   */
  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.ERROR, 'error', message, error, metadata);
  }

  isDebugEnabled(): boolean {
    return shouldLog(this.component, LogLevel.DEBUG, globalLevelFn());
  }

  isTraceEnabled(): boolean {
    return shouldLog(this.component, LogLevel.TRACE, globalLevelFn());
  }

  /**
   * Child logger with a sub-component suffix:
   * logger.child('header') on "edi-parser" yields "edi-parser.header".
   */
  child(subComponent: string): Logger {
    return new Logger(`${this.component}.${subComponent}`, this.resolveWinston);
  }

  getComponent(): string {
    return this.component;
  }

  private logAt(
    level: LogLevel,
    winstonLevel: string,
    message: string,
    error?: Error,
    metadata?: Record<string, unknown>
  ): void {
    if (!shouldLog(this.component, level, globalLevelFn())) {
      return;
    }

    const meta: Record<string, unknown> = {
      component: this.component,
      ...metadata,
    };
    if (error?.stack) {
      meta['errorStack'] = error.stack;
    }
    this.resolveWinston().log(winstonLevel, message, meta);
  }
}
