/**
 * Log levels used by the codec's loggers, ordered TRACE < DEBUG < INFO < WARN < ERROR.
 */
export enum LogLevel {
  TRACE = 'TRACE',
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const SEVERITY_ORDER: readonly LogLevel[] = [
  LogLevel.TRACE,
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.WARN,
  LogLevel.ERROR,
];

/**
 * Parse a level name. Unknown names fall back to INFO.
 */
export function parseLogLevel(level: string): LogLevel {
  switch (level.trim().toUpperCase()) {
    case 'TRACE':
      return LogLevel.TRACE;
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'INFO':
    case 'INFORMATION':
    default:
      return LogLevel.INFO;
  }
}

/**
 * Check if a message at `messageLevel` passes a `thresholdLevel` filter.
 */
export function isLevelEnabled(messageLevel: LogLevel, thresholdLevel: LogLevel): boolean {
  return SEVERITY_ORDER.indexOf(messageLevel) >= SEVERITY_ORDER.indexOf(thresholdLevel);
}
