/**
 * Logging Transports
 *
 * Winston transport wrappers. Console output goes to stderr so that CLI
 * commands can print documents on stdout.
 */

import winston from 'winston';
import { format } from 'date-fns';
import type { LogFormat, TimestampFormat } from './config.js';

/**
 * Interface for pluggable log transports.
 */
export interface LogTransport {
  name: string;
  createWinstonTransport(): winston.transport;
}

/**
 * yyyy-MM-dd HH:mm:ss,SSS in local time
 */
export function formatLocalTimestamp(date: Date): string {
  return format(date, 'yyyy-MM-dd HH:mm:ss,SSS');
}

/**
 * One line per entry:
 * DEBUG 2026-02-10 14:30:15,042 [edi-parser] Parsed 12 segments
 */
export function buildTextFormat(timestampFormat: TimestampFormat): winston.Logform.Format {
  return winston.format.printf((info) => {
    const level = info.level.toUpperCase().padStart(5);
    const now = new Date();
    const timestamp = timestampFormat === 'iso' ? now.toISOString() : formatLocalTimestamp(now);
    const component = typeof info['component'] === 'string' ? ` [${info['component']}]` : '';
    let line = `${level} ${timestamp}${component} ${String(info.message)}`;
    if (typeof info['errorStack'] === 'string') {
      line += '\n' + info['errorStack'];
    }
    return line;
  });
}

function buildFormat(logFormat: LogFormat, timestampFormat: TimestampFormat): winston.Logform.Format {
  return logFormat === 'json'
    ? winston.format.combine(winston.format.timestamp(), winston.format.json())
    : buildTextFormat(timestampFormat);
}

/**
 * Console transport writing every level to stderr.
 */
export class ConsoleTransport implements LogTransport {
  name = 'console';

  constructor(
    private format: LogFormat,
    private timestampFormat: TimestampFormat
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.Console({
      format: buildFormat(this.format, this.timestampFormat),
      stderrLevels: ['error', 'warn', 'info', 'debug', 'trace'],
    });
  }
}

/**
 * File transport with size-based rotation.
 */
export class FileTransport implements LogTransport {
  name = 'file';

  constructor(
    private filePath: string,
    private format: LogFormat,
    private timestampFormat: TimestampFormat = 'local'
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.File({
      filename: this.filePath,
      format: buildFormat(this.format, this.timestampFormat),
      maxsize: 10 * 1024 * 1024, // 10 MB
      maxFiles: 5,
    });
  }
}
