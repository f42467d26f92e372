/**
 * Logger Factory
 *
 * Creates the root winston logger and caches one Logger per component.
 *
 * Usage:
 *   import { getLogger } from '../logging/index.js';
 *
 *   const logger = getLogger('edi-parser');
 *   logger.debug('Inferred element separator', { separator: '*' });
 *
 * getLogger() initializes with the environment configuration on first use;
 * initializeLogging() may be called earlier to add transports.
 */

import winston from 'winston';
import { LogLevel } from './LogLevel.js';
import { getLoggingConfig, type LoggingConfiguration } from './config.js';
import { initFromEnv } from './DebugModeRegistry.js';
import { Logger, setGlobalLevelProvider } from './Logger.js';
import { ConsoleTransport, FileTransport } from './transports.js';
import type { LogTransport } from './transports.js';

/**
 * Winston priorities: lower number means more severe.
 */
const WINSTON_LEVELS: Record<string, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

let rootLogger: winston.Logger | null = null;
/** Null until set explicitly; falls back to LOG_LEVEL */
let currentGlobalLevel: LogLevel | null = null;
let environmentApplied = false;
const loggerCache = new Map<string, Logger>();

/**
 * Apply EDI_DEBUG_COMPONENTS once, before the first level check.
 */
function applyEnvironment(config: LoggingConfiguration): void {
  environmentApplied = true;
  initFromEnv(config.debugComponents);
}

function createRootLogger(config: LoggingConfiguration, additionalTransports?: LogTransport[]): winston.Logger {
  const transports: winston.transport[] = [
    new ConsoleTransport(config.logFormat, config.timestampFormat).createWinstonTransport(),
  ];
  if (config.logFile) {
    transports.push(
      new FileTransport(config.logFile, config.logFormat, config.timestampFormat).createWinstonTransport()
    );
  }
  for (const t of additionalTransports ?? []) {
    transports.push(t.createWinstonTransport());
  }

  if (rootLogger) {
    rootLogger.close();
  }
  // The winston level stays at trace: filtering happens per component in Logger.
  const root = winston.createLogger({
    levels: WINSTON_LEVELS,
    level: 'trace',
    transports,
    exitOnError: false,
  });
  rootLogger = root;
  return root;
}

/**
 * Initialize the logging subsystem from the environment configuration.
 * Calling it again rebuilds the root logger and re-reads LOG_LEVEL and
 * EDI_DEBUG_COMPONENTS.
 */
export function initializeLogging(additionalTransports?: LogTransport[]): winston.Logger {
  const config = getLoggingConfig();
  currentGlobalLevel = config.logLevel;
  applyEnvironment(config);
  return createRootLogger(config, additionalTransports);
}

function resolveRoot(): winston.Logger {
  return rootLogger ?? createRootLogger(getLoggingConfig());
}

/**
 * Get (or create) the Logger for a named component.
 */
export function getLogger(component: string): Logger {
  const cached = loggerCache.get(component);
  if (cached) return cached;

  const logger = new Logger(component, resolveRoot);
  loggerCache.set(component, logger);
  return logger;
}

/**
 * Change the global log level at runtime. Components with an override keep it.
 */
export function setGlobalLevel(level: LogLevel): void {
  currentGlobalLevel = level;
}

export function getGlobalLevel(): LogLevel {
  const config = getLoggingConfig();
  if (!environmentApplied) {
    applyEnvironment(config);
  }
  return currentGlobalLevel ?? config.logLevel;
}

setGlobalLevelProvider(getGlobalLevel);

/**
 * Flush and close all transports.
 */
export async function shutdownLogging(): Promise<void> {
  const root = rootLogger;
  if (!root) return;
  rootLogger = null;
  await new Promise<void>((resolve) => {
    root.on('finish', () => resolve());
    root.end();
  });
}

/**
 * Reset all logging state (for testing).
 */
export function resetLogging(): void {
  if (rootLogger) {
    rootLogger.close();
  }
  rootLogger = null;
  currentGlobalLevel = null;
  environmentApplied = false;
  loggerCache.clear();
}
