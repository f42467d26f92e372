/**
 * Logging module exports
 */

export { LogLevel, parseLogLevel, isLevelEnabled } from './LogLevel.js';
export { Logger } from './Logger.js';
export {
  initializeLogging,
  getLogger,
  setGlobalLevel,
  getGlobalLevel,
  shutdownLogging,
  resetLogging,
} from './LoggerFactory.js';
export {
  registerComponent,
  setComponentLevel,
  clearComponentLevel,
  getEffectiveLevel,
  getRegisteredComponents,
  resetDebugRegistry,
  type RegisteredComponent,
} from './DebugModeRegistry.js';
export { getLoggingConfig, resetLoggingConfig, type LoggingConfiguration } from './config.js';
export { ConsoleTransport, FileTransport, type LogTransport } from './transports.js';
