import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import {
  initializeLogging,
  getLogger,
  setGlobalLevel,
  getGlobalLevel,
  resetLogging,
} from '../../../src/logging/LoggerFactory.js';
import { resetLoggingConfig } from '../../../src/logging/config.js';
import { resetDebugRegistry } from '../../../src/logging/DebugModeRegistry.js';
import { LogLevel } from '../../../src/logging/LogLevel.js';
import { CaptureTransport, captureLogTransport, flushLogs } from '../../helpers/CaptureTransport.js';

describe('LoggerFactory', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    delete process.env['LOG_LEVEL'];
    delete process.env['EDI_DEBUG_COMPONENTS'];
    delete process.env['LOG_FILE'];
    resetLogging();
    resetLoggingConfig();
    resetDebugRegistry();
  });

  afterEach(() => {
    resetLogging();
    resetLoggingConfig();
    resetDebugRegistry();
    process.env = { ...originalEnv };
  });

  describe('initializeLogging', () => {
    it('should initialize without errors', () => {
      expect(() => initializeLogging()).not.toThrow();
    });

    it('should respect the LOG_LEVEL env var', () => {
      process.env['LOG_LEVEL'] = 'DEBUG';
      resetLoggingConfig();
      initializeLogging();
      expect(getGlobalLevel()).toBe(LogLevel.DEBUG);
    });

    it('should deliver entries to additional transports', async () => {
      const capture = new CaptureTransport();
      initializeLogging([captureLogTransport(capture)]);

      getLogger('edi-io').info('Saved 8 segments');
      await flushLogs();

      expect(capture.entries).toHaveLength(1);
      expect(capture.entries[0]?.message).toBe('Saved 8 segments');
      expect(capture.entries[0]?.['component']).toBe('edi-io');
    });

    it('should keep cached loggers working after re-initialization', async () => {
      const first = new CaptureTransport();
      initializeLogging([captureLogTransport(first)]);
      const logger = getLogger('edi-parser');

      const second = new CaptureTransport();
      initializeLogging([captureLogTransport(second)]);
      logger.warn('after re-init');
      await flushLogs();

      expect(getLogger('edi-parser')).toBe(logger);
      expect(first.entries).toHaveLength(0);
      expect(second.entries.map((entry) => entry.message)).toEqual(['after re-init']);
    });
  });

  describe('getLogger', () => {
    it('should return a Logger for the component', () => {
      expect(getLogger('edi-xml').getComponent()).toBe('edi-xml');
    });

    it('should cache Logger instances by component', () => {
      expect(getLogger('component-a')).toBe(getLogger('component-a'));
      expect(getLogger('component-a')).not.toBe(getLogger('component-b'));
    });
  });

  describe('setGlobalLevel / getGlobalLevel', () => {
    it('should default to INFO', () => {
      expect(getGlobalLevel()).toBe(LogLevel.INFO);
    });

    it('should affect Logger level filtering before initialization', () => {
      const logger = getLogger('runtime-level-test');
      expect(logger.isDebugEnabled()).toBe(false);

      setGlobalLevel(LogLevel.DEBUG);
      expect(logger.isDebugEnabled()).toBe(true);
    });

    it('should accept all LogLevel values', () => {
      for (const level of [LogLevel.TRACE, LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR]) {
        setGlobalLevel(level);
        expect(getGlobalLevel()).toBe(level);
      }
    });
  });

  describe('resetLogging', () => {
    it('should clear cached loggers', () => {
      const before = getLogger('reset-test');
      resetLogging();
      expect(getLogger('reset-test')).not.toBe(before);
    });

    it('should drop an explicit global level', () => {
      setGlobalLevel(LogLevel.TRACE);
      resetLogging();
      expect(getGlobalLevel()).toBe(LogLevel.INFO);
    });
  });

  describe('environment integration', () => {
    it('should apply EDI_DEBUG_COMPONENTS without explicit initialization', () => {
      process.env['EDI_DEBUG_COMPONENTS'] = 'edi-parser:TRACE';
      resetLoggingConfig();

      expect(getLogger('edi-parser').isTraceEnabled()).toBe(true);
      expect(getLogger('edi-parser.header').isTraceEnabled()).toBe(true);
      expect(getLogger('edi-xml').isDebugEnabled()).toBe(false);
    });

    it('should apply EDI_DEBUG_COMPONENTS on initialization', () => {
      process.env['EDI_DEBUG_COMPONENTS'] = 'edi-xml';
      resetLoggingConfig();
      initializeLogging();

      expect(getLogger('edi-xml').isDebugEnabled()).toBe(true);
      expect(getLogger('edi-xml').isTraceEnabled()).toBe(false);
    });
  });
});
