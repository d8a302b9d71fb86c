/**
 * Structured Logger Tests
 */

import { describe, it, expect, beforeEach, vi, afterEach, type MockInstance } from 'vitest';
import { Logger, createLogger, parseSeverity } from '../logger.js';
import { createContext, runWithContext } from '../context.js';

describe('StructuredLogger', () => {
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.log>;
  let consoleWarnSpy: MockInstance<typeof console.log>;
  let logger: Logger;

  function lastEntry(spy: MockInstance<typeof console.log>): Record<string, unknown> {
    const calls = spy.mock.calls;
    return JSON.parse(String(calls[calls.length - 1][0])) as Record<string, unknown>;
  }

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    consoleWarnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    logger = createLogger('test-service', {
      prettyPrint: false,
      minSeverity: 'DEBUG',
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('Basic Logging', () => {
    it('should log debug messages', () => {
      logger.debug('Debug message');

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      const entry = lastEntry(consoleLogSpy);
      expect(entry.severity).toBe('DEBUG');
      expect(entry.message).toBe('Debug message');
      expect(entry.service).toBe('test-service');
      expect(typeof entry.timestamp).toBe('string');
    });

    it('should log info and notice to stdout', () => {
      logger.info('Info message');
      logger.notice('Notice message');

      expect(consoleLogSpy).toHaveBeenCalledTimes(2);
      expect(lastEntry(consoleLogSpy).severity).toBe('NOTICE');
    });

    it('should log warnings to console.warn', () => {
      logger.warn('Warning message', { attempt: 2 });

      expect(consoleWarnSpy).toHaveBeenCalledTimes(1);
      expect(lastEntry(consoleWarnSpy)).toMatchObject({
        severity: 'WARNING',
        message: 'Warning message',
        attempt: 2,
      });
    });

    it('should log errors with error details', () => {
      const cause = new Error('root cause');
      const error = new Error('Something failed', { cause });

      logger.error('Operation failed', error, { player: 'db' });

      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
      const entry = lastEntry(consoleErrorSpy);
      expect(entry.severity).toBe('ERROR');
      expect(entry.player).toBe('db');
      expect(entry.error).toMatchObject({
        name: 'Error',
        message: 'Something failed',
        cause: 'root cause',
      });
    });

    it('should describe non-Error values', () => {
      logger.critical('Unexpected', 'plain string');

      expect(lastEntry(consoleErrorSpy).error).toEqual({
        name: 'NonError',
        message: 'plain string',
      });
    });
  });

  describe('Severity Filtering', () => {
    it('should drop entries below the minimum severity', () => {
      const quiet = createLogger('quiet', { minSeverity: 'WARNING', prettyPrint: false });

      quiet.debug('hidden');
      quiet.info('hidden');
      quiet.warn('shown');

      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(consoleWarnSpy).toHaveBeenCalledTimes(1);
      expect(quiet.isEnabled('ERROR')).toBe(true);
      expect(quiet.isEnabled('INFO')).toBe(false);
    });
  });

  describe('Telemetry Context', () => {
    it('should include trace and lifecycle fields from the current context', () => {
      const ctx = createContext('player', { stage: 'ingest', player: 'poller', phase: 'play' });

      runWithContext(ctx, () => logger.info('Polling'));

      expect(lastEntry(consoleLogSpy)).toMatchObject({
        traceId: ctx.traceId,
        spanId: ctx.spanId,
        stage: 'ingest',
        player: 'poller',
        phase: 'play',
        source: 'player',
      });
    });

    it('should omit correlation fields outside a context', () => {
      logger.info('No context');

      const entry = lastEntry(consoleLogSpy);
      expect(entry.traceId).toBeUndefined();
      expect(entry.stage).toBeUndefined();
      expect(entry.source).toBeUndefined();
    });
  });

  describe('Lifecycle Logging', () => {
    it('should log phase start at debug', () => {
      logger.phaseStart('setup', { players: 3 });

      expect(lastEntry(consoleLogSpy)).toMatchObject({
        severity: 'DEBUG',
        message: 'Stage setup started',
        eventName: 'stage.setup.start',
        phase: 'setup',
        players: 3,
      });
    });

    it('should log a successful phase end at info', () => {
      logger.phaseEnd('clean', true, 12);

      expect(lastEntry(consoleLogSpy)).toMatchObject({
        severity: 'INFO',
        message: 'Stage clean completed',
        eventName: 'stage.clean.success',
        durationMs: 12,
      });
    });

    it('should log a failed phase end at error', () => {
      logger.phaseEnd('play', false, 40, { failedPlayers: ['b'] });

      expect(lastEntry(consoleErrorSpy)).toMatchObject({
        severity: 'ERROR',
        message: 'Stage play failed',
        eventName: 'stage.play.failure',
        failedPlayers: ['b'],
      });
    });
  });

  describe('Redaction', () => {
    it('should redact bearer tokens', () => {
      logger.info('Calling upstream', { header: 'Bearer test-token-value' });

      expect(String(consoleLogSpy.mock.calls[0][0])).toContain('"header":"[REDACTED]"');
    });

    it('should redact custom patterns', () => {
      const custom = createLogger('custom', {
        prettyPrint: false,
        redactionPatterns: [/tenant-\d+/g],
      });

      custom.info('Loaded tenant-42');

      expect(lastEntry(consoleLogSpy).message).toBe('Loaded [REDACTED]');
    });
  });

  describe('Output Format', () => {
    it('should pretty print when enabled', () => {
      const pretty = createLogger('pretty', { prettyPrint: true });

      pretty.info('Readable');

      expect(String(consoleLogSpy.mock.calls[0][0])).toContain('\n  "severity": "INFO"');
    });
  });

  describe('Child Logger', () => {
    it('should add default fields without changing the parent', () => {
      const child = logger.child({ component: 'scheduler' });

      child.info('From child');
      expect(lastEntry(consoleLogSpy).component).toBe('scheduler');

      logger.info('From parent');
      expect(lastEntry(consoleLogSpy).component).toBeUndefined();
    });
  });

  describe('parseSeverity', () => {
    it('should accept names in any case and the warn alias', () => {
      expect(parseSeverity('debug')).toBe('DEBUG');
      expect(parseSeverity(' Error ')).toBe('ERROR');
      expect(parseSeverity('warn')).toBe('WARNING');
    });

    it('should reject unknown names', () => {
      expect(parseSeverity('trace')).toBeUndefined();
      expect(parseSeverity(undefined)).toBeUndefined();
      expect(parseSeverity('')).toBeUndefined();
    });
  });
});
