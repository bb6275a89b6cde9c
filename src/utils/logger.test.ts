import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { Logger } from './logger.js';

describe('Logger', () => {
  let capturedOutput: string[] = [];
  let originalWrite: typeof process.stderr.write;

  beforeEach(() => {
    capturedOutput = [];
    originalWrite = process.stderr.write.bind(process.stderr);
    process.stderr.write = vi.fn((chunk: string | Uint8Array): boolean => {
      capturedOutput.push(typeof chunk === 'string' ? chunk : new TextDecoder().decode(chunk));
      return true;
    }) as typeof process.stderr.write;
  });

  afterEach(() => {
    process.stderr.write = originalWrite;
  });

  function parseOutput(index: number): Record<string, unknown> {
    const output = capturedOutput[index];
    if (output === undefined) {
      throw new Error(`Expected output at index ${String(index)} but got undefined`);
    }
    const parsed: Record<string, unknown> = JSON.parse(output.trim());
    return parsed;
  }

  describe('unserializable data', () => {
    it('should replace circular data with a serialization error', () => {
      const logger = new Logger({ component: 'TaskStore' });

      const circular: Record<string, unknown> = { position: 3 };
      circular.self = circular;

      expect(() => {
        logger.warn('task_record_unreadable', circular);
      }).not.toThrow();

      expect(capturedOutput).toHaveLength(1);
      const parsed = parseOutput(0);
      expect(parsed.level).toBe('warn');
      expect(parsed.component).toBe('TaskStore');
      expect(parsed.event).toBe('task_record_unreadable');
      expect(parsed.data).toBeUndefined();
      expect(parsed.originalData).toBe('[unserializable]');
      expect(typeof parsed.serializationError).toBe('string');
    });

    it('should handle BigInt values without throwing', () => {
      const logger = new Logger({ component: 'TaskStore' });

      logger.info('bigint', { value: BigInt(42) });

      const parsed = parseOutput(0);
      expect(parsed.originalData).toBe('[unserializable]');
    });

    it('should always emit exactly one parseable line (property-based)', () => {
      const logger = new Logger({ component: 'PropertyTest' });

      fc.assert(
        fc.property(fc.dictionary(fc.string(), fc.anything()), (data) => {
          capturedOutput = [];
          logger.info('fuzz', data);

          expect(capturedOutput).toHaveLength(1);
          const line = capturedOutput[0] ?? '';
          expect(line.endsWith('\n')).toBe(true);
          expect(line.trim().split('\n')).toHaveLength(1);
          const parsed: Record<string, unknown> = JSON.parse(line);
          expect(parsed.event).toBe('fuzz');
        })
      );
    });
  });

  describe('normal logging', () => {
    it('should log info messages with data', () => {
      const logger = new Logger({ component: 'SessionSetup' });

      logger.info('session_created', { planningDir: '/work/plan' });

      const parsed = parseOutput(0);
      expect(parsed.level).toBe('info');
      expect(parsed.component).toBe('SessionSetup');
      expect(parsed.event).toBe('session_created');
      expect(parsed.data).toEqual({ planningDir: '/work/plan' });
      expect(parsed.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/);
    });

    it('should omit the data field when none is given', () => {
      const logger = new Logger({ component: 'SessionSetup' });

      logger.error('setup_failed');

      expect('data' in parseOutput(0)).toBe(false);
    });

    it('should not log debug messages when debugMode is false', () => {
      const logger = new Logger({ component: 'SessionSetup', debugMode: false });

      logger.debug('state_detected', { resumeStep: 2 });

      expect(capturedOutput).toHaveLength(0);
    });

    it('should log debug messages when debugMode is true', () => {
      const logger = new Logger({ component: 'SessionSetup', debugMode: true });

      logger.debug('state_detected', { resumeStep: 2 });

      expect(parseOutput(0).level).toBe('debug');
    });

    it('should pass debug mode on to child loggers', () => {
      const parent = new Logger({ component: 'cli', debugMode: true });
      const child = parent.child('TaskStore');

      child.debug('task_written', { position: 1 });

      const parsed = parseOutput(0);
      expect(parsed.component).toBe('TaskStore');
      expect(parsed.level).toBe('debug');
    });
  });
});
