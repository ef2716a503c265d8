import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { BenchmarkLogger, createBenchmarkLogger } from '../src/index.js';

describe('BenchmarkLogger', () => {
  let consoleSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleSpy.mockRestore();
  });

  const summary = {
    taskId: 'electricity-spike-0',
    samples: 5,
    requested: 5,
    inputTokens: 1200,
    outputTokens: 800,
    rejected: 2,
  };

  describe('verbose mode suppression', () => {
    it('suppresses log() when verbose=false', () => {
      const logger = new BenchmarkLogger({ verbose: false });
      logger.log('test message');
      expect(consoleSpy).not.toHaveBeenCalled();
    });

    it('suppresses logScore() when verbose=false', () => {
      const logger = new BenchmarkLogger({ verbose: false });
      logger.logScore('task-1', 0.12);
      expect(consoleSpy).not.toHaveBeenCalled();
    });

    it('suppresses logAcquisition() when verbose=false', () => {
      const logger = new BenchmarkLogger({ verbose: false });
      logger.logAcquisition(summary);
      expect(consoleSpy).not.toHaveBeenCalled();
    });

    it('suppresses explainMetrics() when verbose=false', () => {
      const logger = new BenchmarkLogger({ verbose: false });
      logger.explainMetrics();
      expect(consoleSpy).not.toHaveBeenCalled();
    });
  });

  describe('verbose mode output', () => {
    it('outputs log() when verbose=true', () => {
      const logger = new BenchmarkLogger({ verbose: true });
      logger.log('test message');
      expect(consoleSpy).toHaveBeenCalledWith('test message');
    });

    it('outputs logScore() with the CRPS value', () => {
      const logger = new BenchmarkLogger({ verbose: true });
      logger.logScore('task-1', 0.123_45);
      const calls = consoleSpy.mock.calls.flat().join(' ');
      expect(calls).toContain('task-1');
      expect(calls).toContain('CRPS=0.1235');
      expect(calls).toContain('ok');
    });

    it('outputs logAcquisition() with counts, tokens and cost', () => {
      const logger = new BenchmarkLogger({ verbose: true });
      logger.logAcquisition({ ...summary, samples: 3, cost: 0.5, cached: true });
      const calls = consoleSpy.mock.calls.flat().join(' ');
      expect(calls).toContain('electricity-spike-0');
      expect(calls).toContain('3/5');
      expect(calls).toContain('rejected=2');
      expect(calls).toContain('tokens=1200/800');
      expect(calls).toContain('cost=$0.50');
      expect(calls).toContain('[cached]');
    });
  });

  describe('always-output methods', () => {
    it('outputs header() with underline', () => {
      const logger = new BenchmarkLogger({ verbose: false });
      logger.header('Test');
      expect(consoleSpy).toHaveBeenCalledTimes(2);
      const secondCall = consoleSpy.mock.calls[1]?.[0] as string;
      expect(secondCall).toBe('====');
    });

    it('outputs error() regardless of verbose setting', () => {
      const logger = new BenchmarkLogger({ verbose: false });
      logger.error('backend unavailable');
      const calls = consoleSpy.mock.calls.flat().join(' ');
      expect(calls).toContain('backend unavailable');
    });

    it('outputs summary() regardless of verbose setting', () => {
      const logger = new BenchmarkLogger({ verbose: false });
      logger.summary({ key1: 'value1', key2: 0.123 });
      const calls = consoleSpy.mock.calls.flat().join(' ');
      expect(calls).toContain('Results');
      expect(calls).toContain('key1: value1');
      expect(calls).toContain('key2: 0.123');
    });

    it('outputs logModelScoreCompact() only when not verbose', () => {
      new BenchmarkLogger({ verbose: true }).logModelScoreCompact('openai/gpt-4o', 0.2, 3, 4);
      expect(consoleSpy).not.toHaveBeenCalled();

      new BenchmarkLogger({ verbose: false }).logModelScoreCompact('openai/gpt-4o', 0.2, 3, 4);
      const calls = consoleSpy.mock.calls.flat().join(' ');
      expect(calls).toContain('CRPS=0.2000');
      expect(calls).toContain('Tasks=3/4');
    });

    it('outputs logBenchmarkInfo() fields that are set', () => {
      const logger = new BenchmarkLogger();
      logger.logBenchmarkInfo({ tasks: 4, samples: 25, profile: 'full', models: ['a', 'b'] });
      expect(consoleSpy.mock.calls.map((call) => call[0])).toEqual([
        'Tasks: 4',
        'Samples per task: 25',
        'Context profile: full',
        'Models: a, b',
        '',
      ]);
    });
  });

  describe('spinner lifecycle', () => {
    it('starts, updates and succeeds a spinner', () => {
      const logger = new BenchmarkLogger();
      logger.startSpinner('Loading...');
      expect(() => logger.updateSpinner('Updated')).not.toThrow();
      expect(() => logger.succeedSpinner('Done!')).not.toThrow();
    });

    it('fails spinner without text', () => {
      const logger = new BenchmarkLogger();
      logger.startSpinner('Loading...');
      expect(() => logger.failSpinner()).not.toThrow();
    });

    it('handles spinner calls when no spinner active', () => {
      const logger = new BenchmarkLogger();
      expect(() => logger.updateSpinner('text')).not.toThrow();
      expect(() => logger.succeedSpinner('text')).not.toThrow();
      expect(() => logger.failSpinner('text')).not.toThrow();
    });
  });

  describe('createBenchmarkLogger factory', () => {
    it('creates logger with default options', () => {
      const logger = createBenchmarkLogger();
      expect(logger).toBeInstanceOf(BenchmarkLogger);
      logger.log('test');
      expect(consoleSpy).not.toHaveBeenCalled();
    });

    it('creates verbose logger when true passed', () => {
      const logger = createBenchmarkLogger(true);
      logger.log('test');
      expect(consoleSpy).toHaveBeenCalledWith('test');
    });
  });
});
