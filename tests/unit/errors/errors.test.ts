import { describe, it, expect } from 'vitest';
import {
  PerfError,
  SourceUnavailableError,
  InvalidPerfMetadataError,
  ExperimentNotExecutedError,
  RunnerDisposeError,
  ConfigurationError,
} from '../../../src/errors/index.js';

describe('Error Classes', () => {
  describe('PerfError', () => {
    it('should create basic error with required fields', () => {
      const error = new PerfError('Test error', { code: 'TEST_ERROR' });

      expect(error).toBeInstanceOf(Error);
      expect(error.message).toBe('Test error');
      expect(error.code).toBe('TEST_ERROR');
      expect(error.name).toBe('PerfError');
      expect(error.cause).toBeUndefined();
    });

    it('should serialize to JSON', () => {
      const cause = new Error('Original error');
      const json = new PerfError('Test error', { code: 'TEST_ERROR', cause }).toJSON();

      expect(json.name).toBe('PerfError');
      expect(json.message).toBe('Test error');
      expect(json.code).toBe('TEST_ERROR');
      expect(json.cause).toBe('Original error');
      expect(json.stack).toBeDefined();
    });
  });

  describe('SourceUnavailableError', () => {
    it('should name the function', () => {
      const error = new SourceUnavailableError('max');

      expect(error).toBeInstanceOf(PerfError);
      expect(error.name).toBe('SourceUnavailableError');
      expect(error.code).toBe('SOURCE_UNAVAILABLE');
      expect(error.functionName).toBe('max');
      expect(error.message).toBe('Source text is not available for function "max"');
    });

    it('should label anonymous functions', () => {
      expect(new SourceUnavailableError('').message).toBe(
        'Source text is not available for function "<anonymous>"'
      );
    });
  });

  describe('InvalidPerfMetadataError', () => {
    it('should carry the field name', () => {
      const error = new InvalidPerfMetadataError('deps', 'expected a string');

      expect(error.code).toBe('INVALID_METADATA');
      expect(error.field).toBe('deps');
      expect(error.message).toBe('Invalid "deps" metadata: expected a string');
    });
  });

  describe('ExperimentNotExecutedError', () => {
    it('should name the experiment', () => {
      const error = new ExperimentNotExecutedError('bench/perf_widgets.mjs:Widget timing');

      expect(error.code).toBe('NOT_EXECUTED');
      expect(error.message).toBe('Experiment "bench/perf_widgets.mjs:Widget timing" has not been executed');
    });
  });

  describe('RunnerDisposeError', () => {
    it('should keep every underlying error', () => {
      const first = new Error('first');
      const second = new Error('second');
      const error = new RunnerDisposeError([first, second]);

      expect(error.code).toBe('RUNNER_DISPOSE_FAILED');
      expect(error.message).toBe('2 runner(s) failed to dispose');
      expect(error.errors).toEqual([first, second]);
      expect(error.cause).toBe(first);
    });
  });

  describe('ConfigurationError', () => {
    it('should default the code', () => {
      const error = new ConfigurationError('bad config');

      expect(error.code).toBe('CONFIGURATION_ERROR');
      expect(error.name).toBe('ConfigurationError');
    });
  });
});
