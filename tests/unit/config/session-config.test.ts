import { describe, it, expect, beforeEach, afterEach, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  loadConfigFile,
  loadEnvConfig,
  loadSessionConfig,
  mergeConfig,
} from '../../../src/config/session-config.js';
import { ConfigurationError } from '../../../src/errors/index.js';

const ENV_KEYS = ['PERF_TARGET', 'PERF_BASELINE', 'PERF_ROOT_DIR'] as const;

describe('Session Configuration', () => {
  let originalEnv: Record<string, string | undefined>;
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'perfspec-config-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    originalEnv = {};
    for (const key of ENV_KEYS) {
      originalEnv[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = originalEnv[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  function writeConfig(name: string, contents: string): string {
    const path = join(dir, name);
    writeFileSync(path, contents);
    return path;
  }

  describe('loadEnvConfig', () => {
    it('should use defaults when no variables are set', () => {
      expect(loadEnvConfig()).toEqual({ target: '.', baseline: null, rootDir: process.cwd() });
    });

    it('should read the PERF_ variables', () => {
      process.env.PERF_TARGET = 'packages/widgets';
      process.env.PERF_BASELINE = 'https://example.com/widgets.git';
      process.env.PERF_ROOT_DIR = '/srv/bench';

      expect(loadEnvConfig()).toEqual({
        target: 'packages/widgets',
        baseline: 'https://example.com/widgets.git',
        rootDir: '/srv/bench',
      });
    });

    it('should treat an empty baseline as none', () => {
      process.env.PERF_BASELINE = '';

      expect(loadEnvConfig().baseline).toBeNull();
    });
  });

  describe('loadConfigFile', () => {
    it('should resolve relative paths against the file directory', () => {
      const path = writeConfig(
        'relative.yaml',
        'target: packages/widgets\nbaseline: main\nrootDir: bench-root\nrunner: ./runners/local.mjs\npaths:\n  - bench\n'
      );

      expect(loadConfigFile(path)).toEqual({
        target: 'packages/widgets',
        baseline: 'main',
        rootDir: join(dir, 'bench-root'),
        runner: join(dir, 'runners', 'local.mjs'),
        paths: ['bench'],
      });
    });

    it('should leave package runner specifiers alone', () => {
      const path = writeConfig('package-runner.yaml', 'runner: widget-runner\n');

      expect(loadConfigFile(path)).toEqual({ runner: 'widget-runner' });
    });

    it('should accept an explicit null baseline', () => {
      const path = writeConfig('null-baseline.yaml', 'baseline: null\n');

      expect(loadConfigFile(path)).toEqual({ baseline: null });
    });

    it('should treat an empty file as empty configuration', () => {
      const path = writeConfig('empty.yaml', '');

      expect(loadConfigFile(path)).toEqual({});
    });

    it('should reject a missing file', () => {
      expect(() => loadConfigFile(join(dir, 'missing.yaml'))).toThrow(ConfigurationError);
    });

    it('should reject invalid YAML', () => {
      const path = writeConfig('invalid.yaml', 'target: [unclosed\n');

      expect(() => loadConfigFile(path)).toThrow(/is not valid YAML/);
    });

    it('should reject unknown keys', () => {
      const path = writeConfig('unknown.yaml', 'target: .\nrepository: main\n');

      expect(() => loadConfigFile(path)).toThrow(ConfigurationError);
    });

    it('should reject entries of the wrong type', () => {
      const path = writeConfig('wrong-type.yaml', 'paths: bench\n');

      expect(() => loadConfigFile(path)).toThrow(/paths:/);
    });
  });

  describe('mergeConfig', () => {
    it('should let later sources win', () => {
      expect(mergeConfig({ target: 'a', baseline: 'main' }, { target: 'b' })).toEqual({
        target: 'b',
        baseline: 'main',
      });
    });

    it('should skip undefined entries', () => {
      expect(mergeConfig({ target: 'a' }, { target: undefined, runner: undefined })).toEqual({ target: 'a' });
    });

    it('should keep an explicit null baseline', () => {
      expect(mergeConfig({ baseline: 'main' }, { baseline: null })).toEqual({ baseline: null });
    });
  });

  describe('loadSessionConfig', () => {
    it('should apply defaults', () => {
      expect(loadSessionConfig()).toEqual({
        target: '.',
        baseline: null,
        rootDir: process.cwd(),
        paths: [],
      });
    });

    it('should let the file override the environment', () => {
      process.env.PERF_TARGET = 'env-target';
      process.env.PERF_BASELINE = 'env-baseline';
      const configPath = writeConfig('precedence.yaml', 'target: file-target\n');

      const config = loadSessionConfig({ configPath });

      expect(config.target).toBe('file-target');
      expect(config.baseline).toBe('env-baseline');
    });

    it('should let overrides win over file and environment', () => {
      process.env.PERF_TARGET = 'env-target';
      const configPath = writeConfig('overridden.yaml', 'target: file-target\npaths:\n  - bench\n');

      const config = loadSessionConfig({
        configPath,
        overrides: { target: 'flag-target', paths: undefined },
      });

      expect(config.target).toBe('flag-target');
      expect(config.paths).toEqual(['bench']);
    });

    it('should resolve the root directory', () => {
      process.env.PERF_ROOT_DIR = 'bench';

      expect(loadSessionConfig().rootDir).toBe(join(process.cwd(), 'bench'));
    });

    it('should reject invalid values', () => {
      expect(() => loadSessionConfig({ overrides: { target: '' } })).toThrow(ConfigurationError);
    });
  });
});
