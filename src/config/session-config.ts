/**
 * Session Configuration
 *
 * Settings a perf session is created with. Sources, lowest precedence first:
 * environment variables, an optional YAML config file, explicit overrides
 * (CLI flags).
 *
 * Environment variables:
 * - PERF_TARGET: directory or distribution under test (default: '.')
 * - PERF_BASELINE: repository URL used as comparison (default: none)
 * - PERF_ROOT_DIR: directory module paths resolve against (default: cwd)
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { getEnvOptional, getEnvWithDefault } from '../utils/env.js';

/**
 * Session configuration schema
 */
export const SessionConfigSchema = z.object({
  /** Directory or distribution the experiments run against */
  target: z.string().min(1).default('.'),
  /** Comparison repository; null lets the runner pick its default */
  baseline: z.string().min(1).nullable().default(null),
  /** Directory collected file names are relative to */
  rootDir: z.string().min(1),
  /** Module exporting the runner constructor */
  runner: z.string().min(1).optional(),
  /** Files or directories to collect from */
  paths: z.array(z.string().min(1)).default([]),
});

export type SessionConfig = z.infer<typeof SessionConfigSchema>;

/**
 * Shape of a YAML config file; every entry optional
 */
export const ConfigFileSchema = z
  .object({
    target: z.string().min(1),
    baseline: z.string().min(1).nullable(),
    rootDir: z.string().min(1),
    runner: z.string().min(1),
    paths: z.array(z.string().min(1)),
  })
  .partial()
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

const CONFIG_KEYS = ['target', 'baseline', 'rootDir', 'runner', 'paths'] as const;

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
}

/**
 * Load a YAML config file. `rootDir` and `runner` given as relative paths
 * resolve against the file's directory.
 */
export function loadConfigFile(configPath: string): ConfigFile {
  const absolutePath = resolve(process.cwd(), configPath);
  if (!existsSync(absolutePath)) {
    throw new ConfigurationError(`Config file not found: ${absolutePath}`);
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(absolutePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Config file is not valid YAML: ${absolutePath}`, { cause: error });
  }

  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid config ${absolutePath}: ${formatIssues(parsed.error)}`, {
      cause: parsed.error,
    });
  }

  const dir = dirname(absolutePath);
  const file = parsed.data;
  return {
    ...file,
    ...(file.rootDir !== undefined ? { rootDir: resolve(dir, file.rootDir) } : {}),
    ...(file.runner?.startsWith('.') ? { runner: resolve(dir, file.runner) } : {}),
  };
}

/**
 * Configuration derived from environment variables
 */
export function loadEnvConfig(): ConfigFile {
  return {
    target: getEnvWithDefault('PERF_TARGET', '.'),
    baseline: getEnvOptional('PERF_BASELINE') ?? null,
    rootDir: getEnvWithDefault('PERF_ROOT_DIR', process.cwd()),
  };
}

/**
 * Merge configuration sources; later sources win, undefined entries are skipped.
 */
export function mergeConfig(...sources: ConfigFile[]): ConfigFile {
  const merged: ConfigFile = {};
  for (const source of sources) {
    for (const key of CONFIG_KEYS) {
      if (source[key] !== undefined) {
        Object.assign(merged, { [key]: source[key] });
      }
    }
  }
  return merged;
}

export interface LoadSessionConfigOptions {
  /** Path of a YAML config file */
  configPath?: string;
  overrides?: ConfigFile;
}

/**
 * Resolve the session configuration from env, config file and overrides
 */
export function loadSessionConfig(options: LoadSessionConfigOptions = {}): SessionConfig {
  const file = options.configPath ? loadConfigFile(options.configPath) : {};
  const merged = mergeConfig(loadEnvConfig(), file, options.overrides ?? {});

  const parsed = SessionConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(parsed.error)}`, {
      cause: parsed.error,
    });
  }
  return { ...parsed.data, rootDir: resolve(parsed.data.rootDir) };
}
