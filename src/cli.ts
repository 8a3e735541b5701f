#!/usr/bin/env node
/**
 * perfspec CLI
 *
 * Lists and runs the perf experiments found under the given paths.
 */

import 'dotenv/config';
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { Command as Program } from 'commander';
import { loadSessionConfig, type SessionConfig } from './config/index.js';
import { funcsFromName } from './discovery/function-discoverer.js';
import { ConfigurationError } from './errors/index.js';
import { Command } from './runner/command.js';
import { loadRunnerConstructor } from './runner/runner-module.js';
import { findPerfModules, hasTypeScriptLoader, isTypeScriptFile } from './session/collector.js';
import { PerfSession } from './session/perf-session.js';
import { renderSummary } from './session/summary.js';
import { specFromFunc } from './spec/spec-builder.js';
import type { ExperimentSpec } from './types/index.js';

interface SharedOptions {
  config?: string;
  perfTarget?: string;
  perfBaseline?: string;
  rootDir?: string;
}

interface RunOptions extends SharedOptions {
  runner?: string;
}

function resolveConfig(paths: string[], options: RunOptions): SessionConfig {
  return loadSessionConfig({
    configPath: options.config,
    overrides: {
      target: options.perfTarget,
      baseline: options.perfBaseline,
      rootDir: options.rootDir,
      runner: options.runner,
      paths: paths.length > 0 ? paths : undefined,
    },
  });
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Collectable files for a config. TypeScript files are left out, with a notice,
 * unless a TypeScript loader is active.
 */
function collectFiles(config: SessionConfig): string[] {
  const files = findPerfModules(config.paths.length > 0 ? config.paths : ['.'], config.rootDir);
  if (hasTypeScriptLoader()) return files;

  const skipped = files.filter(isTypeScriptFile);
  if (skipped.length > 0) {
    console.error(
      `Skipped ${skipped.length} TypeScript file(s): run perfspec under a TypeScript loader (node --import tsx) to collect them`
    );
  }
  return files.filter((file) => !isTypeScriptFile(file));
}

function withSharedOptions(command: Program): Program {
  return command
    .option('-c, --config <file>', 'YAML config file')
    .option('--perf-target <target>', 'directory or distribution the experiments run against (default: ".")')
    .option('--perf-baseline <url>', 'git repository used as the performance comparison')
    .option('--root-dir <dir>', 'directory collected file names are relative to (default: cwd)');
}

async function listCommand(paths: string[], options: SharedOptions): Promise<number> {
  const config = resolveConfig(paths, options);
  const files = collectFiles(config);
  let failed = false;
  let count = 0;

  for (const file of files) {
    for (const fn of await funcsFromName(file, { rootDir: config.rootDir })) {
      try {
        const spec: ExperimentSpec = { target: config.target, baseline: config.baseline, ...specFromFunc(fn) };
        console.log(`${file}:${spec.name}`);
        console.log(JSON.stringify(spec, null, 2));
        count++;
      } catch (error) {
        failed = true;
        console.error(`ERROR ${file}:${fn.name}: ${describeError(error)}`);
      }
    }
  }

  console.log(`\nTotal: ${count} experiments`);
  return failed ? 1 : 0;
}

async function runCommand(paths: string[], options: RunOptions): Promise<number> {
  const config = resolveConfig(paths, options);
  if (!config.runner) {
    throw new ConfigurationError('No runner module given (use --runner or "runner" in the config file)');
  }
  const Runner = await loadRunnerConstructor(config.runner, { baseDir: process.cwd() });
  const files = collectFiles(config);

  const session = new PerfSession<unknown, Command>({
    runner: Runner,
    command: Command,
    target: config.target,
    baseline: config.baseline,
    rootDir: config.rootDir,
  });

  let failed = false;
  try {
    for (const file of files) {
      const { errors } = await session.collect(file);
      for (const { functionName, error } of errors) {
        failed = true;
        console.error(`ERROR ${file}:${functionName}: ${describeError(error)}`);
      }
    }

    const outcomes = await session.execute();
    for (const outcome of outcomes) {
      if (outcome.success) continue;
      failed = true;
      console.error(`FAILED ${outcome.experiment.name}: ${describeError(outcome.error)}`);
    }

    const summary = renderSummary(session.summaryLines());
    if (summary) console.log(summary);
  } finally {
    await session.finish();
  }

  return failed ? 1 : 0;
}

export function createProgram(): Program {
  const program = new Program();

  program
    .name('perfspec')
    .description('Discover perf functions and run them as benchmark experiments')
    .version('0.1.0');

  withSharedOptions(
    program.command('list').argument('[paths...]', 'files or directories to collect from')
  )
    .description('Print the experiment specs found under the given paths without running them')
    .action(async (paths: string[], options: SharedOptions) => {
      try {
        process.exitCode = await listCommand(paths, options);
      } catch (error) {
        console.error('Error:', describeError(error));
        process.exitCode = 1;
      }
    });

  withSharedOptions(
    program.command('run').argument('[paths...]', 'files or directories to collect from')
  )
    .description('Run the experiments found under the given paths')
    .option('-r, --runner <module>', 'module exporting the benchmark runner class')
    .action(async (paths: string[], options: RunOptions) => {
      try {
        process.exitCode = await runCommand(paths, options);
      } catch (error) {
        console.error('Error:', describeError(error));
        process.exitCode = 1;
      }
    });

  return program;
}

function isEntryPoint(): boolean {
  if (!process.argv[1]) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(process.argv[1])).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(describeError(error));
      process.exitCode = 1;
    });
}
