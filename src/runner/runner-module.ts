/**
 * Loading a runner constructor from a user module.
 *
 * The module provides the runner as its default export or as a named
 * `BenchmarkRunner` export: a class with a static `params` list naming the
 * spec fields its constructor accepts.
 */

import { isAbsolute, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { ConfigurationError } from '../errors/index.js';
import { isSpecField } from './params.js';
import type { ModuleImporter, RunnerConstructor } from '../types/index.js';

const nativeImport: ModuleImporter = (url) => import(url);

export function isRunnerConstructor(value: unknown): value is RunnerConstructor {
  if (typeof value !== 'function') return false;
  const params: unknown = Reflect.get(value, 'params');
  return Array.isArray(params) && params.every(isSpecField);
}

function toImportSpecifier(specifier: string, baseDir: string): string {
  if (specifier.startsWith('.') || isAbsolute(specifier)) {
    return pathToFileURL(resolve(baseDir, specifier)).href;
  }
  return specifier;
}

/**
 * Import a runner module and return its runner constructor.
 * Unlike perf modules, a runner module that fails to load is an error.
 *
 * @throws ConfigurationError when the module cannot be imported or exports no runner
 */
export async function loadRunnerConstructor(
  specifier: string,
  options: { baseDir?: string; importer?: ModuleImporter } = {}
): Promise<RunnerConstructor> {
  const importer = options.importer ?? nativeImport;
  let mod: unknown;
  try {
    mod = await importer(toImportSpecifier(specifier, options.baseDir ?? process.cwd()));
  } catch (error) {
    throw new ConfigurationError(`Cannot load runner module "${specifier}"`, { cause: error });
  }

  if (typeof mod === 'object' && mod !== null) {
    for (const exportName of ['default', 'BenchmarkRunner']) {
      const candidate: unknown = Reflect.get(mod, exportName);
      if (isRunnerConstructor(candidate)) return candidate;
    }
  }
  throw new ConfigurationError(
    `Runner module "${specifier}" must export a runner class (default or "BenchmarkRunner") with a static "params" list`
  );
}
