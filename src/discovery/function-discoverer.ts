/**
 * Function Discoverer
 *
 * Finds the perf functions exported by the module a collected file names.
 */

import { importModuleFile, loadModule, resolveModuleFile } from './module-loader.js';
import type { ModuleLoaderOptions, PerfFunction } from '../types/index.js';

/**
 * A name is eligible when "perf" adjoins a word boundary or an underscore on both sides.
 */
export const PERF_NAME_PATTERN = /(\b|_)perf(\b|_)/;

export function isPerfName(name: string): boolean {
  return PERF_NAME_PATTERN.test(name);
}

function isPerfFunction(value: unknown): value is PerfFunction {
  return typeof value === 'function';
}

/**
 * Turn a collected file name into a dotted module path.
 * The last dotted segment (the extension) is dropped; directory separators become dots.
 *
 * @example
 * modulePathFromName('bench/perf_widgets.mjs'); // 'bench.perf_widgets'
 */
export function modulePathFromName(name: string): string {
  const cut = name.lastIndexOf('.');
  const prefix = cut === -1 ? '' : name.slice(0, cut);
  return prefix.replace(/[\\/]/g, '.');
}

/**
 * Load the module behind `name` and return its perf-named function exports.
 * A name that is an existing module file under the root directory loads that
 * file; any other name goes through its dotted module path.
 * Order follows the module's export enumeration.
 */
export async function funcsFromName(
  name: string,
  options: ModuleLoaderOptions = {}
): Promise<PerfFunction[]> {
  const file = resolveModuleFile(name, options.rootDir);
  const mod = file
    ? await importModuleFile(file, options)
    : await loadModule(modulePathFromName(name), options);
  if (!mod) return [];

  const funcs: PerfFunction[] = [];
  for (const key of Object.keys(mod)) {
    if (!isPerfName(key)) continue;
    const value = mod[key];
    if (isPerfFunction(value)) funcs.push(value);
  }
  return funcs;
}
