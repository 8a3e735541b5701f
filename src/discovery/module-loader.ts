/**
 * Module Loader
 *
 * Resolves a dotted module path against a root directory and imports it.
 * Any failure (missing file, syntax error, exception while the module
 * evaluates) yields `undefined`: a broken module contributes no experiments.
 */

import { statSync } from 'node:fs';
import { extname, join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { ModuleImporter, ModuleLoaderOptions } from '../types/index.js';

/**
 * Extensions tried, in order, when resolving a module path to a file
 */
export const MODULE_EXTENSIONS = ['.js', '.mjs', '.cjs', '.ts', '.mts', '.cts'] as const;

export type ModuleNamespace = Readonly<Record<string, unknown>>;

const nativeImport: ModuleImporter = (url) => import(url);

function isFile(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isFile() ?? false;
}

function isNamespace(value: unknown): value is ModuleNamespace {
  return typeof value === 'object' && value !== null;
}

/**
 * Map a dotted module path to the file it names, if one exists.
 *
 * @example
 * resolveModulePath('bench.perf_widgets', '/repo'); // '/repo/bench/perf_widgets.js'
 */
export function resolveModulePath(name: string, rootDir: string = process.cwd()): string | undefined {
  const segments = name.split('.');
  if (segments.some((segment) => segment.length === 0)) {
    return undefined;
  }

  const base = resolve(rootDir, ...segments);
  for (const ext of MODULE_EXTENSIONS) {
    if (isFile(`${base}${ext}`)) return `${base}${ext}`;
  }
  for (const ext of MODULE_EXTENSIONS) {
    const index = join(base, `index${ext}`);
    if (isFile(index)) return index;
  }
  return undefined;
}

/**
 * The file a relative file name points at, when it exists and has a module extension.
 *
 * @example
 * resolveModuleFile('bench/widgets.perf.mjs', '/repo'); // '/repo/bench/widgets.perf.mjs'
 */
export function resolveModuleFile(fileName: string, rootDir: string = process.cwd()): string | undefined {
  if (!(MODULE_EXTENSIONS as readonly string[]).includes(extname(fileName))) {
    return undefined;
  }
  const path = resolve(rootDir, fileName);
  return isFile(path) ? path : undefined;
}

/**
 * Import the module file at `path`, or `undefined` if that fails in any way.
 */
export async function importModuleFile(
  path: string,
  options: ModuleLoaderOptions = {}
): Promise<ModuleNamespace | undefined> {
  try {
    const importer = options.importer ?? nativeImport;
    const mod = await importer(pathToFileURL(path).href);
    return isNamespace(mod) ? mod : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Import the module named by a dotted path, or `undefined` if that fails in any way.
 */
export async function loadModule(
  name: string,
  options: ModuleLoaderOptions = {}
): Promise<ModuleNamespace | undefined> {
  const path = resolveModulePath(name, options.rootDir);
  return path ? importModuleFile(path, options) : undefined;
}
