/**
 * File collection
 *
 * Picks the files a session collects experiments from: module files that
 * mention the package by name.
 */

import { readdirSync, readFileSync, statSync } from 'node:fs';
import { extname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import { MODULE_EXTENSIONS } from '../discovery/module-loader.js';
import { ConfigurationError } from '../errors/index.js';

/**
 * Token a file must contain to be collected
 */
export const COLLECT_TOKEN = 'perfspec';

const SKIPPED_DIRECTORIES = new Set(['node_modules', 'dist', 'coverage']);

/**
 * Extensions Node.js imports only under a TypeScript loader
 */
export const TYPESCRIPT_EXTENSIONS = ['.ts', '.mts', '.cts'] as const;

const TYPESCRIPT_LOADER =
  /(?:^|[\s=/])(?:tsx|ts-node|@swc-node\/register)(?:[\s/.]|$)|--experimental-(?:strip|transform)-types/;

export function isTypeScriptFile(path: string): boolean {
  return (TYPESCRIPT_EXTENSIONS as readonly string[]).includes(extname(path));
}

/**
 * Whether the process runs under a loader that lets `import()` load TypeScript,
 * judged from its exec arguments and NODE_OPTIONS.
 */
export function hasTypeScriptLoader(
  execArgv: readonly string[] = process.execArgv,
  nodeOptions: string | undefined = process.env.NODE_OPTIONS
): boolean {
  return TYPESCRIPT_LOADER.test([...execArgv, nodeOptions ?? ''].join(' '));
}

function hasModuleExtension(path: string): boolean {
  return (MODULE_EXTENSIONS as readonly string[]).includes(extname(path));
}

export function isPerfModule(path: string, contents: string): boolean {
  return hasModuleExtension(path) && !path.endsWith('.d.ts') && contents.includes(COLLECT_TOKEN);
}

function walk(dir: string, found: string[]): void {
  const entries = readdirSync(dir, { withFileTypes: true }).sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    if (entry.name.startsWith('.') || SKIPPED_DIRECTORIES.has(entry.name)) continue;
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      walk(path, found);
    } else if (entry.isFile() && isPerfModule(path, readFileSync(path, 'utf-8'))) {
      found.push(path);
    }
  }
}

/**
 * Collectable files under `paths`, as names relative to `rootDir` with `/` separators.
 * Explicitly named files are collected when they pass the same check as walked ones.
 */
export function findPerfModules(paths: readonly string[], rootDir: string): string[] {
  const root = resolve(rootDir);
  const found: string[] = [];

  for (const path of paths) {
    const absolute = resolve(root, path);
    const stats = statSync(absolute, { throwIfNoEntry: false });
    if (!stats) {
      throw new ConfigurationError(`Path not found: ${absolute}`);
    }
    if (stats.isDirectory()) {
      walk(absolute, found);
    } else if (isPerfModule(absolute, readFileSync(absolute, 'utf-8'))) {
      found.push(absolute);
    }
  }

  return [...new Set(found)].map((file) => {
    const name = relative(root, file);
    if (name.startsWith('..') || isAbsolute(name)) {
      throw new ConfigurationError(`${file} is outside the root directory ${root}`);
    }
    return name.split(sep).join('/');
  });
}
