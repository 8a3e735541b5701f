/**
 * Perf metadata
 *
 * Functions carry their experiment metadata either through `perf()`, which
 * records it in a side table keyed by the function, or as own properties of
 * the function object (`fn.deps = ['lib']`). The side table wins when both
 * declare the same entry.
 */

import type { PerfFunction, PerfMetadata } from '../types/index.js';

const METADATA_KEYS = ['doc', 'extras', 'deps', 'control'] as const;

type MetadataKey = (typeof METADATA_KEYS)[number];

/**
 * Metadata as found on a function, before validation.
 * A key is present only when the function declares that entry.
 */
export type PerfDescriptor = Partial<Record<MetadataKey, unknown>>;

const registry = new WeakMap<PerfFunction, PerfMetadata>();

/**
 * Attach perf metadata to a function and return the function.
 *
 * @example
 * export const widget_perf = perf(
 *   function widget_perf() {
 *     const widget = makeWidget();
 *     // end warmup
 *     widget.render();
 *   },
 *   { doc: 'Widget rendering', deps: ['widgets'] }
 * );
 */
export function perf<F extends PerfFunction>(fn: F, metadata: PerfMetadata = {}): F {
  registry.set(fn, { ...registry.get(fn), ...metadata });
  return fn;
}

/**
 * Collect the declared metadata entries of a function.
 * Entries declared as `undefined` count as absent.
 */
export function describePerf(fn: PerfFunction): PerfDescriptor {
  const registered = registry.get(fn);
  const descriptor: PerfDescriptor = {};

  for (const key of METADATA_KEYS) {
    if (registered && Object.hasOwn(registered, key) && registered[key] !== undefined) {
      descriptor[key] = registered[key];
      continue;
    }
    if (Object.hasOwn(fn, key)) {
      const value: unknown = Reflect.get(fn, key);
      if (value !== undefined) descriptor[key] = value;
    }
  }

  return descriptor;
}
