/**
 * Runner Cache
 *
 * Memoizing factory over a runner constructor: one live runner per distinct
 * set of constructor arguments until the cache is cleared. Lookups compare
 * arguments by value (see canonicalKey).
 */

import { canonicalKey } from '../utils/canonical-key.js';
import { createLogger } from '../utils/logger.js';
import { pickParams } from './params.js';
import type {
  BenchmarkRunner,
  ExperimentSpec,
  RunnerConstructor,
  SpecParams,
} from '../types/index.js';

const logger = createLogger('RunnerCache');

export class RunnerCache<R = unknown, C = unknown> {
  private readonly runners = new Map<string, BenchmarkRunner<R, C>>();

  constructor(private readonly factory: RunnerConstructor<R, C>) {}

  /**
   * Runner built for these exact arguments, constructing it on first request
   */
  get(params: SpecParams): BenchmarkRunner<R, C> {
    const key = canonicalKey(params);
    const cached = this.runners.get(key);
    if (cached) return cached;

    const runner = new this.factory(params);
    this.runners.set(key, runner);
    logger.debug({ key, cached: this.runners.size }, 'Runner created');
    return runner;
  }

  /**
   * Runner for a spec, passing only the fields the runner constructor accepts
   */
  forSpec(spec: ExperimentSpec): BenchmarkRunner<R, C> {
    return this.get(pickParams(spec, this.factory.params));
  }

  /**
   * Forget every cached runner and return them; teardown is left to the caller
   */
  clear(): BenchmarkRunner<R, C>[] {
    const evicted = [...this.runners.values()];
    this.runners.clear();
    logger.debug({ evicted: evicted.length }, 'Runner cache cleared');
    return evicted;
  }

  get size(): number {
    return this.runners.size;
  }
}
