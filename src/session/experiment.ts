/**
 * Experiment: one collected, executable perf unit
 */

import { ExperimentNotExecutedError, PerfError } from '../errors/index.js';
import type { RunnerCache } from '../runner/runner-cache.js';
import type { BenchmarkRunner, ExperimentSpec } from '../types/index.js';

/**
 * Collection context an experiment belongs to
 */
export interface ExperimentParent<R, C> {
  readonly runners: RunnerCache<R, C>;
  createCommand(spec: ExperimentSpec): C;
  register(experiment: Experiment<R, C>): void;
}

type Outcome<R> = { state: 'pending' } | { state: 'running' } | { state: 'executed'; results: R };

export class Experiment<R = unknown, C = unknown> {
  readonly name: string;
  readonly spec: ExperimentSpec;
  readonly command: C;
  private readonly parent: ExperimentParent<R, C>;
  private outcome: Outcome<R> = { state: 'pending' };

  constructor(name: string, parent: ExperimentParent<R, C>, spec: ExperimentSpec) {
    this.name = name;
    this.parent = parent;
    this.spec = spec;
    this.command = parent.createCommand(spec);
    parent.register(this);
  }

  /**
   * Shared runner for this experiment's configuration, resolved on each access
   */
  get runner(): BenchmarkRunner<R, C> {
    return this.parent.runners.forSpec(this.spec);
  }

  /**
   * Run the command on the runner and keep the results. Runner errors propagate
   * and leave the experiment pending.
   */
  async run(): Promise<R> {
    if (this.outcome.state !== 'pending') {
      const status = this.outcome.state === 'running' ? 'is already running' : 'has already been executed';
      throw new PerfError(`Experiment "${this.name}" ${status}`, { code: 'ALREADY_EXECUTED' });
    }

    this.outcome = { state: 'running' };
    try {
      const results = await this.runner.run(this.command);
      this.outcome = { state: 'executed', results };
      return results;
    } catch (error) {
      this.outcome = { state: 'pending' };
      throw error;
    }
  }

  /** True once a run completed, whatever the results are */
  get executed(): boolean {
    return this.outcome.state === 'executed';
  }

  get results(): R {
    if (this.outcome.state !== 'executed') {
      throw new ExperimentNotExecutedError(this.name);
    }
    return this.outcome.results;
  }

  toString(): string {
    return `${this.name}: ${String(this.results)}`;
  }
}
