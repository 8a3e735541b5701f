/**
 * Perf Session
 *
 * Owns everything that lives for one run: the runner cache and the ordered
 * registry of collected experiments. Hosts drive it by pulling:
 * collect a file into experiments, execute them, read the summary, finish.
 */

import { funcsFromName } from '../discovery/function-discoverer.js';
import { RunnerDisposeError } from '../errors/index.js';
import { construct } from '../runner/params.js';
import { RunnerCache } from '../runner/runner-cache.js';
import { specFromFunc } from '../spec/spec-builder.js';
import { createLogger } from '../utils/logger.js';
import { Experiment, type ExperimentParent } from './experiment.js';
import type {
  CollectContext,
  CommandConstructor,
  ExperimentSpec,
  ModuleImporter,
  PerfFunction,
  RunnerConstructor,
} from '../types/index.js';

const logger = createLogger('PerfSession');

export interface PerfSessionOptions<R, C> {
  runner: RunnerConstructor<R, C>;
  command: CommandConstructor<C>;
  /** Default target for collected files (default: '.') */
  target?: string;
  /** Default baseline for collected files (default: null) */
  baseline?: string | null;
  /** Directory collected file names are relative to (default: cwd) */
  rootDir?: string;
  importer?: ModuleImporter;
}

/**
 * A perf function whose spec could not be built
 */
export interface CollectError {
  file: string;
  functionName: string;
  error: unknown;
}

export interface CollectResult<R, C> {
  experiments: Experiment<R, C>[];
  errors: CollectError[];
}

export interface ExperimentOutcome<R, C> {
  experiment: Experiment<R, C>;
  success: boolean;
  durationMs: number;
  error?: unknown;
}

export class PerfSession<R = unknown, C = unknown> implements ExperimentParent<R, C> {
  readonly runners: RunnerCache<R, C>;
  private readonly command: CommandConstructor<C>;
  private readonly context: CollectContext;
  private readonly rootDir?: string;
  private readonly importer?: ModuleImporter;
  private readonly registry: Experiment<R, C>[] = [];
  private finished = false;

  constructor(options: PerfSessionOptions<R, C>) {
    this.runners = new RunnerCache(options.runner);
    this.command = options.command;
    this.context = {
      target: options.target ?? '.',
      baseline: options.baseline ?? null,
    };
    this.rootDir = options.rootDir;
    this.importer = options.importer;
  }

  /**
   * Every experiment created in this session, in creation order
   */
  get experiments(): readonly Experiment<R, C>[] {
    return this.registry;
  }

  createCommand(spec: ExperimentSpec): C {
    return construct(this.command, spec);
  }

  register(experiment: Experiment<R, C>): void {
    this.registry.push(experiment);
  }

  /**
   * Build one experiment per perf function of a collected file.
   * A function whose spec cannot be built is reported in `errors`; its siblings are still collected.
   */
  async collect(file: string, context: Partial<CollectContext> = {}): Promise<CollectResult<R, C>> {
    const funcs = await funcsFromName(file, { rootDir: this.rootDir, importer: this.importer });
    const base: CollectContext = { ...this.context, ...context };
    const result: CollectResult<R, C> = { experiments: [], errors: [] };

    for (const fn of funcs) {
      const spec = this.buildSpec(file, fn, base, result.errors);
      if (spec) {
        result.experiments.push(new Experiment(`${file}:${spec.name}`, this, spec));
      }
    }

    logger.debug(
      { file, experiments: result.experiments.length, errors: result.errors.length },
      'File collected'
    );
    return result;
  }

  private buildSpec(
    file: string,
    fn: PerfFunction,
    context: CollectContext,
    errors: CollectError[]
  ): ExperimentSpec | undefined {
    try {
      return { target: context.target, baseline: context.baseline, ...specFromFunc(fn) };
    } catch (error) {
      logger.warn({ file, function: fn.name, err: error }, 'Could not build experiment spec');
      errors.push({ file, functionName: fn.name, error });
      return undefined;
    }
  }

  /**
   * Run experiments one after another. A failing experiment is recorded and
   * does not stop the ones after it.
   */
  async execute(
    experiments: readonly Experiment<R, C>[] = this.registry
  ): Promise<ExperimentOutcome<R, C>[]> {
    const outcomes: ExperimentOutcome<R, C>[] = [];

    for (const experiment of experiments) {
      const startTime = Date.now();
      try {
        await experiment.run();
        outcomes.push({ experiment, success: true, durationMs: Date.now() - startTime });
        logger.info({ experiment: experiment.name }, 'Experiment completed');
      } catch (error) {
        outcomes.push({ experiment, success: false, durationMs: Date.now() - startTime, error });
        logger.error({ experiment: experiment.name, err: error }, 'Experiment failed');
      }
    }

    return outcomes;
  }

  /**
   * One line per executed experiment, in collection order
   */
  summaryLines(): string[] {
    return this.registry.filter((experiment) => experiment.executed).map(String);
  }

  /**
   * Clear the runner cache and dispose the evicted runners. Runs once per
   * session; later calls do nothing.
   *
   * @throws RunnerDisposeError after every runner was attempted, if any failed
   */
  async finish(): Promise<void> {
    if (this.finished) return;
    this.finished = true;

    const runners = this.runners.clear();
    const errors: unknown[] = [];
    for (const runner of runners) {
      if (!runner.dispose) continue;
      try {
        await runner.dispose();
      } catch (error) {
        errors.push(error);
      }
    }

    logger.debug({ runners: runners.length, failures: errors.length }, 'Session finished');
    if (errors.length > 0) {
      throw new RunnerDisposeError(errors);
    }
  }
}
