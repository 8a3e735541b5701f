/**
 * Core type definitions for perfspec
 */

// ============================================
// Discovery Types
// ============================================

/**
 * Any function exported from a perf module.
 * Perf functions are never called; only their source text is read.
 */
export type PerfFunction = (...args: never[]) => unknown;

/**
 * Metadata a perf function may carry.
 * Absent entries are meaningful: they leave the matching spec field out.
 */
export interface PerfMetadata {
  /** Documentation text; its first non-blank line names the experiment */
  doc?: string;
  /** Auxiliary packages or data the experiment needs */
  extras?: Iterable<unknown>;
  /** Dependency declarations */
  deps?: Iterable<unknown>;
  /** Opaque value selecting an alternate baseline-control mode */
  control?: unknown;
}

// ============================================
// Specification Types
// ============================================

/**
 * Experiment specification built from a function alone
 */
export interface FunctionSpec {
  name: string;
  extras?: readonly unknown[];
  deps?: readonly unknown[];
  control?: unknown;
  /** Code run once before measurement */
  warmup?: string;
  /** Code run under measurement */
  exercise: string;
}

/**
 * Complete experiment specification, merged with the collecting context
 */
export interface ExperimentSpec extends FunctionSpec {
  /** Directory or distribution under test */
  target: string;
  /** Repository used as comparison reference; null picks the runner's default */
  baseline: string | null;
}

export type SpecField = keyof ExperimentSpec;

/**
 * The subset of spec fields handed to a constructor
 */
export type SpecParams = Partial<ExperimentSpec>;

/**
 * A constructor instantiated from spec fields.
 * `params` lists the fields it accepts; every other field is left out.
 */
export interface SpecConsumer<T> {
  readonly params: readonly SpecField[];
  new (options: SpecParams): T;
}

// ============================================
// Runner Types
// ============================================

/**
 * Live environment able to execute commands (prepared target, checked-out baseline)
 */
export interface BenchmarkRunner<R = unknown, C = unknown> {
  run(command: C): R | Promise<R>;
  /** Release whatever the runner prepared; called once when the session ends */
  dispose?(): void | Promise<void>;
}

export type RunnerConstructor<R = unknown, C = unknown> = SpecConsumer<BenchmarkRunner<R, C>>;

export type CommandConstructor<C> = SpecConsumer<C>;

// ============================================
// Session Types
// ============================================

/**
 * Values injected into every spec collected from one file
 */
export interface CollectContext {
  target: string;
  baseline: string | null;
}

/**
 * Loads a module from a file URL
 */
export type ModuleImporter = (url: string) => Promise<unknown>;

export interface ModuleLoaderOptions {
  /** Directory dotted module paths are resolved against (default: cwd) */
  rootDir?: string;
  /** Import function (default: native dynamic import) */
  importer?: ModuleImporter;
}
