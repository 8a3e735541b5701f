/**
 * Command: what to run for one experiment
 */

import { ConfigurationError } from '../errors/index.js';
import type { SpecField } from '../types/index.js';

export interface CommandOptions {
  exercise?: string;
  warmup?: string;
  extras?: readonly unknown[];
  deps?: readonly unknown[];
  control?: unknown;
}

export class Command {
  static readonly params = ['exercise', 'warmup', 'extras', 'deps', 'control'] as const satisfies readonly SpecField[];

  readonly exercise: string;
  readonly warmup: string;
  readonly extras: readonly unknown[];
  readonly deps: readonly unknown[];
  readonly control: unknown;

  constructor(options: CommandOptions) {
    if (options.exercise === undefined) {
      throw new ConfigurationError('Command requires "exercise" code');
    }
    this.exercise = options.exercise;
    this.warmup = options.warmup ?? '';
    this.extras = options.extras ?? [];
    this.deps = options.deps ?? [];
    this.control = options.control;
  }
}
