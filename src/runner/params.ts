/**
 * Named-parameter construction from a spec
 */

import type { ExperimentSpec, SpecConsumer, SpecField, SpecParams } from '../types/index.js';

/**
 * Copy the listed fields that are present on `spec`. Absent fields stay absent
 * so the receiving constructor applies its own defaults.
 */
export function pickParams(spec: ExperimentSpec, params: readonly SpecField[]): SpecParams {
  const picked: SpecParams = {};
  for (const key of params) {
    if (Object.hasOwn(spec, key)) {
      Object.assign(picked, { [key]: spec[key] });
    }
  }
  return picked;
}

/**
 * Instantiate `consumer` from the spec fields it accepts; the rest are ignored.
 */
export function construct<T>(consumer: SpecConsumer<T>, spec: ExperimentSpec): T {
  return new consumer(pickParams(spec, consumer.params));
}

/**
 * Every field an ExperimentSpec may carry
 */
export const SPEC_FIELDS = [
  'name',
  'target',
  'baseline',
  'extras',
  'deps',
  'control',
  'warmup',
  'exercise',
] as const satisfies readonly SpecField[];

export function isSpecField(value: unknown): value is SpecField {
  return typeof value === 'string' && (SPEC_FIELDS as readonly string[]).includes(value);
}
