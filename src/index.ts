/**
 * perfspec
 *
 * Discovers perf functions in modules, turns them into experiment specs and
 * runs them against runners shared per configuration.
 */

export * from './types/index.js';
export * from './errors/index.js';
export * from './discovery/index.js';
export * from './spec/index.js';
export * from './runner/index.js';
export * from './session/index.js';
export * from './config/index.js';
export { dedent, firstLine } from './utils/text.js';
export { createLogger } from './utils/logger.js';
