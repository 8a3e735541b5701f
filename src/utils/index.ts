/**
 * Utility functions and helpers
 */

export { logger, createLogger } from './logger.js';

export { getEnvWithDefault, getEnvOptional } from './env.js';

export { dedent, firstLine } from './text.js';

export { canonicalKey } from './canonical-key.js';
