/**
 * Structured logging using Pino
 *
 * Logs go to stderr; stdout is reserved for experiment listings and summaries.
 */

import pino from 'pino';
import { createRequire } from 'module';

const require = createRequire(import.meta.url);

const STDERR = 2;

/**
 * Pretty output for interactive use only (not in tests, production or CI)
 */
function shouldUsePrettyPrint(): boolean {
  const env = process.env.NODE_ENV || '';
  if (env === 'production' || env === 'test' || process.env.CI) return false;
  try {
    require.resolve('pino-pretty');
    return true;
  } catch {
    return false;
  }
}

function resolveLevel(): string {
  return process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info');
}

const options: pino.LoggerOptions = {
  level: resolveLevel(),
  base: { service: 'perfspec' },
};

/**
 * Root logger
 */
export const logger: pino.Logger = shouldUsePrettyPrint()
  ? pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
          destination: STDERR,
        },
      },
    })
  : pino(options, pino.destination(STDERR));

/**
 * Child logger tagged with a component name
 *
 * @example
 * const log = createLogger('PerfSession');
 * log.debug({ file: 'bench/perf_widgets.mjs' }, 'File collected');
 */
export function createLogger(context: string): pino.Logger {
  return logger.child({ context });
}
