/**
 * Environment Variable Utilities
 *
 * Typed access to environment variables with default value support.
 */

/**
 * Get an environment variable with a default value
 *
 * @param key - Environment variable name
 * @param defaultValue - Default value if not set or empty
 *
 * @example
 * const target = getEnvWithDefault('PERF_TARGET', '.');
 */
export function getEnvWithDefault(key: string, defaultValue: string): string {
  const value = process.env[key];
  return value || defaultValue;
}

/**
 * Get an optional environment variable (undefined if not set or empty)
 *
 * @example
 * const baseline = getEnvOptional('PERF_BASELINE');
 */
export function getEnvOptional(key: string): string | undefined {
  const value = process.env[key];
  return value ? value : undefined;
}
