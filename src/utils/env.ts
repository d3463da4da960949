/**
 * Environment variable helpers
 *
 * All helpers read from an explicit env map so commands can be run against a
 * fabricated environment.
 */

export type Env = Record<string, string | undefined>;

export function getEnvOptional(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Returns undefined when the variable is unset so callers can tell "off"
 * from "not configured".
 */
export function getEnvBoolean(env: Env, key: string): boolean | undefined {
  const value = getEnvOptional(env, key);
  if (value === undefined) {
    return undefined;
  }
  return value.toLowerCase() === 'true' || value === '1';
}
