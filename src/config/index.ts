/**
 * Runtime configuration
 *
 * tfdrift has no config file: everything comes from environment variables,
 * and command-line flags override them.
 *
 *   TFDRIFT_LOG_LEVEL (or LOG_LEVEL)  debug | info | warn | error
 *   NO_COLOR / TFDRIFT_COLOR          disable / force ANSI colors
 *   TFDRIFT_IGNORE_ORDER              compare arrays ignoring element order
 *   TFDRIFT_MAX_VALUE_LENGTH          truncate rendered values after N chars
 */

import { ConfigurationError, getEnvBoolean, getEnvOptional, type Env } from '../utils';
import { TfDriftConfigSchema, type TfDriftConfig } from './schema';

export { TfDriftConfigSchema, DEFAULT_MAX_VALUE_LENGTH, type TfDriftConfig } from './schema';

export function resolveColor(env: Env): boolean | undefined {
  if (getEnvOptional(env, 'NO_COLOR') !== undefined) {
    return false;
  }
  return getEnvBoolean(env, 'TFDRIFT_COLOR');
}

/**
 * Build and validate the configuration from an environment map
 */
export function loadConfig(env: Env = process.env): TfDriftConfig {
  const raw = {
    logLevel: getEnvOptional(env, 'TFDRIFT_LOG_LEVEL') ?? getEnvOptional(env, 'LOG_LEVEL'),
    color: resolveColor(env),
    ignoreOrder: getEnvBoolean(env, 'TFDRIFT_IGNORE_ORDER'),
    maxValueLength: getEnvOptional(env, 'TFDRIFT_MAX_VALUE_LENGTH'),
  };

  const result = TfDriftConfigSchema.safeParse(raw);
  if (!result.success) {
    const fields = result.error.issues.map(issue => issue.path.join('.'));
    throw new ConfigurationError(
      `Invalid configuration: ${result.error.issues
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`,
      { fields }
    );
  }
  return result.data;
}
