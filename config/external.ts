import { EnvironmentConfig, ExternalValues } from '../lib/types/config';
import { ConfigurationError } from '../lib/types/errors';
import { LogLevelSchema } from '../lib/utils/validation';

/**
 * Environment variables read by {@link readExternalValues}.
 */
export const EXTERNAL_VARIABLES = {
  logLevel: 'LOG_LEVEL',
  timeoutMs: 'POLICY_TIMEOUT_MS',
  minReplicas: 'POLICY_MIN_REPLICAS',
} as const;

function readInteger(env: NodeJS.ProcessEnv, name: string, min: number): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min}, got '${raw}'`, name, raw);
  }
  return value;
}

/**
 * Collect external values from environment variables.
 *
 * Unset or empty variables are left out; malformed ones are rejected.
 *
 * @param env - Variables to read, `process.env` by default
 * @throws {ConfigurationError} When a variable is set to an invalid value
 */
export function readExternalValues(env: NodeJS.ProcessEnv = process.env): ExternalValues {
  const rawLevel = env[EXTERNAL_VARIABLES.logLevel];
  let logLevel: ExternalValues['logLevel'];
  if (rawLevel !== undefined && rawLevel.trim() !== '') {
    const parsed = LogLevelSchema.safeParse(rawLevel.trim().toLowerCase());
    if (!parsed.success) {
      throw new ConfigurationError(
        `${EXTERNAL_VARIABLES.logLevel} must be one of ${LogLevelSchema.options.join(', ')}, got '${rawLevel}'`,
        EXTERNAL_VARIABLES.logLevel,
        rawLevel,
      );
    }
    logLevel = parsed.data;
  }

  const timeoutMs = readInteger(env, EXTERNAL_VARIABLES.timeoutMs, 0);
  const minReplicas = readInteger(env, EXTERNAL_VARIABLES.minReplicas, 1);

  return {
    ...(logLevel !== undefined && { logLevel }),
    ...(timeoutMs !== undefined && { timeoutMs }),
    ...(minReplicas !== undefined && { minReplicas }),
  };
}

/**
 * Apply external values (from environment variables) onto a merged config.
 *
 * Values are only applied when provided; missing values leave the config
 * unchanged.
 */
export function applyExternalValues(config: EnvironmentConfig, external?: ExternalValues): EnvironmentConfig {
  if (!external) return config;

  let result = config;

  if (external.logLevel !== undefined) {
    result = { ...result, logging: { ...result.logging, level: external.logLevel } };
  }

  if (external.timeoutMs !== undefined) {
    result = { ...result, evaluation: { ...result.evaluation, timeoutMs: external.timeoutMs } };
  }

  if (external.minReplicas !== undefined) {
    result = { ...result, catalog: { ...result.catalog, minReplicas: external.minReplicas } };
  }

  return result;
}
