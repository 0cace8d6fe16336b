import { EnvironmentConfig, Environment, ExternalValues } from '../lib/types/config';
import { ConfigurationError, ErrorCode } from '../lib/types/errors';
import { formatValidationErrors, validateEnvironmentConfig } from '../lib/utils/validation';
import { getDevConfig } from './dev';
import { getStagingConfig } from './staging';
import { getProductionConfig } from './production';

export { baseConfig } from './base';
export { getDevConfig } from './dev';
export { getStagingConfig } from './staging';
export { getProductionConfig } from './production';
export { applyExternalValues, readExternalValues, EXTERNAL_VARIABLES } from './external';

function buildConfig(environment: Environment, externalValues?: ExternalValues): EnvironmentConfig {
  switch (environment) {
    case 'dev':
      return getDevConfig(externalValues);
    case 'staging':
      return getStagingConfig(externalValues);
    case 'production':
      return getProductionConfig(externalValues);
    default:
      throw new ConfigurationError(`Unknown environment: ${String(environment)}`, 'environment', environment);
  }
}

/**
 * Get the validated configuration for the specified environment
 *
 * @throws {ConfigurationError} When the merged configuration fails validation
 */
export function getConfig(environment: Environment, externalValues?: ExternalValues): EnvironmentConfig {
  const result = validateEnvironmentConfig(buildConfig(environment, externalValues));
  if (!result.success || !result.data) {
    const issues = formatValidationErrors(result.errors);
    throw new ConfigurationError(
      `Invalid ${environment} configuration: ${issues.join('; ')}`,
      'config',
      environment,
      ErrorCode.CONFIG_INVALID,
      { operation: 'getConfig' },
      issues,
    );
  }
  return result.data;
}

/**
 * Validate environment string
 */
export function isValidEnvironment(env: string): env is Environment {
  return ['dev', 'staging', 'production'].includes(env);
}
