import { EnvironmentConfig, DeepPartial, ExternalValues } from '../lib/types/config';
import { baseConfig } from './base';
import { deepMerge } from '../lib/utils';
import { applyExternalValues } from './external';

/**
 * Staging environment configuration.
 *
 * Uses the base catalog unchanged and reports a `skip` verdict for every
 * rule that does not apply, so gaps in coverage show up before release.
 *
 * @see {@link baseConfig} for inherited defaults
 */
const stagingOverrides: DeepPartial<Omit<EnvironmentConfig, 'environment'>> = {
  evaluation: {
    includeSkipped: true,
  },
};

/**
 * Build the staging configuration.
 *
 * @param externalValues - Optional values from environment variables
 */
export function getStagingConfig(externalValues?: ExternalValues): EnvironmentConfig {
  const config: EnvironmentConfig = {
    environment: 'staging',
    ...deepMerge(baseConfig, stagingOverrides),
  };

  return applyExternalValues(config, externalValues);
}
