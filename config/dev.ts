import { EnvironmentConfig, DeepPartial, ExternalValues } from '../lib/types/config';
import { baseConfig } from './base';
import { deepMerge } from '../lib/utils';
import { applyExternalValues } from './external';

/**
 * Development environment configuration.
 *
 * Relaxed for local clusters and quick iteration:
 * - Single replicas are accepted
 * - Probes are not required
 * - Only the name label is mandatory
 * - Debug logging, no evaluation deadline
 *
 * @see {@link baseConfig} for inherited defaults
 * @see {@link deepMerge} for how overrides are applied
 */
const devOverrides: DeepPartial<Omit<EnvironmentConfig, 'environment'>> = {
  catalog: {
    enabledRules: [
      'container-cpu-requests',
      'container-memory-requests',
      'mandatory-labels',
      'deployment-min-replicas',
      'hpa-requests',
      'privileged-containers',
    ],
    minReplicas: 1,
    mandatoryLabels: ['app.kubernetes.io/name'],
  },

  evaluation: {
    timeoutMs: 0, // No deadline while debugging
  },

  logging: {
    level: 'debug',
  },
};

/**
 * Build the dev configuration.
 *
 * @param externalValues - Optional values from environment variables
 * @returns A complete {@link EnvironmentConfig} with dev overrides applied to {@link baseConfig}
 */
export function getDevConfig(externalValues?: ExternalValues): EnvironmentConfig {
  const config: EnvironmentConfig = {
    environment: 'dev',
    ...deepMerge(baseConfig, devOverrides),
  };

  return applyExternalValues(config, externalValues);
}
