import { EnvironmentConfig, DeepPartial, ExternalValues } from '../lib/types/config';
import { baseConfig } from './base';
import { deepMerge } from '../lib/utils';
import { applyExternalValues } from './external';

/**
 * Production environment configuration.
 *
 * Full rule set with high availability requirements:
 * - At least three replicas for Deployments and StatefulSets
 * - Version label required for change tracking
 * - Warnings and above are logged
 *
 * @remarks
 * The production config inherits the complete built-in catalog from
 * {@link baseConfig}. Only values that differ are overridden here.
 *
 * @see {@link baseConfig} for inherited defaults
 * @see {@link deepMerge} for how overrides are applied
 */
const productionOverrides: DeepPartial<Omit<EnvironmentConfig, 'environment'>> = {
  catalog: {
    minReplicas: 3,
    mandatoryLabels: ['app.kubernetes.io/name', 'app.kubernetes.io/managed-by', 'app.kubernetes.io/version'],
  },

  logging: {
    level: 'warn',
  },
};

/**
 * Build the production configuration.
 *
 * @param externalValues - Optional values from environment variables
 * @returns A complete {@link EnvironmentConfig} with production overrides applied to {@link baseConfig}
 */
export function getProductionConfig(externalValues?: ExternalValues): EnvironmentConfig {
  const config: EnvironmentConfig = {
    environment: 'production',
    ...deepMerge(baseConfig, productionOverrides),
  };

  return applyExternalValues(config, externalValues);
}
