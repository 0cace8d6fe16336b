import { EnvironmentConfig } from '../lib/types/config';
import { BUILTIN_RULE_IDS } from '../lib/policies/catalog';

/**
 * Base configuration shared across all environments.
 *
 * Environment-specific configs (dev, staging, production) override these
 * values using {@link deepMerge}. The merge strategy is:
 * - Objects are recursively merged (nested keys are preserved unless overridden)
 * - Arrays are **replaced** entirely (not concatenated)
 * - Primitive values are overridden by the environment config
 * - `undefined` values in overrides are ignored (base value is kept)
 *
 * @remarks
 * The `environment` field is omitted from the base config because it is
 * always set per-environment in the `get*Config()` functions.
 *
 * @see {@link deepMerge} for the merge implementation
 * @see {@link DeepPartial} for the type used by environment overrides
 * @see {@link EnvironmentConfig} for the full configuration interface
 */
export const baseConfig: Omit<EnvironmentConfig, 'environment'> = {
  catalog: {
    enabledRules: [...BUILTIN_RULE_IDS],
    minReplicas: 2,
    topologySpreadReplicaThreshold: 2,
    mandatoryLabels: ['app.kubernetes.io/name', 'app.kubernetes.io/managed-by'],
    hpaAnnotation: 'autoscaling.workloads.dev/hpa',
  },

  evaluation: {
    includeSkipped: false,
    timeoutMs: 5000,
  },

  logging: {
    level: 'info',
  },
};
