/**
 * Configuration types for the workload policy engine.
 *
 * All configuration is strongly typed for safety and IDE support.
 *
 * @see {@link "config/base" | config/base.ts} for default values
 * @see {@link "config/dev" | config/dev.ts} for dev overrides
 * @see {@link "config/staging" | config/staging.ts} for staging overrides
 * @see {@link "config/production" | config/production.ts} for production overrides
 *
 * @module types/config
 */

import type { BuiltinRuleId } from '../policies/catalog';

/**
 * Environment identifier
 */
export type Environment = 'dev' | 'staging' | 'production';

/**
 * Log levels accepted by the logger
 */
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

/**
 * Parameters of the built-in rule catalog.
 *
 * @see {@link buildCatalog} for the rules these values parameterize
 */
export interface CatalogConfig {
  /** Built-in rules to register, in evaluation order */
  readonly enabledRules: BuiltinRuleId[];

  /** Minimum `spec.replicas` for Deployments and StatefulSets */
  readonly minReplicas: number;

  /** Replica count above which topology spread constraints are required */
  readonly topologySpreadReplicaThreshold: number;

  /** Labels every workload must carry */
  readonly mandatoryLabels: string[];

  /** Annotation marking a workload as scaled by a HorizontalPodAutoscaler */
  readonly hpaAnnotation: string;
}

/**
 * Evaluation behaviour
 */
export interface EvaluationConfig {
  /** Emit a `skip` verdict for every registered rule that does not apply to the manifest kind */
  readonly includeSkipped: boolean;

  /** Per-manifest evaluation deadline in milliseconds (0 disables it) */
  readonly timeoutMs: number;
}

/**
 * Logging configuration
 */
export interface LoggingConfig {
  /** Minimum level written */
  readonly level: LogLevel;
}

/**
 * Complete environment configuration
 *
 * @see {@link getConfig} for loading environment-specific configurations
 *
 * @example
 * ```typescript
 * const config: EnvironmentConfig = getConfig('production');
 * const registry = RuleRegistry.fromDescriptors(buildCatalog(config.catalog));
 * ```
 */
export interface EnvironmentConfig {
  /** Environment name */
  readonly environment: Environment;

  /** Built-in catalog parameters */
  readonly catalog: CatalogConfig;

  /** Evaluation behaviour */
  readonly evaluation: EvaluationConfig;

  /** Logging configuration */
  readonly logging: LoggingConfig;
}

/**
 * Values supplied from outside the config files (environment variables).
 *
 * Missing values leave the configuration unchanged.
 */
export interface ExternalValues {
  readonly logLevel?: LogLevel;
  readonly timeoutMs?: number;
  readonly minReplicas?: number;
}

/**
 * Deep merge utility type for partial configuration overrides
 *
 * Used to type environment-specific overrides that merge with base config.
 *
 * @example
 * ```typescript
 * const devOverrides: DeepPartial<EnvironmentConfig> = {
 *   catalog: {
 *     minReplicas: 1,  // Only override this field
 *   },
 * };
 * ```
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};
