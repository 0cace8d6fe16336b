/**
 * Workload policy engine
 *
 * Evaluates Kubernetes workload manifests against declarative rules and
 * reports a pass, fail or skip verdict per rule.
 *
 * This module exports:
 * - {@link RuleRegistry} / {@link loadRegistry} - Validated, immutable rule sets
 * - {@link PolicyEvaluator} - Per-manifest evaluation
 * - {@link summarize} / {@link formatText} - Reporting
 * - {@link buildCatalog} - Built-in rules
 * - {@link loadRuleFiles} / {@link loadManifestFile} - YAML and JSON input
 * - {@link getConfig} - Environment configuration
 *
 * @example
 * ```typescript
 * import { PolicyEvaluator, RuleRegistry, buildCatalog, getConfig } from 'workload-policy-engine';
 *
 * const registry = RuleRegistry.fromDescriptors(buildCatalog(getConfig('production').catalog));
 * const verdicts = new PolicyEvaluator(registry).evaluate(manifest);
 * ```
 *
 * @module index
 */
export * from './engine/field-path';
export * from './engine/predicates';
export * from './engine/templates';
export * from './engine/registry';
export * from './engine/evaluator';
export * from './engine/reporter';
export * from './policies/catalog';
export * from './policies/loader';
export * from './types/errors';
export * from './types/manifest';
export * from './types/policy';
export * from './types/config';
export { createLogger, silentLogger } from './logger';
export type { Logger, LoggerOptions } from './logger';
export { getConfig, isValidEnvironment, readExternalValues, applyExternalValues } from '../config';
