/**
 * Runtime validation using Zod schemas.
 *
 * Rule descriptors and engine configuration arrive as untyped data (YAML or
 * JSON files, environment variables), so every entry point validates them
 * against the schemas below before the engine sees them.
 *
 * @see {@link RuleDescriptor} for the TypeScript interface {@link RuleDescriptorSchema} validates
 * @see {@link EnvironmentConfig} for the interface {@link EnvironmentConfigSchema} validates
 *
 * @module utils/validation
 */

import { z } from 'zod';
import { BUILTIN_RULE_IDS } from '../policies/catalog';
import { Predicate, RuleDescriptor } from '../types/policy';

// =============================================================================
// Primitive Schemas
// =============================================================================

/**
 * Rule id schema - lowercase words joined by dashes (e.g., `container-cpu-requests`).
 */
export const RuleIdSchema = z
  .string()
  .regex(/^[a-z0-9]+(-[a-z0-9]+)*$/, 'Rule id must be lowercase words joined by dashes');

/**
 * Kubernetes kind schema (e.g., `Deployment`).
 */
export const KindSchema = z.string().regex(/^[A-Z][A-Za-z0-9]*$/, 'Kind must be a PascalCase resource kind');

/**
 * Field path text schema. Syntax is checked when the registry compiles the predicate.
 */
export const FieldPathTextSchema = z.string();

/**
 * Comparison operator schema.
 *
 * @see {@link CompareOperator}
 */
export const CompareOperatorSchema = z.enum(['<', '<=', '>', '>=', '==']);

/**
 * Literal compared by an `equals` predicate.
 */
export const EqualsValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
  z.array(z.unknown()),
  z.record(z.string(), z.unknown()),
]);

// =============================================================================
// Predicate Schema
// =============================================================================

/**
 * Recursive predicate tree schema.
 *
 * Objects are strict: a misspelled key is an error rather than an ignored field.
 *
 * @see {@link Predicate}
 */
export const PredicateSchema: z.ZodType<Predicate> = z.lazy(() =>
  z.discriminatedUnion('op', [
    z.object({ op: z.literal('exists'), path: FieldPathTextSchema }).strict(),
    z.object({ op: z.literal('equals'), path: FieldPathTextSchema, value: EqualsValueSchema }).strict(),
    z
      .object({
        op: z.literal('compare'),
        path: FieldPathTextSchema,
        operator: CompareOperatorSchema,
        value: z.number().finite(),
      })
      .strict(),
    z
      .object({
        op: z.literal('countWhere'),
        paths: z.array(FieldPathTextSchema).min(1),
        where: PredicateSchema,
        operator: CompareOperatorSchema,
        threshold: z.union([z.number().int().min(0), z.literal('all')]),
        nonEmpty: z.boolean(),
      })
      .strict(),
    z
      .object({
        op: z.literal('missingKeys'),
        path: FieldPathTextSchema,
        required: z.array(z.string().min(1)).min(1),
      })
      .strict(),
    z.object({ op: z.literal('and'), predicates: z.array(PredicateSchema).min(1) }).strict(),
    z.object({ op: z.literal('or'), predicates: z.array(PredicateSchema).min(1) }).strict(),
    z.object({ op: z.literal('not'), predicate: PredicateSchema }).strict(),
  ]),
);

// =============================================================================
// Rule Descriptor Schema
// =============================================================================

/**
 * Severity schema.
 *
 * @see {@link RuleSeverity}
 */
export const RuleSeveritySchema = z.enum(['error', 'warning', 'info']);

/**
 * Category schema.
 *
 * @see {@link RuleCategory}
 */
export const RuleCategorySchema = z.enum([
  'security',
  'reliability',
  'cost',
  'performance',
  'configuration',
  'compliance',
]);

/**
 * Rule descriptor schema.
 *
 * @see {@link RuleDescriptor}
 */
export const RuleDescriptorSchema: z.ZodType<RuleDescriptor> = z
  .object({
    id: RuleIdSchema,
    title: z.string().min(1).optional(),
    applicableKinds: z.array(KindSchema).min(1),
    defaultVerdict: z.enum(['pass', 'fail']),
    predicate: PredicateSchema,
    currentMessageTemplate: z.string().min(1),
    expectedMessageTemplate: z.string().min(1),
    severity: RuleSeveritySchema.optional(),
    category: RuleCategorySchema.optional(),
  })
  .strict();

/**
 * Rule file schema: a bare list of descriptors or `{ rules: [...] }`.
 *
 * Descriptors are kept as unknown here so that each one is validated and
 * reported individually by the registry.
 */
export const RuleFileSchema = z.union([
  z.array(z.unknown()),
  z.object({ rules: z.array(z.unknown()) }).transform((file) => file.rules),
]);

// =============================================================================
// Configuration Schemas
// =============================================================================

/**
 * Environment type schema.
 *
 * @see {@link Environment}
 */
export const EnvironmentSchema = z.enum(['dev', 'staging', 'production']);

/**
 * Log level schema.
 *
 * @see {@link LogLevel}
 */
export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

/**
 * Catalog configuration schema.
 *
 * @see {@link CatalogConfig}
 */
export const CatalogConfigSchema = z.object({
  enabledRules: z.array(z.enum(BUILTIN_RULE_IDS)),
  minReplicas: z.number().int().min(1),
  topologySpreadReplicaThreshold: z.number().int().min(0),
  mandatoryLabels: z.array(z.string().min(1)),
  hpaAnnotation: z.string().min(1),
});

/**
 * Evaluation configuration schema.
 *
 * @see {@link EvaluationConfig}
 */
export const EvaluationConfigSchema = z.object({
  includeSkipped: z.boolean(),
  timeoutMs: z.number().int().min(0),
});

/**
 * Complete environment configuration schema
 *
 * @example
 * ```typescript
 * const result = EnvironmentConfigSchema.safeParse(config);
 * if (!result.success) {
 *   console.error('Invalid config:', result.error.format());
 * }
 * ```
 */
export const EnvironmentConfigSchema = z.object({
  environment: EnvironmentSchema,
  catalog: CatalogConfigSchema,
  evaluation: EvaluationConfigSchema,
  logging: z.object({ level: LogLevelSchema }),
});

// =============================================================================
// Validation Functions
// =============================================================================

/**
 * Validation result with detailed error information.
 *
 * @typeParam T - The validated data type
 */
export interface ZodValidationResult<T> {
  success: boolean;
  data?: T;
  errors?: Array<{
    path: string;
    message: string;
    code: string;
  }>;
}

function toValidationResult<I, T>(result: z.SafeParseReturnType<I, T>): ZodValidationResult<T> {
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    errors: result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
      code: issue.code,
    })),
  };
}

/**
 * Format validation errors as `path: message` lines.
 */
export function formatValidationErrors(errors: ZodValidationResult<unknown>['errors']): string[] {
  return (errors ?? []).map((error) => (error.path ? `${error.path}: ${error.message}` : error.message));
}

/**
 * Validate a single rule descriptor.
 *
 * @param descriptor - Untyped descriptor data
 * @returns Validation result with either the descriptor or its errors
 */
export function validateRuleDescriptor(descriptor: unknown): ZodValidationResult<RuleDescriptor> {
  return toValidationResult(RuleDescriptorSchema.safeParse(descriptor));
}

/**
 * Validate environment configuration with detailed error reporting
 *
 * @example
 * ```typescript
 * const result = validateEnvironmentConfig(config);
 * if (!result.success) {
 *   result.errors?.forEach(e => console.error(`${e.path}: ${e.message}`));
 * }
 * ```
 */
export function validateEnvironmentConfig(
  config: unknown,
): ZodValidationResult<z.infer<typeof EnvironmentConfigSchema>> {
  return toValidationResult(EnvironmentConfigSchema.safeParse(config));
}
