/**
 * Policy types: field paths, predicates, rule descriptors and verdicts.
 *
 * Rule descriptors are plain data so they can live in YAML or JSON files.
 * Predicates reference fields through path strings (see
 * {@link "engine/field-path" | engine/field-path.ts} for the syntax), which
 * the registry compiles once at load time.
 *
 * @module types/policy
 */

/**
 * One step of a field path.
 *
 * - `key` -- a literal mapping key
 * - `index` -- a sequence position
 * - `each` -- every element of a sequence
 * - `wildcard` -- alternative sibling keys, resolved independently and merged
 */
export type PathSegment =
  | { readonly type: 'key'; readonly key: string }
  | { readonly type: 'index'; readonly index: number }
  | { readonly type: 'each' }
  | { readonly type: 'wildcard'; readonly keys: readonly string[] };

/**
 * A parsed field path.
 */
export type FieldPath = readonly PathSegment[];

/**
 * Comparison operators shared by `compare` and `countWhere`.
 */
export type CompareOperator = '<' | '<=' | '>' | '>=' | '==';

/**
 * Literal an `equals` predicate compares against.
 */
export type EqualsValue = string | number | boolean | null | unknown[] | Record<string, unknown>;

/**
 * Predicate expression tree as written in rule files.
 *
 * @example
 * ```typescript
 * const allContainersRequestCpu: Predicate = {
 *   op: 'countWhere',
 *   paths: ['spec.{containers,initContainers}[*]'],
 *   where: { op: 'exists', path: 'resources.requests.cpu' },
 *   operator: '==',
 *   threshold: 'all',
 *   nonEmpty: true,
 * };
 * ```
 */
export type Predicate =
  | { readonly op: 'exists'; readonly path: string }
  | { readonly op: 'equals'; readonly path: string; readonly value: EqualsValue }
  | { readonly op: 'compare'; readonly path: string; readonly operator: CompareOperator; readonly value: number }
  | {
      readonly op: 'countWhere';
      /** Paths whose resolved values are the counted sub-documents */
      readonly paths: readonly string[];
      /** Evaluated against each sub-document; its paths are relative */
      readonly where: Predicate;
      readonly operator: CompareOperator;
      /** A fixed count, or `all` for the number of sub-documents found */
      readonly threshold: number | 'all';
      /** When true, finding no sub-documents makes the predicate false */
      readonly nonEmpty: boolean;
    }
  | { readonly op: 'missingKeys'; readonly path: string; readonly required: readonly string[] }
  | { readonly op: 'and'; readonly predicates: readonly Predicate[] }
  | { readonly op: 'or'; readonly predicates: readonly Predicate[] }
  | { readonly op: 'not'; readonly predicate: Predicate };

/**
 * Predicate tree with every path parsed, produced once per descriptor.
 */
export type CompiledPredicate =
  | { readonly op: 'exists'; readonly path: FieldPath }
  | { readonly op: 'equals'; readonly path: FieldPath; readonly value: EqualsValue }
  | { readonly op: 'compare'; readonly path: FieldPath; readonly operator: CompareOperator; readonly value: number }
  | {
      readonly op: 'countWhere';
      readonly paths: readonly FieldPath[];
      readonly where: CompiledPredicate;
      readonly operator: CompareOperator;
      readonly threshold: number | 'all';
      readonly nonEmpty: boolean;
    }
  | { readonly op: 'missingKeys'; readonly path: FieldPath; readonly required: readonly string[] }
  | { readonly op: 'and'; readonly predicates: readonly CompiledPredicate[] }
  | { readonly op: 'or'; readonly predicates: readonly CompiledPredicate[] }
  | { readonly op: 'not'; readonly predicate: CompiledPredicate };

/**
 * Result of evaluating a predicate, with the details message templates use.
 */
export interface PredicateOutcome {
  /** Whether the predicate holds */
  readonly satisfied: boolean;
  /** Names of sub-documents that matched a `countWhere` condition */
  readonly matched: readonly string[];
  /** Names of sub-documents that did not match a `countWhere` condition */
  readonly unmatched: readonly string[];
  /** Required keys reported absent by `missingKeys` */
  readonly missing: readonly string[];
}

/**
 * Verdict values.
 */
export type VerdictResult = 'pass' | 'fail' | 'skip';

/**
 * Verdict a descriptor starts from before its predicate is consulted.
 *
 * - `fail` -- the predicate proves compliance
 * - `pass` -- the predicate proves a violation
 */
export type DefaultVerdict = Exclude<VerdictResult, 'skip'>;

/**
 * Severity attached to a rule for reporting
 */
export type RuleSeverity = 'error' | 'warning' | 'info';

/**
 * Categories of policy checks
 */
export type RuleCategory = 'security' | 'reliability' | 'cost' | 'performance' | 'configuration' | 'compliance';

/**
 * One policy rule as data.
 *
 * @example
 * ```typescript
 * const minReplicas: RuleDescriptor = {
 *   id: 'deployment-min-replicas',
 *   applicableKinds: ['Deployment'],
 *   defaultVerdict: 'fail',
 *   predicate: { op: 'compare', path: 'spec.replicas', operator: '>=', value: 2 },
 *   currentMessageTemplate: '{name} runs {spec.replicas} replica(s)',
 *   expectedMessageTemplate: 'At least 2 replicas',
 * };
 * ```
 */
export interface RuleDescriptor {
  /** Unique rule id */
  readonly id: string;

  /** Short human-readable title */
  readonly title?: string;

  /** Manifest kinds this rule applies to */
  readonly applicableKinds: readonly string[];

  /** Verdict polarity, see {@link DefaultVerdict} */
  readonly defaultVerdict: DefaultVerdict;

  /** Predicate expression tree */
  readonly predicate: Predicate;

  /** Template describing what the manifest currently configures */
  readonly currentMessageTemplate: string;

  /** Template describing the compliant configuration */
  readonly expectedMessageTemplate: string;

  /** Reporting severity of a failure */
  readonly severity?: RuleSeverity;

  /** Category of the check */
  readonly category?: RuleCategory;
}

/**
 * Per-rule evaluation outcome.
 */
export interface Verdict {
  /** Rule that produced the verdict */
  readonly ruleId: string;

  /** Outcome */
  readonly result: VerdictResult;

  /** What the manifest configures */
  readonly currentConfiguration: string;

  /** What the rule expects */
  readonly expectedConfiguration: string;

  /** Severity carried over from the descriptor */
  readonly severity?: RuleSeverity;

  /** Evaluated resource, e.g. `Deployment/web` */
  readonly resource?: string;
}
