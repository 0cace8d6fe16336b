/**
 * Evaluator: runs the rules applicable to a manifest and produces verdicts.
 *
 * Evaluation is synchronous and keeps no per-call state on the instance, so
 * one evaluator can serve concurrent callers. Each rule sees only the
 * manifest, never another rule's outcome.
 *
 * @module engine/evaluator
 */

import type { Logger } from '../logger';
import { silentLogger } from '../logger';
import { EvaluationCancelledError, PolicyEngineError, StructuralError } from '../types/errors';
import { describeManifest } from '../types/manifest';
import { DefaultVerdict, RuleDescriptor, Verdict, VerdictResult } from '../types/policy';
import { deepFreeze, isMapping, isNonEmptyString } from '../utils';
import { evaluatePredicate } from './predicates';
import { LoadedRule, RuleRegistry } from './registry';
import { renderTemplate } from './templates';

/** Rule id of the verdict emitted when no rule covers a manifest kind */
export const NO_APPLICABLE_RULES = 'no-applicable-rules';

/** Rule id of the verdict {@link structuralErrorVerdict} produces */
export const MANIFEST_STRUCTURE = 'manifest-structure';

/**
 * Evaluator options
 */
export interface EvaluatorOptions {
  /** Diagnostics sink, silent when omitted */
  readonly logger?: Logger;

  /**
   * Emit a `skip` verdict for every registered rule that does not apply to
   * the manifest kind. A kind with no applicable rule still gets the single
   * `no-applicable-rules` verdict.
   */
  readonly includeSkipped?: boolean;
}

/**
 * Per-call options
 */
export interface EvaluateOptions {
  /** Checked between rules; an aborted signal cancels the evaluation */
  readonly signal?: AbortSignal;

  /** Epoch milliseconds after which the evaluation is cancelled, checked between rules */
  readonly deadline?: number;
}

/**
 * Outcome for one manifest of a batch.
 */
export type BatchEntry =
  | {
      readonly index: number;
      readonly status: 'evaluated';
      readonly resource: string;
      readonly verdicts: readonly Verdict[];
    }
  | {
      readonly index: number;
      readonly status: 'rejected';
      readonly error: StructuralError;
    };

type CheckedManifest = Readonly<Record<string, unknown>> & { readonly kind: string };

/**
 * Map a predicate outcome to a verdict.
 *
 * A `fail` default means the predicate proves compliance; a `pass` default
 * means it proves a violation.
 */
export function resolvePolarity(defaultVerdict: DefaultVerdict, satisfied: boolean): Exclude<VerdictResult, 'skip'> {
  if (defaultVerdict === 'fail') {
    return satisfied ? 'pass' : 'fail';
  }
  return satisfied ? 'fail' : 'pass';
}

/**
 * Reject anything that is not a mapping with a non-empty string `kind`.
 *
 * @throws {StructuralError}
 */
export function checkStructure(manifest: unknown): CheckedManifest {
  if (!isMapping(manifest)) {
    throw StructuralError.notAnObject(manifest);
  }
  const kind = manifest.kind;
  if (!isNonEmptyString(kind)) {
    throw StructuralError.kindMissing();
  }
  return { ...manifest, kind };
}

/**
 * Render a structural error as the single failing verdict a report can show.
 */
export function structuralErrorVerdict(error: StructuralError): Verdict {
  return deepFreeze({
    ruleId: MANIFEST_STRUCTURE,
    result: 'fail',
    currentConfiguration: error.message,
    expectedConfiguration: 'A mapping with a non-empty string kind',
    severity: 'error',
  });
}

/**
 * Evaluates manifests against a rule registry.
 *
 * @example
 * ```typescript
 * const evaluator = new PolicyEvaluator(registry, { logger });
 * const verdicts = evaluator.evaluate(manifest, { signal: AbortSignal.timeout(5000) });
 * ```
 */
export class PolicyEvaluator {
  private readonly logger: Logger;
  private readonly includeSkipped: boolean;

  constructor(
    private readonly registry: RuleRegistry,
    options: EvaluatorOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger();
    this.includeSkipped = options.includeSkipped ?? false;
  }

  /**
   * Evaluate one manifest.
   *
   * @param manifest - Decoded manifest document
   * @returns Frozen verdicts in registration order
   * @throws {StructuralError} When the manifest is not a mapping with a kind; no rule runs
   * @throws {EvaluationCancelledError} When the signal is aborted or the deadline passes before every rule ran
   */
  evaluate(manifest: unknown, options: EvaluateOptions = {}): readonly Verdict[] {
    const checked = checkStructure(manifest);
    const resource = describeManifest(checked);
    const applicable = this.registry.lookupRules(checked.kind);

    if (applicable.length === 0) {
      this.logger.debug({ resource }, 'no rules apply to manifest kind');
      return deepFreeze([this.noApplicableRules(checked.kind, resource)]);
    }

    const candidates = this.includeSkipped ? this.registry.allRules() : applicable;
    const verdicts: Verdict[] = [];
    let completed = 0;

    for (const rule of candidates) {
      if (options.signal?.aborted) {
        throw new EvaluationCancelledError(resource, completed, options.signal.reason);
      }
      if (options.deadline !== undefined && Date.now() > options.deadline) {
        throw new EvaluationCancelledError(resource, completed, 'deadline exceeded');
      }
      verdicts.push(
        applicable.includes(rule)
          ? this.evaluateRule(rule, checked, resource)
          : skippedVerdict(rule.descriptor, checked.kind, resource),
      );
      completed += 1;
    }

    return deepFreeze(verdicts);
  }

  /**
   * Evaluate several manifests, isolating structural errors per document.
   *
   * Cancellation aborts the whole batch.
   */
  evaluateMany(manifests: readonly unknown[], options: EvaluateOptions = {}): readonly BatchEntry[] {
    const entries = manifests.map((manifest, index): BatchEntry => {
      try {
        const verdicts = this.evaluate(manifest, options);
        return { index, status: 'evaluated', resource: describeManifest(checkStructure(manifest)), verdicts };
      } catch (error) {
        if (error instanceof StructuralError) {
          this.logger.warn({ index, err: error.toJSON() }, 'manifest rejected');
          return { index, status: 'rejected', error };
        }
        throw error;
      }
    });

    const rejected = entries.filter((entry) => entry.status === 'rejected').length;
    this.logger.info({ manifests: entries.length, rejected }, 'batch evaluated');
    return Object.freeze(entries);
  }

  private evaluateRule(rule: LoadedRule, manifest: CheckedManifest, resource: string): Verdict {
    const { descriptor } = rule;
    try {
      const outcome = evaluatePredicate(manifest, rule.predicate);
      const result = resolvePolarity(descriptor.defaultVerdict, outcome.satisfied);
      const context = { manifest, ruleId: descriptor.id, outcome };

      this.logger.debug({ ruleId: descriptor.id, resource, result }, 'rule evaluated');
      return withSeverity(
        {
          ruleId: descriptor.id,
          result,
          currentConfiguration: renderTemplate(rule.currentTemplate, context),
          expectedConfiguration: renderTemplate(rule.expectedTemplate, context),
          resource,
        },
        descriptor,
      );
    } catch (error) {
      const wrapped = PolicyEngineError.wrap(error, {
        component: 'Evaluator',
        operation: 'evaluateRule',
        resource,
      });
      this.logger.warn({ ruleId: descriptor.id, resource, err: wrapped.toJSON() }, 'rule raised an error');
      return withSeverity(
        {
          ruleId: descriptor.id,
          result: 'fail',
          currentConfiguration: `Rule raised an error: ${wrapped.message}`,
          expectedConfiguration: descriptor.title ?? `Rule ${descriptor.id} evaluates cleanly`,
          resource,
        },
        descriptor,
      );
    }
  }

  private noApplicableRules(kind: string, resource: string): Verdict {
    const kinds = this.registry.kinds();
    return {
      ruleId: NO_APPLICABLE_RULES,
      result: 'skip',
      currentConfiguration: `No rules registered for kind ${kind}`,
      expectedConfiguration: `A kind with rules: ${kinds.length > 0 ? kinds.join(', ') : 'none'}`,
      resource,
    };
  }
}

function skippedVerdict(descriptor: RuleDescriptor, kind: string, resource: string): Verdict {
  return withSeverity(
    {
      ruleId: descriptor.id,
      result: 'skip',
      currentConfiguration: `Kind ${kind}`,
      expectedConfiguration: `One of: ${descriptor.applicableKinds.join(', ')}`,
      resource,
    },
    descriptor,
  );
}

function withSeverity(verdict: Verdict, descriptor: RuleDescriptor): Verdict {
  return descriptor.severity === undefined ? verdict : { ...verdict, severity: descriptor.severity };
}
