/**
 * Rule registry: validated, compiled rule descriptors indexed by kind.
 *
 * A registry is immutable once built. There is no method that adds or
 * removes a rule after {@link RuleRegistryBuilder.build}, and every
 * descriptor and lookup list it hands out is frozen, so concurrent readers
 * need no coordination.
 *
 * @module engine/registry
 */

import { ConfigurationError, ErrorCode } from '../types/errors';
import { CompiledPredicate, RuleDescriptor } from '../types/policy';
import { deepFreeze, isMapping, isNonEmptyString } from '../utils';
import { formatValidationErrors, validateRuleDescriptor } from '../utils/validation';
import { compilePredicate } from './predicates';
import { CompiledTemplate, compileTemplate } from './templates';

/**
 * A descriptor after validation, with its predicate and templates compiled.
 */
export interface LoadedRule {
  readonly descriptor: RuleDescriptor;
  readonly predicate: CompiledPredicate;
  readonly currentTemplate: CompiledTemplate;
  readonly expectedTemplate: CompiledTemplate;
}

/**
 * Collects descriptors before a registry is built.
 */
export interface RuleRegistryBuilder {
  /**
   * Validate, compile and add a descriptor.
   *
   * @param descriptor - Descriptor data, typed or straight from a rule file
   * @throws {ConfigurationError} `RULE_INVALID` or `RULE_DUPLICATE_ID`
   */
  register(descriptor: unknown): RuleRegistryBuilder;

  /**
   * Freeze the collected rules into a registry. The builder stays usable.
   */
  build(): RuleRegistry;
}

const NO_RULES: readonly LoadedRule[] = Object.freeze([]);

/**
 * Validate and compile one descriptor.
 *
 * @param raw - Descriptor data
 * @param position - Position in its source list, used when the data has no usable id
 */
export function loadRule(raw: unknown, position = 0): LoadedRule {
  const result = validateRuleDescriptor(raw);
  if (!result.success || !result.data) {
    const ref = isMapping(raw) && isNonEmptyString(raw.id) ? raw.id : `rules[${position}]`;
    throw ConfigurationError.invalidRule(ref, formatValidationErrors(result.errors));
  }

  const descriptor = result.data;
  try {
    return deepFreeze({
      descriptor,
      predicate: compilePredicate(descriptor.predicate),
      currentTemplate: compileTemplate(descriptor.currentMessageTemplate),
      expectedTemplate: compileTemplate(descriptor.expectedMessageTemplate),
    });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw ConfigurationError.invalidRule(descriptor.id, [error.message]);
    }
    throw error;
  }
}

/**
 * Immutable rule set indexed by manifest kind.
 *
 * @example
 * ```typescript
 * const registry = RuleRegistry.builder()
 *   .register(minReplicasRule)
 *   .register(cpuRequestsRule)
 *   .build();
 *
 * registry.lookup('Deployment').map((d) => d.id);
 * ```
 */
export class RuleRegistry {
  private readonly rules: readonly LoadedRule[];
  private readonly byKind: ReadonlyMap<string, readonly LoadedRule[]>;
  private readonly byId: ReadonlyMap<string, LoadedRule>;

  private constructor(rules: readonly LoadedRule[]) {
    this.rules = Object.freeze([...rules]);

    const byKind = new Map<string, LoadedRule[]>();
    const byId = new Map<string, LoadedRule>();
    for (const rule of this.rules) {
      byId.set(rule.descriptor.id, rule);
      for (const kind of new Set(rule.descriptor.applicableKinds)) {
        const list = byKind.get(kind) ?? [];
        list.push(rule);
        byKind.set(kind, list);
      }
    }
    for (const list of byKind.values()) {
      Object.freeze(list);
    }

    this.byKind = byKind;
    this.byId = byId;
  }

  /**
   * Start a registry. Descriptors are validated as they are registered.
   */
  static builder(): RuleRegistryBuilder {
    const rules: LoadedRule[] = [];
    const ids = new Set<string>();

    const builder: RuleRegistryBuilder = {
      register(descriptor: unknown): RuleRegistryBuilder {
        const rule = loadRule(descriptor, rules.length);
        if (ids.has(rule.descriptor.id)) {
          throw ConfigurationError.duplicateRule(rule.descriptor.id);
        }
        ids.add(rule.descriptor.id);
        rules.push(rule);
        return builder;
      },
      build(): RuleRegistry {
        return new RuleRegistry(rules);
      },
    };
    return builder;
  }

  /**
   * Build a registry from a list of descriptors, reporting every invalid one.
   *
   * Nothing is dropped: if any descriptor fails, no registry is produced.
   *
   * @param descriptors - Descriptor data, typed or straight from rule files
   * @throws {ConfigurationError} Listing every problem found
   */
  static fromDescriptors(descriptors: readonly unknown[]): RuleRegistry {
    const builder = RuleRegistry.builder();
    const failures: ConfigurationError[] = [];

    descriptors.forEach((descriptor) => {
      try {
        builder.register(descriptor);
      } catch (error) {
        if (!(error instanceof ConfigurationError)) {
          throw error;
        }
        failures.push(error);
      }
    });

    if (failures.length === 1) {
      throw failures[0];
    }
    if (failures.length > 1) {
      const issues = failures.flatMap((failure) =>
        failure.issues.length > 0 ? failure.issues.map((issue) => `${failure.field}: ${issue}`) : [failure.message],
      );
      throw new ConfigurationError(
        `${failures.length} rule descriptors failed to load`,
        'rules',
        undefined,
        ErrorCode.RULE_INVALID,
        { component: 'RuleRegistry', operation: 'load' },
        issues,
      );
    }

    return builder.build();
  }

  /** Number of registered rules */
  get size(): number {
    return this.rules.length;
  }

  /**
   * Descriptors applicable to a kind, in registration order.
   */
  lookup(kind: string): readonly RuleDescriptor[] {
    return this.lookupRules(kind).map((rule) => rule.descriptor);
  }

  /**
   * Compiled rules applicable to a kind, in registration order.
   */
  lookupRules(kind: string): readonly LoadedRule[] {
    return this.byKind.get(kind) ?? NO_RULES;
  }

  /**
   * Whether any rule applies to a kind.
   */
  has(kind: string): boolean {
    return this.byKind.has(kind);
  }

  /**
   * Kinds with at least one rule, sorted.
   */
  kinds(): string[] {
    return [...this.byKind.keys()].sort();
  }

  /**
   * Every descriptor, in registration order.
   */
  descriptors(): readonly RuleDescriptor[] {
    return this.rules.map((rule) => rule.descriptor);
  }

  /**
   * Every compiled rule, in registration order.
   */
  allRules(): readonly LoadedRule[] {
    return this.rules;
  }

  /**
   * Look up a descriptor by id.
   */
  get(id: string): RuleDescriptor | undefined {
    return this.byId.get(id)?.descriptor;
  }
}

/**
 * Build a registry from raw descriptor data, such as the contents of rule files.
 *
 * @throws {ConfigurationError} Listing every invalid or duplicate descriptor
 */
export function loadRegistry(rawDescriptors: readonly unknown[]): RuleRegistry {
  return RuleRegistry.fromDescriptors(rawDescriptors);
}
