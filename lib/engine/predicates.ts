/**
 * Predicate library: compiles predicate trees and evaluates them against documents.
 *
 * Evaluation is a pure function of the document. Missing fields and values of
 * the wrong type make a predicate false; nothing here throws on document
 * shape. Only compilation can fail, and it does so at registry load time.
 *
 * @module engine/predicates
 */

import { CompareOperator, CompiledPredicate, Predicate, PredicateOutcome } from '../types/policy';
import { assertNever, deepEqual, isMapping, isNonEmptyString } from '../utils';
import { parseFieldPath, resolve, resolveLazy } from './field-path';

const NO_DETAILS = { matched: [], unmatched: [], missing: [] } as const;

/**
 * Parse every path of a predicate tree once.
 *
 * @throws {ConfigurationError} When a path does not parse
 */
export function compilePredicate(predicate: Predicate): CompiledPredicate {
  switch (predicate.op) {
    case 'exists':
      return { op: 'exists', path: parseFieldPath(predicate.path) };
    case 'equals':
      return { op: 'equals', path: parseFieldPath(predicate.path), value: predicate.value };
    case 'compare':
      return {
        op: 'compare',
        path: parseFieldPath(predicate.path),
        operator: predicate.operator,
        value: predicate.value,
      };
    case 'countWhere':
      return {
        op: 'countWhere',
        paths: predicate.paths.map(parseFieldPath),
        where: compilePredicate(predicate.where),
        operator: predicate.operator,
        threshold: predicate.threshold,
        nonEmpty: predicate.nonEmpty,
      };
    case 'missingKeys':
      return { op: 'missingKeys', path: parseFieldPath(predicate.path), required: [...predicate.required] };
    case 'and':
    case 'or':
      return { op: predicate.op, predicates: predicate.predicates.map(compilePredicate) };
    case 'not':
      return { op: 'not', predicate: compilePredicate(predicate.predicate) };
    default:
      return assertNever(predicate);
  }
}

/**
 * Apply a comparison operator to two numbers.
 */
export function compareNumbers(left: number, operator: CompareOperator, right: number): boolean {
  switch (operator) {
    case '<':
      return left < right;
    case '<=':
      return left <= right;
    case '>':
      return left > right;
    case '>=':
      return left >= right;
    case '==':
      return left === right;
    default:
      return assertNever(operator);
  }
}

/**
 * Evaluate a compiled predicate.
 *
 * @param document - The manifest, or a sub-document inside `countWhere`
 * @param predicate - Compiled predicate tree
 * @returns Whether the predicate holds, with the names and keys it collected
 */
export function evaluatePredicate(document: unknown, predicate: CompiledPredicate): PredicateOutcome {
  switch (predicate.op) {
    case 'exists':
      return outcome(someResolved(document, predicate, (value) => value !== null && value !== undefined));

    case 'equals':
      return outcome(someResolved(document, predicate, (value) => deepEqual(value, predicate.value)));

    case 'compare':
      // Non-numeric values never satisfy a numeric comparison (fail-closed).
      return outcome(
        someResolved(
          document,
          predicate,
          (value) =>
            typeof value === 'number' &&
            Number.isFinite(value) &&
            compareNumbers(value, predicate.operator, predicate.value),
        ),
      );

    case 'countWhere':
      return evaluateCountWhere(document, predicate);

    case 'missingKeys': {
      const present = new Set<string>();
      for (const value of resolveLazy(document, predicate.path)) {
        if (isMapping(value)) {
          Object.keys(value).forEach((key) => present.add(key));
        }
      }
      const missing = predicate.required.filter((key) => !present.has(key));
      return { ...NO_DETAILS, satisfied: missing.length === 0, missing };
    }

    case 'and': {
      const evaluated: PredicateOutcome[] = [];
      for (const child of predicate.predicates) {
        const result = evaluatePredicate(document, child);
        evaluated.push(result);
        if (!result.satisfied) {
          return merge(false, evaluated);
        }
      }
      return merge(true, evaluated);
    }

    case 'or': {
      const evaluated: PredicateOutcome[] = [];
      for (const child of predicate.predicates) {
        const result = evaluatePredicate(document, child);
        evaluated.push(result);
        if (result.satisfied) {
          return merge(true, evaluated);
        }
      }
      return merge(false, evaluated);
    }

    case 'not': {
      const result = evaluatePredicate(document, predicate.predicate);
      return { ...result, satisfied: !result.satisfied };
    }

    default:
      return assertNever(predicate);
  }
}

function evaluateCountWhere(
  document: unknown,
  predicate: Extract<CompiledPredicate, { op: 'countWhere' }>,
): PredicateOutcome {
  const items = predicate.paths.flatMap((path) => resolve(document, path));
  const matched: string[] = [];
  const unmatched: string[] = [];

  items.forEach((item, position) => {
    const name = itemName(item, position);
    if (evaluatePredicate(item, predicate.where).satisfied) {
      matched.push(name);
    } else {
      unmatched.push(name);
    }
  });

  if (predicate.nonEmpty && items.length === 0) {
    return { satisfied: false, matched, unmatched, missing: [] };
  }

  const threshold = predicate.threshold === 'all' ? items.length : predicate.threshold;
  return {
    satisfied: compareNumbers(matched.length, predicate.operator, threshold),
    matched,
    unmatched,
    missing: [],
  };
}

function someResolved(
  document: unknown,
  predicate: Extract<CompiledPredicate, { op: 'exists' | 'equals' | 'compare' }>,
  test: (value: unknown) => boolean,
): boolean {
  for (const value of resolveLazy(document, predicate.path)) {
    if (test(value)) {
      return true;
    }
  }
  return false;
}

function itemName(item: unknown, position: number): string {
  if (isMapping(item) && isNonEmptyString(item.name)) {
    return item.name;
  }
  return `#${position}`;
}

function outcome(satisfied: boolean): PredicateOutcome {
  return { ...NO_DETAILS, satisfied };
}

function merge(satisfied: boolean, outcomes: readonly PredicateOutcome[]): PredicateOutcome {
  const collect = (pick: (o: PredicateOutcome) => readonly string[]): string[] =>
    Array.from(new Set(outcomes.flatMap(pick)));
  return {
    satisfied,
    matched: collect((o) => o.matched),
    unmatched: collect((o) => o.unmatched),
    missing: collect((o) => o.missing),
  };
}
