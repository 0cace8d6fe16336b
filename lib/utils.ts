import { types } from 'util';
import { DeepPartial } from './types/config';

/**
 * Deep merge two objects, with the override taking precedence.
 *
 * Objects are recursively merged. Arrays and primitives in the override
 * replace the base value entirely. `undefined` values in the override
 * are ignored (the base value is preserved).
 *
 * @param base - The base object providing default values
 * @param override - Partial object whose defined values take precedence
 * @returns A new object with the merged result (neither input is mutated)
 *
 * @example
 * ```typescript
 * const merged = deepMerge(baseConfig, { catalog: { minReplicas: 3 } });
 * ```
 */
export function deepMerge<T extends object>(base: T, override: DeepPartial<T>): T {
  const result = { ...base } as T;

  for (const key of Object.keys(override) as Array<keyof T>) {
    const overrideValue = override[key];
    const baseValue = base[key];

    if (
      overrideValue !== undefined &&
      typeof overrideValue === 'object' &&
      overrideValue !== null &&
      !Array.isArray(overrideValue) &&
      typeof baseValue === 'object' &&
      baseValue !== null &&
      !Array.isArray(baseValue)
    ) {
      result[key] = deepMerge(baseValue as object, overrideValue as object) as T[keyof T];
    } else if (overrideValue !== undefined) {
      result[key] = overrideValue as T[keyof T];
    }
  }

  return result;
}

// =============================================================================
// Exhaustive Type Checking Utilities
// =============================================================================

/**
 * Assert that a value is never reached (exhaustive check)
 *
 * Use this function in switch statements over discriminated unions such as
 * {@link PathSegment} or {@link CompiledPredicate}. If a case is missed,
 * TypeScript will produce a compile-time error.
 *
 * @param value - The value that should never be reached
 * @param message - Optional custom error message
 * @throws Error if called at runtime (indicates a bug)
 */
export function assertNever(value: never, message?: string): never {
  throw new Error(message ?? `Unexpected value: ${JSON.stringify(value)}. This should never happen.`);
}

// =============================================================================
// Document helpers
// =============================================================================

/**
 * Type guard for a JSON/YAML mapping (a plain object, not an array or null).
 *
 * @example
 * ```typescript
 * isMapping({ kind: 'Pod' }); // true
 * isMapping([1, 2]);          // false
 * ```
 */
export function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Own-property check that ignores inherited keys such as `constructor`.
 */
export function hasOwn(value: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(value, key);
}

/**
 * Structural equality for decoded JSON/YAML values.
 *
 * Mappings compare by own keys regardless of order; sequences compare
 * element-wise. `-0` equals `0`, and `NaN` equals `NaN`.
 */
export function deepEqual(left: unknown, right: unknown): boolean {
  if (left === right) {
    return true;
  }
  if (typeof left === 'number' && typeof right === 'number') {
    return Number.isNaN(left) && Number.isNaN(right);
  }
  if (Array.isArray(left) || Array.isArray(right)) {
    if (!Array.isArray(left) || !Array.isArray(right) || left.length !== right.length) {
      return false;
    }
    return left.every((element, index) => deepEqual(element, right[index]));
  }
  if (isMapping(left) && isMapping(right)) {
    const leftKeys = Object.keys(left);
    if (leftKeys.length !== Object.keys(right).length) {
      return false;
    }
    return leftKeys.every((key) => hasOwn(right, key) && deepEqual(left[key], right[key]));
  }
  return false;
}

/**
 * Recursively freeze a value and everything it contains.
 *
 * @returns The same value, now immutable
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Type guard for checking if a value is a non-empty string
 */
export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

/**
 * Message of a thrown value.
 *
 * Errors raised by Node internals can come from another realm and fail
 * `instanceof Error`, so native errors are recognized by brand.
 *
 * @example
 * ```typescript
 * errorMessage(new Error('boom')); // 'boom'
 * errorMessage('boom');            // 'boom'
 * ```
 */
export function errorMessage(error: unknown): string {
  return types.isNativeError(error) || error instanceof Error ? error.message : String(error);
}
