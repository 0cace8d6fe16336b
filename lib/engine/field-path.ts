/**
 * Field accessor: parses field path text and resolves paths against documents.
 *
 * Path syntax:
 * - `spec.replicas` -- literal keys separated by dots
 * - `metadata.labels["app.kubernetes.io/name"]` -- quoted keys (for keys containing dots);
 *   a backslash escapes the quote or another backslash
 * - `spec.containers[0]` -- a sequence index
 * - `spec.containers[*]` -- every element of a sequence
 * - `spec.{containers,initContainers}` -- alternative sibling keys
 *
 * Resolution never throws. A missing key, an out-of-range index or a value of
 * the wrong shape ends that branch and contributes nothing.
 *
 * @module engine/field-path
 */

import { ConfigurationError } from '../types/errors';
import { FieldPath, PathSegment } from '../types/policy';
import { assertNever, hasOwn, isMapping } from '../utils';

const PLAIN_KEY = /^[^.[\]{}\s,'"]+$/;
const KEY_STOP = /[.[\]{}\s,'"]/;

/**
 * Parse field path text into segments.
 *
 * The empty string is the root path and resolves to the document itself.
 *
 * @param text - Path text, e.g. `spec.template.spec.{containers,initContainers}[*]`
 * @returns The parsed path
 * @throws {ConfigurationError} With code `FIELD_PATH_INVALID` on malformed text
 */
export function parseFieldPath(text: string): FieldPath {
  const segments: PathSegment[] = [];
  const fail = (reason: string): never => {
    throw ConfigurationError.invalidFieldPath(text, reason);
  };

  let i = 0;
  let afterDot = false;

  while (i < text.length) {
    const ch = text[i];

    if (ch === '.') {
      if (segments.length === 0 || afterDot) {
        fail(`empty segment at position ${i}`);
      }
      afterDot = true;
      i++;
      continue;
    }

    if (ch === '[') {
      if (afterDot) {
        fail(`'[' cannot follow '.' at position ${i}`);
      }
      const [segment, next] = parseBracket(text, i, fail);
      segments.push(segment);
      i = next;
      afterDot = false;
      continue;
    }

    if (segments.length > 0 && !afterDot) {
      fail(`expected '.' or '[' at position ${i}`);
    }

    if (ch === '{') {
      const close = text.indexOf('}', i);
      if (close < 0) {
        fail('unterminated wildcard set');
      }
      const keys = text
        .slice(i + 1, close)
        .split(',')
        .map((key) => key.trim());
      if (keys.some((key) => key.length === 0)) {
        fail('empty key in wildcard set');
      }
      const invalid = keys.find((key) => !PLAIN_KEY.test(key));
      if (invalid !== undefined) {
        fail(`invalid key '${invalid}' in wildcard set`);
      }
      segments.push({ type: 'wildcard', keys });
      i = close + 1;
      afterDot = false;
      continue;
    }

    let end = i;
    while (end < text.length && !KEY_STOP.test(text[end])) {
      end++;
    }
    if (end === i) {
      fail(`unexpected '${ch}' at position ${i}`);
    }
    segments.push({ type: 'key', key: text.slice(i, end) });
    i = end;
    afterDot = false;
  }

  if (afterDot) {
    fail('path ends with a separator');
  }

  return segments;
}

function parseBracket(text: string, open: number, fail: (reason: string) => never): [PathSegment, number] {
  const first = text[open + 1];

  if (first === '"' || first === "'") {
    // A backslash takes the next character literally.
    let key = '';
    let i = open + 2;
    while (i < text.length && text[i] !== first) {
      if (text[i] === '\\') {
        i++;
      }
      key += text.charAt(i);
      i++;
    }
    if (i >= text.length) {
      fail('unterminated quoted key');
    }
    if (text[i + 1] !== ']') {
      fail(`expected ']' at position ${i + 1}`);
    }
    return [{ type: 'key', key }, i + 2];
  }

  const close = text.indexOf(']', open);
  if (close < 0) {
    fail('unterminated bracket');
  }
  const body = text.slice(open + 1, close).trim();
  if (body === '*') {
    return [{ type: 'each' }, close + 1];
  }
  if (/^\d+$/.test(body)) {
    return [{ type: 'index', index: Number(body) }, close + 1];
  }
  return fail(`invalid bracket contents '${body}'`);
}

/**
 * Format a parsed path back into text accepted by {@link parseFieldPath}.
 */
export function formatFieldPath(path: FieldPath): string {
  let text = '';
  for (const segment of path) {
    switch (segment.type) {
      case 'key':
        if (PLAIN_KEY.test(segment.key)) {
          text += text.length === 0 ? segment.key : `.${segment.key}`;
        } else {
          text += `["${segment.key.replace(/["\\]/g, '\\$&')}"]`;
        }
        break;
      case 'index':
        text += `[${segment.index}]`;
        break;
      case 'each':
        text += '[*]';
        break;
      case 'wildcard': {
        const set = `{${segment.keys.join(',')}}`;
        text += text.length === 0 ? set : `.${set}`;
        break;
      }
      default:
        assertNever(segment);
    }
  }
  return text;
}

/**
 * Lazily resolve a path, yielding every value it reaches.
 *
 * Wildcard alternatives are visited in declaration order; values reached
 * through `[*]` are visited in sequence order.
 *
 * @param document - Any decoded JSON/YAML value
 * @param path - Parsed path
 */
export function* resolveLazy(document: unknown, path: FieldPath, position = 0): Generator<unknown> {
  if (position === path.length) {
    yield document;
    return;
  }

  const segment = path[position];
  switch (segment.type) {
    case 'key':
      if (isMapping(document) && hasOwn(document, segment.key)) {
        yield* resolveLazy(document[segment.key], path, position + 1);
      }
      return;
    case 'index':
      if (Array.isArray(document) && segment.index < document.length) {
        yield* resolveLazy(document[segment.index], path, position + 1);
      }
      return;
    case 'each':
      if (Array.isArray(document)) {
        for (const element of document) {
          yield* resolveLazy(element, path, position + 1);
        }
      }
      return;
    case 'wildcard':
      if (isMapping(document)) {
        for (const key of segment.keys) {
          if (hasOwn(document, key)) {
            yield* resolveLazy(document[key], path, position + 1);
          }
        }
      }
      return;
    default:
      assertNever(segment);
  }
}

/**
 * Resolve a path to every value it reaches.
 *
 * @returns The reached values; empty when any step is missing
 *
 * @example
 * ```typescript
 * const path = parseFieldPath('spec.{containers,initContainers}[*].name');
 * resolve(pod, path); // ['app', 'sidecar', 'migrate']
 * ```
 */
export function resolve(document: unknown, path: FieldPath): unknown[] {
  return Array.from(resolveLazy(document, path));
}
