/**
 * Message templates for verdict configuration strings.
 *
 * A template is text with `{placeholder}` interpolation points. A placeholder
 * is either one of the names below or a field path resolved against the
 * manifest (`{spec.replicas}`, `{metadata.labels["team"]}`).
 *
 * | Placeholder        | Value                                              |
 * |--------------------|----------------------------------------------------|
 * | `{name}`           | `metadata.name`, or `<unnamed>`                    |
 * | `{namespace}`      | `metadata.namespace`, or `default`                 |
 * | `{kind}`           | `kind`                                             |
 * | `{ruleId}`         | id of the rule being rendered                      |
 * | `{matched}`        | names of items that matched a `countWhere`         |
 * | `{unmatched}`      | names of items that did not match a `countWhere`   |
 * | `{missing}`        | keys reported absent by `missingKeys`              |
 * | `{matchedCount}`, `{unmatchedCount}`, `{missingCount}` | list sizes |
 *
 * @module engine/templates
 */

import { FieldPath, PredicateOutcome } from '../types/policy';
import { ConfigurationError } from '../types/errors';
import { isMapping } from '../utils';
import { parseFieldPath, resolve } from './field-path';

const DETAIL_NAMES = [
  'name',
  'namespace',
  'kind',
  'ruleId',
  'matched',
  'unmatched',
  'missing',
  'matchedCount',
  'unmatchedCount',
  'missingCount',
] as const;

type DetailName = (typeof DETAIL_NAMES)[number];

type TemplatePart =
  | { readonly type: 'text'; readonly text: string }
  | { readonly type: 'detail'; readonly name: DetailName }
  | { readonly type: 'field'; readonly path: FieldPath };

/**
 * A parsed template, ready to render.
 */
export type CompiledTemplate = readonly TemplatePart[];

/**
 * Values available while rendering.
 */
export interface TemplateContext {
  readonly manifest: Record<string, unknown>;
  readonly ruleId: string;
  readonly outcome: PredicateOutcome;
}

/** Rendered for a field placeholder that resolves to nothing */
export const UNSET = '<unset>';

/** Rendered for an empty name or key list */
export const NONE = 'none';

function isDetailName(value: string): value is DetailName {
  return (DETAIL_NAMES as readonly string[]).includes(value);
}

/**
 * Parse a template.
 *
 * Placeholders may nest braces, so `{spec.{containers,initContainers}[*].name}`
 * is one field placeholder. Every brace must be balanced.
 *
 * @throws {ConfigurationError} When a brace is unbalanced, a placeholder is empty, or it is not a valid field path
 */
export function compileTemplate(template: string): CompiledTemplate {
  const parts: TemplatePart[] = [];
  const fail = (reason: string): never => {
    throw new ConfigurationError(`Invalid template '${template}': ${reason}`, 'template', template);
  };

  let text = '';
  let i = 0;
  while (i < template.length) {
    const ch = template[i];

    if (ch === '}') {
      fail(`unmatched '}' at position ${i}`);
    }
    if (ch !== '{') {
      text += ch;
      i++;
      continue;
    }

    const close = closingBrace(template, i);
    if (close < 0) {
      fail(`unterminated placeholder at position ${i}`);
    }

    const placeholder = template.slice(i + 1, close).trim();
    if (placeholder.length === 0) {
      fail(`empty placeholder at position ${i}`);
    }
    if (text.length > 0) {
      parts.push({ type: 'text', text });
      text = '';
    }
    parts.push(
      isDetailName(placeholder)
        ? { type: 'detail', name: placeholder }
        : { type: 'field', path: parseFieldPath(placeholder) },
    );
    i = close + 1;
  }

  if (text.length > 0) {
    parts.push({ type: 'text', text });
  }
  return parts;
}

// Index of the brace closing the one at `open`, skipping quoted keys; -1 when unbalanced.
function closingBrace(template: string, open: number): number {
  let depth = 0;
  let quote: string | undefined;
  for (let j = open; j < template.length; j++) {
    const ch = template[j];
    if (quote !== undefined) {
      if (ch === '\\') {
        j++;
      } else if (ch === quote) {
        quote = undefined;
      }
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}' && --depth === 0) {
      return j;
    }
  }
  return -1;
}

/**
 * Render a compiled template.
 */
export function renderTemplate(template: CompiledTemplate, context: TemplateContext): string {
  return template
    .map((part) => {
      switch (part.type) {
        case 'text':
          return part.text;
        case 'detail':
          return renderDetail(part.name, context);
        case 'field':
          return formatValues(resolve(context.manifest, part.path));
      }
    })
    .join('');
}

function renderDetail(name: DetailName, context: TemplateContext): string {
  const metadata = isMapping(context.manifest.metadata) ? context.manifest.metadata : {};
  switch (name) {
    case 'name':
      return typeof metadata.name === 'string' ? metadata.name : '<unnamed>';
    case 'namespace':
      return typeof metadata.namespace === 'string' ? metadata.namespace : 'default';
    case 'kind':
      return String(context.manifest.kind);
    case 'ruleId':
      return context.ruleId;
    case 'matched':
      return formatList(context.outcome.matched);
    case 'unmatched':
      return formatList(context.outcome.unmatched);
    case 'missing':
      return formatList(context.outcome.missing);
    case 'matchedCount':
      return String(context.outcome.matched.length);
    case 'unmatchedCount':
      return String(context.outcome.unmatched.length);
    case 'missingCount':
      return String(context.outcome.missing.length);
  }
}

function formatList(values: readonly string[]): string {
  return values.length === 0 ? NONE : values.join(', ');
}

function formatValues(values: readonly unknown[]): string {
  const present = values.filter((value) => value !== null && value !== undefined);
  if (present.length === 0) {
    return UNSET;
  }
  return present.map((value) => (typeof value === 'object' ? JSON.stringify(value) : String(value))).join(', ');
}
