/**
 * Reads rule files and manifest files.
 *
 * Both are YAML streams (JSON is valid YAML), possibly holding several
 * documents separated by `---`. Empty documents are ignored. Anything that
 * cannot be read or parsed is a {@link ConfigurationError}; the loader never
 * returns partial content.
 *
 * @module policies/loader
 */

import * as fs from 'fs';
import * as yaml from 'yaml';
import { ConfigurationError } from '../types/errors';
import { errorMessage } from '../utils';
import { RuleFileSchema } from '../utils/validation';

/**
 * A decoded document together with where it came from.
 */
export interface SourcedDocument {
  /** `file#n`, with `n` counting non-empty documents from 1 */
  readonly source: string;
  readonly document: unknown;
}

// A document holding nothing but `---` parses to a null scalar.
function isEmptyDocument(contents: unknown): boolean {
  return contents === null || (yaml.isScalar(contents) && contents.value === null);
}

/**
 * Parse every non-empty document of a YAML or JSON stream.
 *
 * @param text - File contents
 * @param origin - Name used in error messages
 * @throws {ConfigurationError} On the first syntax error
 */
export function parseDocuments(text: string, origin: string): unknown[] {
  const documents: unknown[] = [];
  for (const doc of yaml.parseAllDocuments(text)) {
    const [error] = doc.errors;
    if (error) {
      throw ConfigurationError.unreadableFile(origin, error.message);
    }
    if (!isEmptyDocument(doc.contents)) {
      documents.push(doc.toJS());
    }
  }
  return documents;
}

async function readText(file: string): Promise<string> {
  try {
    return await fs.promises.readFile(file, 'utf-8');
  } catch (error) {
    throw ConfigurationError.unreadableFile(file, errorMessage(error));
  }
}

/**
 * Extract raw descriptors from parsed rule file documents.
 *
 * Each document is a list of descriptors or a `{ rules: [...] }` mapping.
 * The descriptors themselves are validated later by the registry.
 *
 * @throws {ConfigurationError} When a document has neither shape
 */
export function extractRules(documents: readonly unknown[], origin: string): unknown[] {
  return documents.flatMap<unknown>((document, index) => {
    const result = RuleFileSchema.safeParse(document);
    if (!result.success) {
      throw ConfigurationError.unreadableFile(
        `${origin}#${index + 1}`,
        'expected a list of rules or a mapping with a rules list',
      );
    }
    return result.data;
  });
}

/**
 * Read raw rule descriptors from one file.
 */
export async function loadRuleFile(file: string): Promise<unknown[]> {
  return extractRules(parseDocuments(await readText(file), file), file);
}

/**
 * Read raw rule descriptors from several files, in order.
 */
export async function loadRuleFiles(files: readonly string[]): Promise<unknown[]> {
  const descriptors: unknown[] = [];
  for (const file of files) {
    descriptors.push(...(await loadRuleFile(file)));
  }
  return descriptors;
}

/**
 * Read every manifest document of a file.
 *
 * Documents are returned unchecked: structural checks belong to the evaluator.
 */
export async function loadManifestFile(file: string): Promise<SourcedDocument[]> {
  return parseDocuments(await readText(file), file).map((document, index) => ({
    source: `${file}#${index + 1}`,
    document,
  }));
}
