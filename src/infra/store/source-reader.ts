/**
 * Reads raw decision entries from a file.
 *
 * Supported formats by extension:
 *   .json        — an array, or an object with a `decisions` array
 *   .jsonl       — one record per non-blank line
 *   .yaml / .yml — same shapes as .json
 */

import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { DecisionDocumentSchema } from '../../core/models/schemas.js';
import { LoadError } from '../../core/decisions/errors.js';
import { getErrorMessage, isErrnoException } from '../../shared/utils/index.js';

export const SUPPORTED_SOURCE_EXTENSIONS: readonly string[] = ['.json', '.jsonl', '.yaml', '.yml'];

function readSourceText(path: string): string {
  try {
    return readFileSync(path, 'utf-8').replace(/^\uFEFF/, '');
  } catch (err) {
    const reason = isErrnoException(err) && err.code === 'ENOENT'
      ? 'file not found'
      : `cannot read file (${getErrorMessage(err)})`;
    throw new LoadError(path, reason, { cause: err });
  }
}

function parseJsonLines(path: string, content: string): unknown[] {
  const entries: unknown[] = [];
  content.split('\n').forEach((line, lineIndex) => {
    if (!line.trim()) return;
    try {
      entries.push(JSON.parse(line));
    } catch (err) {
      throw new LoadError(path, `invalid JSON on line ${lineIndex + 1} (${getErrorMessage(err)})`, { cause: err });
    }
  });
  return entries;
}

function parseDocument(path: string, extension: string, content: string): unknown {
  try {
    return extension === '.json' ? JSON.parse(content) : parseYaml(content);
  } catch (err) {
    throw new LoadError(path, `cannot parse ${extension.slice(1)} content (${getErrorMessage(err)})`, { cause: err });
  }
}

/** Extract the raw entry list from a parsed document */
export function toRawEntries(source: string, document: unknown): unknown[] {
  const parsed = DecisionDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw new LoadError(source, 'expected a list of decision records or an object with a "decisions" list');
  }
  return Array.isArray(parsed.data) ? parsed.data : parsed.data.decisions;
}

/**
 * Read the raw (unvalidated) decision entries of a source file.
 *
 * @throws LoadError when the file is missing, unreadable, of an unsupported
 *   type or not shaped as a list of records
 */
export function readDecisionSource(path: string): unknown[] {
  const extension = extname(path).toLowerCase();
  if (!SUPPORTED_SOURCE_EXTENSIONS.includes(extension)) {
    throw new LoadError(path, `unsupported file type "${extension || '(none)'}"`);
  }

  const content = readSourceText(path);
  if (extension === '.jsonl') {
    return parseJsonLines(path, content);
  }
  return toRawEntries(path, parseDocument(path, extension, content));
}
