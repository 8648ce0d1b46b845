import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { CorpusDocumentSchema } from './schema.js';
import { CorpusLoadError, CorpusValidationError } from '../errors.js';
import type { CorpusData } from './types.js';

/**
 * Validate a raw corpus document (already decoded from JSON/YAML).
 * Timestamps come back normalized and confidence labels canonical.
 */
export function parseCorpusDocument(raw: unknown, filePath?: string): CorpusData {
  const result = CorpusDocumentSchema.safeParse(raw ?? {});
  if (!result.success) {
    const where = filePath ? ` in ${filePath}` : '';
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new CorpusValidationError(
      `Corpus validation failed${where}: ${issues}`,
      result.error.issues,
      filePath,
    );
  }
  return result.data;
}

/**
 * Read a corpus document from disk. `.yaml`/`.yml` files are parsed as YAML,
 * everything else as JSON.
 */
export function loadCorpusFile(filePath: string): CorpusData {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch {
    throw new CorpusLoadError(`Failed to read corpus file: ${filePath}`, filePath);
  }

  const ext = extname(filePath).toLowerCase();
  let parsed: unknown;
  try {
    parsed = ext === '.yaml' || ext === '.yml' ? parseYaml(content) : JSON.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CorpusLoadError(`Failed to parse corpus file ${filePath}: ${reason}`, filePath);
  }

  return parseCorpusDocument(parsed, filePath);
}
