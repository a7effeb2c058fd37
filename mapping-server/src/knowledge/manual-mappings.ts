/**
 * Loading of the static tables: built-in manual mappings, the operator
 * override file and the normalization rules.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { ManualMapping, NormalizationRule } from '@team-identity/shared/types';
import { OverrideFileUnreadableError } from '../errors.js';

export const BUILTIN_MAPPINGS_FILE = fileURLToPath(new URL('./data/manual-mappings.json', import.meta.url));
export const NORMALIZATION_RULES_FILE = fileURLToPath(
  new URL('./data/normalization-rules.json', import.meta.url)
);

const MappingFileSchema = z.record(z.string(), z.string());

const RulesFileSchema = z.array(
  z.object({
    pattern: z.string().min(1),
    replacement: z.string(),
  })
);

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readJson(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new OverrideFileUnreadableError(path, isMissingFile(error) ? 'missing' : 'invalid', error);
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new OverrideFileUnreadableError(path, 'invalid', error);
  }
}

/**
 * Read a flat `{ "provider name": "canonical name" }` file.
 */
export async function readMappingFile(path: string): Promise<Record<string, string>> {
  const parsed = MappingFileSchema.safeParse(await readJson(path));
  if (!parsed.success) {
    throw new OverrideFileUnreadableError(path, 'invalid', parsed.error);
  }
  return parsed.data;
}

export async function readNormalizationRules(
  path: string = NORMALIZATION_RULES_FILE
): Promise<NormalizationRule[]> {
  const parsed = RulesFileSchema.safeParse(await readJson(path));
  if (!parsed.success) {
    throw new OverrideFileUnreadableError(path, 'invalid', parsed.error);
  }
  return parsed.data;
}

/**
 * Merge the manual layers. Later layers replace earlier entries with the same key.
 */
export function mergeManualMappings(
  builtin: Record<string, string>,
  storeRows: readonly ManualMapping[],
  override: Record<string, string>
): Map<string, string> {
  const table = new Map(Object.entries(builtin));
  for (const row of storeRows) {
    table.set(row.sourceName, row.canonicalName);
  }
  for (const [sourceName, canonicalName] of Object.entries(override)) {
    table.set(sourceName, canonicalName);
  }
  return table;
}
