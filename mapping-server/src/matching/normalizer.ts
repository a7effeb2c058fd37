/**
 * Team name normalization driven by an ordered rule table.
 */

import type { NormalizationRule } from '@team-identity/shared/types';

export interface CompiledRule {
  pattern: RegExp;
  replacement: string;
}

export type Normalizer = (name: string | null | undefined) => string;

/**
 * Compile rules into case-insensitive global expressions.
 * Rules whose pattern is not a valid expression are skipped and reported through `onInvalid`.
 */
export function compileRules(
  rules: readonly NormalizationRule[],
  onInvalid?: (rule: NormalizationRule, error: unknown) => void
): CompiledRule[] {
  const compiled: CompiledRule[] = [];
  for (const rule of rules) {
    try {
      compiled.push({ pattern: new RegExp(rule.pattern, 'gi'), replacement: rule.replacement });
    } catch (error) {
      onInvalid?.(rule, error);
    }
  }
  return compiled;
}

export function normalizeTeamName(name: string | null | undefined, rules: readonly CompiledRule[]): string {
  if (!name) {
    return '';
  }

  let normalized = name.trim();
  for (const { pattern, replacement } of rules) {
    normalized = normalized.replace(pattern, replacement);
  }

  return normalized.replace(/\s+/g, ' ').trim().toLowerCase();
}

export function createNormalizer(rules: readonly CompiledRule[]): Normalizer {
  return (name) => normalizeTeamName(name, rules);
}
