import { describe, it, expect } from 'vitest';
import { readNormalizationRules } from '../knowledge/manual-mappings.js';
import { compileRules, createNormalizer, normalizeTeamName } from './normalizer.js';

const normalize = createNormalizer(compileRules(await readNormalizationRules()));

describe('normalizeTeamName', () => {
  it('drops corporate prefixes', () => {
    expect(normalize('FC Barcelona')).toBe('barcelona');
    expect(normalize('Olympique Lyonnais')).toBe('lyonnais');
    expect(normalize('Tottenham Hotspur')).toBe('tottenham');
  });

  it('abbreviates United', () => {
    expect(normalize('Manchester United')).toBe('manchester utd');
    expect(normalize('Manchester Utd')).toBe('manchester utd');
  });

  it('spells out ampersands', () => {
    expect(normalize('Brighton & Hove Albion')).toBe('brighton and hove albion');
  });

  it('folds accented letters before removing tokens', () => {
    expect(normalize('1. FC Köln')).toBe('1. koln');
    expect(normalize('Atlético Madrid')).toBe('atletico madrid');
    expect(normalize('Fç Porto')).toBe('porto');
  });

  it('collapses whitespace and trims', () => {
    expect(normalize('  Paris   Saint-Germain ')).toBe('paris saint-germain');
  });

  it('returns an empty string for empty or missing input', () => {
    expect(normalize('')).toBe('');
    expect(normalize(null)).toBe('');
    expect(normalize(undefined)).toBe('');
    expect(normalize('FC')).toBe('');
  });

  it('is idempotent', () => {
    const samples = [
      'FC Barcelona',
      'Manchester United',
      'Brighton & Hove Albion',
      '1. FC Köln',
      'Fç Porto',
      'Borussia Mönchengladbach',
      '  Real   Sociedad  ',
      'SSC Napoli',
      'Straße FC',
      'A&B United City',
      'ASC Oțelul',
    ];
    for (const sample of samples) {
      const once = normalize(sample);
      expect(normalize(once)).toBe(once);
    }
  });
});

describe('compileRules', () => {
  it('skips invalid patterns and reports them', () => {
    const invalid: string[] = [];
    const rules = compileRules(
      [
        { pattern: '(', replacement: '' },
        { pattern: 'x', replacement: 'y' },
      ],
      (rule) => invalid.push(rule.pattern)
    );

    expect(rules).toHaveLength(1);
    expect(invalid).toEqual(['(']);
    expect(normalizeTeamName('XX', rules)).toBe('yy');
  });
});
