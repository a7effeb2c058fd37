import { describe, it, expect } from 'vitest';
import { readNormalizationRules } from '../../knowledge/manual-mappings.js';
import { compileRules, createNormalizer } from '../normalizer.js';
import {
  buildStrategyCascade,
  ExactMatchStrategy,
  FuzzyMatchingStrategy,
  LearnedMappingStrategy,
  ManualMappingStrategy,
  NormalizedMatchingStrategy,
  SubstringMatchingStrategy,
  WordBasedMatchingStrategy,
  type MappingLookup,
} from './index.js';

const normalize = createNormalizer(compileRules(await readNormalizationRules()));

function lookupOf(manual: Record<string, string>, learned: Record<string, string> = {}): MappingLookup {
  return {
    lookupManual: (name) => manual[name] ?? null,
    lookupLearned: (name) => learned[name] ?? null,
  };
}

describe('ExactMatchStrategy', () => {
  const strategy = new ExactMatchStrategy();

  it('matches identical strings with full confidence', () => {
    const result = strategy.match('Arsenal', ['Chelsea', 'Arsenal']);
    expect(result).toEqual({
      sourceName: 'Arsenal',
      matchedName: 'Arsenal',
      confidence: 1,
      strategyUsed: 'exact_match',
      matchFound: true,
      alternatives: [],
      elapsedMs: 0,
    });
  });

  it('is case-sensitive', () => {
    const result = strategy.match('arsenal', ['Arsenal']);
    expect(result.matchFound).toBe(false);
    expect(result.matchedName).toBe('');
    expect(result.confidence).toBe(0);
  });
});

describe('ManualMappingStrategy', () => {
  const strategy = new ManualMappingStrategy(lookupOf({ 'Manchester United': 'Manchester Utd' }));

  it('uses the mapped name when the provider offers it', () => {
    const result = strategy.match('Manchester United', ['Manchester Utd', 'Chelsea']);
    expect(result.matchedName).toBe('Manchester Utd');
    expect(result.confidence).toBe(0.95);
    expect(result.matchFound).toBe(true);
  });

  it('does not match when the mapped name is not a candidate', () => {
    const result = strategy.match('Manchester United', ['Man Utd']);
    expect(result.matchFound).toBe(false);
  });
});

describe('LearnedMappingStrategy', () => {
  it('uses learned names present in the candidates', () => {
    const strategy = new LearnedMappingStrategy(lookupOf({}, { Spurs: 'Tottenham' }));
    const result = strategy.match('Spurs', ['Tottenham', 'Arsenal']);
    expect(result.matchedName).toBe('Tottenham');
    expect(result.confidence).toBe(0.9);
    expect(result.strategyUsed).toBe('learned_mapping');
  });
});

describe('NormalizedMatchingStrategy', () => {
  const strategy = new NormalizedMatchingStrategy(normalize);

  it('matches names that normalize to the same key', () => {
    const result = strategy.match('FC Barcelona', ['Real Madrid', 'Barcelona']);
    expect(result.matchedName).toBe('Barcelona');
    expect(result.confidence).toBe(0.85);
  });

  it('never matches on an empty key', () => {
    expect(strategy.match('FC', ['CF']).matchFound).toBe(false);
  });
});

describe('SubstringMatchingStrategy', () => {
  const strategy = new SubstringMatchingStrategy(normalize);

  it('scales confidence by the length ratio', () => {
    // "inter" in "inter milan": 5 / 11; "internacional" (5 / 13) is too short a share to be an alternative
    const result = strategy.match('Inter', ['Inter Milan', 'Internacional', 'Milan FC']);
    expect(result.matchedName).toBe('Inter Milan');
    expect(result.confidence).toBeCloseTo((5 / 11) * 0.75, 10);
    expect(result.alternatives).toEqual([]);
  });

  it('keeps runner-ups above half the length as alternatives', () => {
    // "real madrid castilla": 11 / 20
    const result = strategy.match('Real Madrid', ['Real Madrid CF', 'Real Madrid Castilla']);
    expect(result.matchedName).toBe('Real Madrid CF');
    expect(result.confidence).toBe(0.75);
    expect(result.alternatives).toEqual(['Real Madrid Castilla']);
  });
});

describe('WordBasedMatchingStrategy', () => {
  const strategy = new WordBasedMatchingStrategy(normalize);

  it('scores by shared words', () => {
    const result = strategy.match('Borussia Monchengladbach', ['B. Monchengladbach', 'Dortmund']);
    expect(result.matchedName).toBe('B. Monchengladbach');
    expect(result.confidence).toBeCloseTo(0.7 / 3, 10);
    expect(result.matchFound).toBe(true);
  });

  it('keeps the first of equally good candidates', () => {
    const result = strategy.match('Hertha Berlin', ['Union Berlin', 'Hertha BSC']);
    expect(result.matchedName).toBe('Union Berlin');
    expect(result.alternatives).toEqual(['Hertha BSC']);
  });
});

describe('FuzzyMatchingStrategy', () => {
  const strategy = new FuzzyMatchingStrategy(normalize);

  it('ranks candidates by sequence ratio', () => {
    // ratios: abcdef0 12/13, abcdez 10/12, abcxyz 6/12
    const result = strategy.match('abcdef', ['abcxyz', 'abcdez', 'abcdef0']);
    expect(result.matchedName).toBe('abcdef0');
    expect(result.confidence).toBeCloseTo((12 / 13) * 0.6, 10);
    expect(result.alternatives).toEqual(['abcdez', 'abcxyz']);
  });

  it('reports a weak best guess without claiming a match', () => {
    // ratio 8 / 19 clears the candidate floor, confidence stays under 0.3
    const result = strategy.match('abcdefghij', ['abcdwxyzu']);
    expect(result.matchedName).toBe('abcdwxyzu');
    expect(result.confidence).toBeCloseTo((8 / 19) * 0.6, 10);
    expect(result.matchFound).toBe(false);
  });

  it('ignores unrelated names', () => {
    const result = strategy.match('Arsenal', ['Zzzz']);
    expect(result.matchFound).toBe(false);
    expect(result.confidence).toBe(0);
    expect(result.matchedName).toBe('');
  });
});

describe('buildStrategyCascade', () => {
  it('orders strategies from strictest to loosest', () => {
    const cascade = buildStrategyCascade(lookupOf({}), normalize);
    expect(cascade.map((s) => [s.name, s.threshold])).toEqual([
      ['exact_match', 1],
      ['manual_mapping', 0.95],
      ['learned_mapping', 0.9],
      ['normalized_matching', 0.85],
      ['substring_matching', 0.75],
      ['word_based_matching', 0.7],
      ['fuzzy_matching', 0.6],
    ]);
  });

  it('finds nothing in an empty candidate list', () => {
    for (const strategy of buildStrategyCascade(lookupOf({ Inter: 'Inter Milan' }), normalize)) {
      const result = strategy.match('Inter', []);
      expect(result.matchFound).toBe(false);
      expect(result.confidence).toBe(0);
    }
  });
});
