import { describe, it, expect } from 'vitest';
import * as sharedTypes from '@team-identity/shared/types';
import { LEARNED_STRATEGY_NAMES, STRATEGY_NAMES, STRATEGY_THRESHOLDS } from './thresholds.js';

describe('strategy names', () => {
  it('list the cascade in threshold order', () => {
    expect([...STRATEGY_NAMES]).toEqual(Object.keys(STRATEGY_THRESHOLDS));
  });

  it('add manual verification for learned mappings', () => {
    expect(LEARNED_STRATEGY_NAMES).toHaveLength(8);
    expect(LEARNED_STRATEGY_NAMES[7]).toBe('manual_verification');
  });

  it('are defined here since the shared package only carries types', () => {
    expect(Object.keys(sharedTypes)).toEqual([]);
  });
});
