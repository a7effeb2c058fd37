import { describe, it, expect } from 'vitest';
import { MemoryMappingStore } from '../store/memory-store.js';
import { Alerter } from '../utils/alerting.js';
import { eventTeamNames, pairFixture } from './fixture-pairing.js';
import { TeamResolver } from './resolver.js';

const events = [
  { id: 1, homeTeam: 'Manchester Utd', awayTeam: 'Chelsea' },
  { id: 2, homeTeam: 'Barcelona', awayTeam: 'Real Madrid' },
];

const resolver = await TeamResolver.create({
  store: new MemoryMappingStore(),
  alerter: new Alerter({ silent: true }),
});

describe('eventTeamNames', () => {
  it('lists home and away names in order, skipping blanks', () => {
    expect(eventTeamNames([...events, { homeTeam: '', awayTeam: 'Everton' }])).toEqual([
      'Manchester Utd',
      'Chelsea',
      'Barcelona',
      'Real Madrid',
      'Everton',
    ]);
  });
});

describe('pairFixture', () => {
  it('returns the event with both resolved teams', async () => {
    const pairing = await pairFixture(resolver, { homeTeam: 'FC Barcelona', awayTeam: 'Real Madrid' }, events);

    expect(pairing.event?.id).toBe(2);
    expect(pairing.home.strategyUsed).toBe('manual_mapping');
    expect(pairing.away.strategyUsed).toBe('exact_match');
  });

  it('returns no event when a side does not resolve', async () => {
    const pairing = await pairFixture(resolver, { homeTeam: 'Barcelona', awayTeam: 'Qwz' }, events);

    expect(pairing.event).toBeNull();
    expect(pairing.away.matchFound).toBe(false);
  });

  it('returns no event when the teams never meet', async () => {
    const pairing = await pairFixture(
      resolver,
      { homeTeam: 'Manchester United', awayTeam: 'Real Madrid' },
      events
    );

    expect(pairing.home.matchedName).toBe('Manchester Utd');
    expect(pairing.event).toBeNull();
  });
});
