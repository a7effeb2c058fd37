/**
 * Pairing a fixture from one provider with the matching event of the other.
 */

import type { MatchResult } from '@team-identity/shared/types';
import type { TeamResolver } from './resolver.js';

export interface FixtureTeams {
  homeTeam: string;
  awayTeam: string;
}

export interface FixturePairing<E extends FixtureTeams> {
  event: E | null;
  home: MatchResult;
  away: MatchResult;
}

/**
 * Team names offered by a provider's event list, in order of appearance.
 */
export function eventTeamNames(events: readonly FixtureTeams[]): string[] {
  const names: string[] = [];
  for (const event of events) {
    if (event.homeTeam) names.push(event.homeTeam);
    if (event.awayTeam) names.push(event.awayTeam);
  }
  return names;
}

/**
 * Resolve both sides of `fixture` against `events` and return the first event whose
 * home and away teams are exactly the resolved names.
 */
export async function pairFixture<E extends FixtureTeams>(
  resolver: Pick<TeamResolver, 'resolve'>,
  fixture: FixtureTeams,
  events: readonly E[],
  context: string | null = null
): Promise<FixturePairing<E>> {
  const candidates = eventTeamNames(events);
  const home = await resolver.resolve(fixture.homeTeam, candidates, context);
  const away = await resolver.resolve(fixture.awayTeam, candidates, context);

  const event =
    events.find(
      e =>
        home.matchFound &&
        away.matchFound &&
        e.homeTeam === home.matchedName &&
        e.awayTeam === away.matchedName
    ) ?? null;

  return { event, home, away };
}
