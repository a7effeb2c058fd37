/**
 * HTTP API routes for team name resolution.
 */

import type { FastifyInstance } from 'fastify';
import {
  describeIssues,
  PairFixtureBodySchema,
  ResolveBatchBodySchema,
  ResolveBodySchema,
} from '../../api-types.js';
import { pairFixture } from '../../matching/fixture-pairing.js';
import type { TeamResolver } from '../../matching/resolver.js';

export function registerResolveRoutes(fastify: FastifyInstance, resolver: TeamResolver): void {
  /**
   * POST /api/resolve
   * Resolve one provider team name against a candidate list.
   */
  fastify.post('/api/resolve', async (request, reply) => {
    const parsed = ResolveBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Invalid resolve request', issues: describeIssues(parsed.error) });
    }

    const { sourceName, candidates, context } = parsed.data;
    return resolver.resolve(sourceName, candidates, context ?? null);
  });

  /**
   * POST /api/resolve/batch
   * Resolve several names in order.
   */
  fastify.post('/api/resolve/batch', async (request, reply) => {
    const parsed = ResolveBatchBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Invalid batch request', issues: describeIssues(parsed.error) });
    }

    const results = await resolver.resolveMany(
      parsed.data.requests.map((r) => ({
        sourceName: r.sourceName,
        candidates: r.candidates.filter((c): c is string => typeof c === 'string'),
        context: r.context ?? null,
      }))
    );

    return {
      results,
      processed: results.length,
      matched: results.filter((r) => r.matchFound).length,
    };
  });

  /**
   * POST /api/pair-fixture
   * Find the provider event for a fixture by resolving both teams.
   */
  fastify.post('/api/pair-fixture', async (request, reply) => {
    const parsed = PairFixtureBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Invalid fixture request', issues: describeIssues(parsed.error) });
    }

    const { fixture, events, context } = parsed.data;
    return pairFixture(resolver, fixture, events, context ?? null);
  });
}
