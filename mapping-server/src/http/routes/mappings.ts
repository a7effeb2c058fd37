/**
 * HTTP API routes for inspecting and reloading the mapping tables.
 */

import type { FastifyInstance } from 'fastify';
import {
  describeIssues,
  LearnedMappingsQuerySchema,
  type LearnedMappingResponse,
} from '../../api-types.js';
import { PersistenceUnavailableError } from '../../errors.js';
import type { TeamResolver } from '../../matching/resolver.js';

export function registerMappingRoutes(fastify: FastifyInstance, resolver: TeamResolver): void {
  /**
   * GET /api/mappings/learned?verified=true&limit=50
   */
  fastify.get('/api/mappings/learned', async (request, reply) => {
    const parsed = LearnedMappingsQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Invalid query', issues: describeIssues(parsed.error) });
    }

    try {
      const mappings = await resolver.listLearnedMappings(parsed.data);
      const response: LearnedMappingResponse[] = mappings.map((m) => ({
        ...m,
        createdAt: m.createdAt.toISOString(),
      }));
      return { mappings: response, count: response.length };
    } catch (error) {
      if (error instanceof PersistenceUnavailableError) {
        return reply.status(503).send({ error: error.message });
      }
      throw error;
    }
  });

  /**
   * POST /api/mappings/reload
   * Re-read the manual tables, the override file and the learned cache.
   */
  fastify.post('/api/mappings/reload', async () => {
    return resolver.reload();
  });
}
