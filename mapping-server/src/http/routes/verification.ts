import type { FastifyInstance } from 'fastify';
import { describeIssues, VerifyBodySchema } from '../../api-types.js';
import { PersistenceUnavailableError } from '../../errors.js';
import type { TeamResolver } from '../../matching/resolver.js';

export function registerVerificationRoutes(fastify: FastifyInstance, resolver: TeamResolver): void {
  /**
   * POST /api/verify
   * Accept or reject a past resolution.
   */
  fastify.post('/api/verify', async (request, reply) => {
    const parsed = VerifyBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Invalid verification', issues: describeIssues(parsed.error) });
    }

    try {
      return await resolver.verify({ ...parsed.data, context: parsed.data.context ?? null });
    } catch (error) {
      if (error instanceof PersistenceUnavailableError) {
        return reply.status(503).send({ error: error.message });
      }
      throw error;
    }
  });
}
