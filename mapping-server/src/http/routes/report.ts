import type { FastifyInstance } from 'fastify';
import { describeIssues, ReportQuerySchema } from '../../api-types.js';
import type { TeamResolver } from '../../matching/resolver.js';

export function registerReportRoutes(fastify: FastifyInstance, resolver: TeamResolver): void {
  /**
   * GET /api/report?days=7
   */
  fastify.get('/api/report', async (request, reply) => {
    const parsed = ReportQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Invalid report query', issues: describeIssues(parsed.error) });
    }

    return resolver.report(parsed.data.days);
  });
}
