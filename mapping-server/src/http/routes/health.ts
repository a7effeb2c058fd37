import type { FastifyInstance } from 'fastify';
import type { HealthResponse } from '../../api-types.js';
import type { TeamResolver } from '../../matching/resolver.js';

export function registerHealthRoutes(fastify: FastifyInstance, resolver: TeamResolver): void {
  fastify.get('/health', async (): Promise<HealthResponse> => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      manualMappings: resolver.knowledgeBase.manualMappingsCount,
      learnedMappings: resolver.knowledgeBase.cachedLearnedCount,
    };
  });
}
