import Fastify from 'fastify';
import cors from '@fastify/cors';
import type { TeamResolver } from '../matching/resolver.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerResolveRoutes } from './routes/resolve.js';
import { registerVerificationRoutes } from './routes/verification.js';
import { registerReportRoutes } from './routes/report.js';
import { registerMappingRoutes } from './routes/mappings.js';

export interface HttpServerOptions {
  port: number;
  host: string;
}

export async function createHttpServer(resolver: TeamResolver) {
  const fastify = Fastify({
    logger: false, // Disable logger for MCP stdio compatibility
  });

  // Local tools and dashboards only
  await fastify.register(cors, {
    origin: [/^http:\/\/localhost/, /^http:\/\/127\.0\.0\.1/],
    methods: ['GET', 'POST'],
  });

  registerHealthRoutes(fastify, resolver);
  registerResolveRoutes(fastify, resolver);
  registerVerificationRoutes(fastify, resolver);
  registerReportRoutes(fastify, resolver);
  registerMappingRoutes(fastify, resolver);

  return fastify;
}

export async function startHttpServer(resolver: TeamResolver, options: HttpServerOptions) {
  const server = await createHttpServer(resolver);

  try {
    await server.listen({ port: options.port, host: options.host });
    console.error(`[http] API server running on http://${options.host}:${options.port}`);
  } catch (err) {
    console.error('[http] Failed to start HTTP server:', err);
    throw err;
  }

  return server;
}
