/**
 * Request schemas and response shapes shared by the HTTP API and the MCP tools.
 */

import { z } from 'zod';
import type { LearnedStrategyName } from '@team-identity/shared/types';

export const MAX_BATCH_SIZE = 100;

const ContextSchema = z.string().nullable().optional();

// Non-string candidates are accepted here and dropped by the resolver
export const ResolveBodySchema = z.object({
  sourceName: z.string(),
  candidates: z.array(z.unknown()),
  context: ContextSchema,
});

export const ResolveBatchBodySchema = z.object({
  requests: z.array(ResolveBodySchema).min(1).max(MAX_BATCH_SIZE),
});

const TeamsSchema = z.object({
  homeTeam: z.string(),
  awayTeam: z.string(),
});

export const PairFixtureBodySchema = z.object({
  fixture: TeamsSchema,
  events: z.array(TeamsSchema.passthrough()),
  context: ContextSchema,
});

export const VerifyBodySchema = z.object({
  sourceName: z.string().min(1),
  matchedName: z.string().min(1),
  accepted: z.boolean(),
  context: ContextSchema,
});

export const ReportQuerySchema = z.object({
  days: z.coerce.number().int().positive().max(365).optional(),
});

export const LearnedMappingsQuerySchema = z.object({
  verified: z
    .enum(['true', 'false'])
    .transform((value) => value === 'true')
    .optional(),
  limit: z.coerce.number().int().positive().max(1000).optional(),
});

export type ResolveBody = z.infer<typeof ResolveBodySchema>;
export type VerifyBody = z.infer<typeof VerifyBodySchema>;

/**
 * Flatten zod issues into "path: message" lines.
 */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`);
}

// ============================================================================
// Response Types
// ============================================================================

export interface HealthResponse {
  status: 'ok';
  timestamp: string;
  manualMappings: number;
  learnedMappings: number;
}

export interface LearnedMappingResponse {
  sourceName: string;
  matchedName: string;
  confidence: number;
  strategyUsed: LearnedStrategyName;
  createdAt: string;
  verified: boolean;
  context: string | null;
}

export interface ErrorResponse {
  error: string;
  issues?: string[];
}
