import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { describeIssues, ReportQuerySchema, ResolveBodySchema, VerifyBodySchema } from '../api-types.js';
import type { TeamResolver } from '../matching/resolver.js';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export function createTools(): Tool[] {
  return [
    {
      name: 'resolve_team',
      description:
        'Resolve a team name from one data provider to the matching name in another provider\'s list. Returns the match, confidence, the strategy that found it and up to 3 alternatives.',
      inputSchema: {
        type: 'object',
        properties: {
          sourceName: {
            type: 'string',
            description: 'Team name as written by the first provider (e.g., "FC Barcelona")',
          },
          candidates: {
            type: 'array',
            items: { type: 'string' },
            description: 'Team names offered by the second provider',
          },
          context: {
            type: 'string',
            description: 'Optional competition or grouping key (e.g., "La Liga")',
          },
        },
        required: ['sourceName', 'candidates'],
      },
    },
    {
      name: 'verify_mapping',
      description:
        'Confirm or reject a resolved mapping. Confirmed mappings are reused on later lookups; rejected ones are forgotten.',
      inputSchema: {
        type: 'object',
        properties: {
          sourceName: { type: 'string', description: 'Provider team name that was resolved' },
          matchedName: { type: 'string', description: 'Name it was resolved to' },
          accepted: { type: 'boolean', description: 'true to confirm, false to reject' },
          context: { type: 'string', description: 'Optional competition or grouping key' },
        },
        required: ['sourceName', 'matchedName', 'accepted'],
      },
    },
    {
      name: 'mapping_report',
      description:
        'Summarize recent resolution attempts: success rate, per-strategy performance, the most frequent failures and recent successes.',
      inputSchema: {
        type: 'object',
        properties: {
          days: { type: 'number', description: 'Window in days (default 7)' },
        },
      },
    },
  ];
}

function textResult(value: unknown, isError = false): ToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(value, null, 2) }],
    ...(isError ? { isError } : {}),
  };
}

export async function handleToolCall(
  resolver: TeamResolver,
  name: string,
  args: Record<string, unknown>
): Promise<ToolResult> {
  try {
    switch (name) {
      case 'resolve_team': {
        const parsed = ResolveBodySchema.safeParse(args);
        if (!parsed.success) {
          return textResult({ error: 'Invalid arguments', issues: describeIssues(parsed.error) }, true);
        }
        const { sourceName, candidates, context } = parsed.data;
        return textResult(await resolver.resolve(sourceName, candidates, context ?? null));
      }
      case 'verify_mapping': {
        const parsed = VerifyBodySchema.safeParse(args);
        if (!parsed.success) {
          return textResult({ error: 'Invalid arguments', issues: describeIssues(parsed.error) }, true);
        }
        return textResult(await resolver.verify({ ...parsed.data, context: parsed.data.context ?? null }));
      }
      case 'mapping_report': {
        const parsed = ReportQuerySchema.safeParse(args);
        if (!parsed.success) {
          return textResult({ error: 'Invalid arguments', issues: describeIssues(parsed.error) }, true);
        }
        return textResult(await resolver.report(parsed.data.days));
      }
      default:
        return textResult({ error: `Unknown tool: ${name}` }, true);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    return textResult({ error: message }, true);
  }
}
