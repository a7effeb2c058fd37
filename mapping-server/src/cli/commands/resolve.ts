import { Command } from 'commander';
import type { MatchResult } from '@team-identity/shared/types';
import { withResolver, type StoreOption } from '../runtime.js';

interface ResolveOptions extends StoreOption {
  candidates: string[];
  context?: string;
  json?: boolean;
}

export function formatMatchResult(result: MatchResult): string[] {
  const lines = [
    result.matchFound
      ? `${result.sourceName} -> ${result.matchedName}`
      : `${result.sourceName} -> (no match)`,
    `  strategy:   ${result.strategyUsed}`,
    `  confidence: ${result.confidence.toFixed(3)}`,
  ];
  if (result.alternatives.length > 0) {
    lines.push(`  alternatives: ${result.alternatives.join(', ')}`);
  }
  lines.push(`  elapsed:    ${result.elapsedMs.toFixed(2)}ms`);
  return lines;
}

export const resolveCommand = new Command('resolve')
  .description('Resolve a team name against candidate names')
  .argument('<name>', 'Team name from the first provider')
  .requiredOption('-c, --candidates <names...>', 'Team names from the second provider')
  .option('--context <context>', 'Competition or grouping key')
  .option('--json', 'Print the result as JSON')
  .option('--memory', 'Use the in-memory store')
  .action(async (name: string, options: ResolveOptions) => {
    await withResolver(options, async (resolver) => {
      const result = await resolver.resolve(name, options.candidates, options.context ?? null);
      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
      } else {
        console.log(formatMatchResult(result).join('\n'));
      }
    });
  });
