import { confirm, input, select } from '@inquirer/prompts';
import type { TeamResolver } from '../matching/resolver.js';
import { formatMatchResult } from './commands/resolve.js';
import { formatReport } from './commands/report.js';
import { withResolver } from './runtime.js';

type Action = 'resolve' | 'verify' | 'report' | 'exit';

/**
 * Split a comma separated answer into trimmed, non-empty names.
 */
export function parseNameList(answer: string): string[] {
  return answer
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

async function resolveInteractive(resolver: TeamResolver): Promise<void> {
  const name = await input({ message: 'Team name:' });
  const candidates = parseNameList(await input({ message: 'Candidate names (comma separated):' }));
  const context = (await input({ message: 'Context (optional):' })).trim();

  const result = await resolver.resolve(name, candidates, context || null);
  console.log('\n' + formatMatchResult(result).join('\n') + '\n');

  if (!result.matchedName) {
    return;
  }

  const verdict = await select<'skip' | 'accept' | 'reject'>({
    message: `Is "${result.matchedName}" correct?`,
    choices: [
      { name: 'Skip', value: 'skip' },
      { name: 'Yes, remember it', value: 'accept' },
      { name: 'No, forget it', value: 'reject' },
    ],
  });
  if (verdict !== 'skip') {
    await resolver.verify({
      sourceName: result.sourceName,
      matchedName: result.matchedName,
      accepted: verdict === 'accept',
      context: context || null,
    });
  }
}

async function verifyInteractive(resolver: TeamResolver): Promise<void> {
  const sourceName = await input({ message: 'Team name that was resolved:' });
  const matchedName = await input({ message: 'Name it was resolved to:' });
  const accepted = await confirm({ message: 'Is this mapping correct?' });

  const outcome = await resolver.verify({ sourceName, matchedName, accepted, context: null });
  console.log(`\n${outcome.sourceName} -> ${outcome.matchedName}: ${outcome.decision}\n`);
}

async function reportInteractive(resolver: TeamResolver): Promise<void> {
  const days = await input({
    message: 'Window in days:',
    default: String(resolver.defaultReportDays),
    validate: (value) => /^\d+$/.test(value.trim()) && Number(value) > 0 ? true : 'Enter a positive whole number',
  });
  const report = await resolver.report(Number(days));
  console.log('\n' + formatReport(report).join('\n') + '\n');
}

export async function runInteractive(): Promise<void> {
  console.log('\n=== Team Identity ===\n');

  await withResolver({}, async (resolver) => {
    for (;;) {
      const action = await select<Action>({
        message: 'What would you like to do?',
        choices: [
          { name: 'Resolve a team name', value: 'resolve' },
          { name: 'Verify a mapping', value: 'verify' },
          { name: 'Show mapping report', value: 'report' },
          { name: 'Exit', value: 'exit' },
        ],
      });

      if (action === 'exit') {
        return;
      }

      if (action === 'resolve') {
        await resolveInteractive(resolver);
      } else if (action === 'verify') {
        await verifyInteractive(resolver);
      } else {
        await reportInteractive(resolver);
      }
    }
  });
}
