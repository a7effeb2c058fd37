import { Command } from 'commander';
import { withResolver, type StoreOption } from '../runtime.js';

interface VerifyOptions extends StoreOption {
  accept?: boolean;
  reject?: boolean;
  context?: string;
}

export const verifyCommand = new Command('verify')
  .description('Confirm or reject a mapping')
  .argument('<source>', 'Team name that was resolved')
  .argument('<matched>', 'Name it was resolved to')
  .option('--accept', 'Confirm the mapping')
  .option('--reject', 'Reject the mapping')
  .option('--context <context>', 'Competition or grouping key')
  .option('--memory', 'Use the in-memory store')
  .action(async (source: string, matched: string, options: VerifyOptions) => {
    if (Boolean(options.accept) === Boolean(options.reject)) {
      console.error('Specify exactly one of --accept or --reject');
      process.exitCode = 1;
      return;
    }

    await withResolver(options, async (resolver) => {
      const outcome = await resolver.verify({
        sourceName: source,
        matchedName: matched,
        accepted: Boolean(options.accept),
        context: options.context ?? null,
      });
      console.log(`${outcome.sourceName} -> ${outcome.matchedName}: ${outcome.decision}`);
      if (outcome.decision === 'rejected') {
        console.log(`  removed ${outcome.removed} learned mapping(s)`);
      }
      console.log(`  learned mappings: ${outcome.learnedMappingsCount}`);
    });
  });
