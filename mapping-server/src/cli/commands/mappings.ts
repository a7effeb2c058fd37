import { Command } from 'commander';
import { OverrideFileUnreadableError } from '../../errors.js';
import { BUILTIN_MAPPINGS_FILE, readMappingFile } from '../../knowledge/manual-mappings.js';
import { parsePositiveInt, withResolver, type StoreOption } from '../runtime.js';

export interface OverrideCheck {
  entries: number;
  added: string[];
  /** Built-in keys the file maps to a different name */
  replaced: string[];
  /** Entries identical to the built-in table */
  redundant: string[];
}

/**
 * Validate an override file and compare it with the built-in table.
 * Throws OverrideFileUnreadableError when the file cannot be used.
 */
export async function checkOverrideFile(
  path: string,
  builtinPath: string = BUILTIN_MAPPINGS_FILE
): Promise<OverrideCheck> {
  const [override, builtin] = await Promise.all([readMappingFile(path), readMappingFile(builtinPath)]);
  const check: OverrideCheck = { entries: 0, added: [], replaced: [], redundant: [] };

  for (const [sourceName, canonicalName] of Object.entries(override)) {
    check.entries++;
    const existing = builtin[sourceName];
    if (existing === undefined) {
      check.added.push(sourceName);
    } else if (existing === canonicalName) {
      check.redundant.push(sourceName);
    } else {
      check.replaced.push(sourceName);
    }
  }

  return check;
}

interface LearnedOptions extends StoreOption {
  verified?: boolean;
  unverified?: boolean;
  limit?: number;
}

export const mappingsCommand = new Command('mappings')
  .description('Inspect mapping tables');

mappingsCommand
  .command('learned')
  .description('List learned mappings, most recent first')
  .option('--verified', 'Only operator-verified mappings')
  .option('--unverified', 'Only mappings not yet verified')
  .option('-l, --limit <n>', 'Maximum rows', parsePositiveInt, 50)
  .option('--memory', 'Use the in-memory store')
  .action(async (options: LearnedOptions) => {
    const verified = options.verified ? true : options.unverified ? false : undefined;

    await withResolver(options, async (resolver) => {
      const mappings = await resolver.listLearnedMappings({ verified, limit: options.limit });
      if (mappings.length === 0) {
        console.log('No learned mappings.');
        return;
      }
      for (const m of mappings) {
        const flags = [m.strategyUsed, m.confidence.toFixed(2), m.verified ? 'verified' : null, m.context]
          .filter((flag): flag is string => Boolean(flag))
          .join(', ');
        console.log(`  ${m.sourceName} -> ${m.matchedName} (${flags})`);
      }
    });
  });

mappingsCommand
  .command('check')
  .description('Validate a manual mappings override file')
  .argument('<file>', 'Path to the JSON file')
  .action(async (file: string) => {
    try {
      const check = await checkOverrideFile(file);
      console.log(`${file}: ${check.entries} entries`);
      console.log(`  new:       ${check.added.length}`);
      console.log(`  replacing: ${check.replaced.length}${check.replaced.length ? ` (${check.replaced.join(', ')})` : ''}`);
      console.log(`  redundant: ${check.redundant.length}`);
    } catch (error) {
      if (error instanceof OverrideFileUnreadableError) {
        console.error(error.message);
        process.exitCode = 1;
        return;
      }
      throw error;
    }
  });
