import { InvalidArgumentError } from 'commander';
import { loadConfigOrExit, type ResolverConfig } from '../config.js';
import { TeamResolver } from '../matching/resolver.js';
import { createMappingStore } from '../store/index.js';
import { createAlerter } from '../utils/alerting.js';

export interface StoreOption {
  memory?: boolean;
}

export function loadCliConfig(options: StoreOption = {}): ResolverConfig {
  return loadConfigOrExit(options.memory ? { ...process.env, MAPPING_STORE: 'memory' } : process.env);
}

/**
 * Run a command against a freshly loaded resolver and release it afterwards.
 * Alerts raised during the command set the process exit code.
 */
export async function withResolver<T>(
  options: StoreOption,
  task: (resolver: TeamResolver, config: ResolverConfig) => Promise<T>
): Promise<T> {
  const config = loadCliConfig(options);
  const alerter = createAlerter({ discordWebhookUrl: config.discordWebhookUrl });
  const resolver = await TeamResolver.create({
    store: createMappingStore(config),
    overrideFile: config.manualMappingsFile,
    learnMappings: config.learnMappings,
    defaultReportDays: config.reportWindowDays,
    alerter,
  });

  try {
    return await task(resolver, config);
  } finally {
    await resolver.close();
    if (alerter.hasErrors()) {
      process.exitCode = alerter.getExitCode();
    }
  }
}

export function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}
