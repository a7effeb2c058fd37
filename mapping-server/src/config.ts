import { z } from 'zod';
import { ConfigError } from './errors.js';

const DEFAULT_HTTP_PORT = 40411;

// Unset and empty variables are treated alike
const blankToUndefined = (value: unknown) => (value === '' ? undefined : value);

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const EnvSchema = z
  .object({
    DATABASE_URL: z.preprocess(blankToUndefined, z.string().optional()),
    MAPPING_STORE: z.preprocess(blankToUndefined, z.enum(['postgres', 'memory']).default('postgres')),
    MANUAL_MAPPINGS_FILE: z.preprocess(
      blankToUndefined,
      z.string().default('./data/manual_team_mappings.json')
    ),
    LEARN_MAPPINGS: z.preprocess(blankToUndefined, booleanFlag.default('true')),
    HTTP_PORT: z.preprocess(
      blankToUndefined,
      z.coerce.number().int().min(1).max(65535).default(DEFAULT_HTTP_PORT)
    ),
    HTTP_HOST: z.preprocess(blankToUndefined, z.string().default('127.0.0.1')),
    DISCORD_WEBHOOK_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
    REPORT_WINDOW_DAYS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(7)),
  })
  .superRefine((env, ctx) => {
    if (env.MAPPING_STORE === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'required when MAPPING_STORE is postgres',
      });
    }
  });

export type StoreKind = 'postgres' | 'memory';

export interface ResolverConfig {
  store: StoreKind;
  databaseUrl: string | null;
  manualMappingsFile: string;
  learnMappings: boolean;
  http: {
    port: number;
    host: string;
  };
  discordWebhookUrl: string | null;
  reportWindowDays: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ResolverConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  return {
    store: values.MAPPING_STORE,
    databaseUrl: values.DATABASE_URL ?? null,
    manualMappingsFile: values.MANUAL_MAPPINGS_FILE,
    learnMappings: values.LEARN_MAPPINGS,
    http: {
      port: values.HTTP_PORT,
      host: values.HTTP_HOST,
    },
    discordWebhookUrl: values.DISCORD_WEBHOOK_URL ?? null,
    reportWindowDays: values.REPORT_WINDOW_DAYS,
  };
}

/**
 * Load the configuration for an entry point, printing each problem and exiting on failure.
 */
export function loadConfigOrExit(env: NodeJS.ProcessEnv = process.env): ResolverConfig {
  try {
    return loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      for (const issue of error.issues) {
        console.error(`[config] ${issue}`);
      }
      process.exit(1);
    }
    throw error;
  }
}
