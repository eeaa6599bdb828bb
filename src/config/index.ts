import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

const configSchema = z.object({
  client: z.object({
    bin: z.string().min(1, 'Client binary is required').default('mariadb'),
    args: z.string().default(''),
    promptPattern: z.string().min(1).default('MariaDB \\[.*\\]>[ \\t]')
      .refine(isValidPattern, { message: 'Invalid prompt pattern' }),
    startupTimeoutMs: z.number().int().min(-1).default(30_000),
    statementTimeoutMs: z.number().int().min(-1).default(-1),
    terminateGraceMs: z.number().int().nonnegative().default(3_000),
    scratchDir: z.string().min(1).default(process.cwd()),
  }),

  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    pretty: z.boolean(),
  }),
});

export type Config = z.infer<typeof configSchema>;

function parseEnvInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  // NaN is left for the schema to reject
  return Number(value);
}

export function readConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    client: {
      bin: env.MARIADB_CLIENT_BIN,
      args: env.MARIADB_CLIENT_ARGS,
      promptPattern: env.MARIADB_PROMPT_PATTERN,
      startupTimeoutMs: parseEnvInt(env.MARIADB_STARTUP_TIMEOUT_MS),
      statementTimeoutMs: parseEnvInt(env.MARIADB_STATEMENT_TIMEOUT_MS),
      terminateGraceMs: parseEnvInt(env.MARIADB_TERMINATE_GRACE_MS),
      scratchDir: env.MARIADB_SCRATCH_DIR,
    },
    logging: {
      level: env.LOG_LEVEL,
      pretty: env.LOG_PRETTY !== undefined
        ? env.LOG_PRETTY === 'true'
        : env.NODE_ENV !== 'production',
    },
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return result.data;
}

function loadConfig(): Config {
  try {
    return readConfig();
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.error('Configuration validation failed:');
    for (const issue of err.issues) {
      console.error(`  - ${issue}`);
    }
    process.exit(1);
  }
}

export const config = loadConfig();
