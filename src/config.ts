import { parseArgs } from 'node:util';
import { z } from 'zod';
import { describeIssues } from './domain/schemas';

const flag = z
  .enum(['1', '0', 'true', 'false', 'yes', 'no', ''])
  .transform((v) => v === '1' || v === 'true' || v === 'yes');

const configSchema = z.object({
  dbPath: z.string().min(1, 'database path cannot be empty').default('finance.db'),
  backupDir: z.string().min(1).default('.'),
  debug: flag.default('0'),
});

export type Config = z.infer<typeof configSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Merges `--db` with FINANCE_* environment variables. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, argv: string[] = process.argv.slice(2)): Config {
  let dbFlag: string | undefined;
  try {
    const { values } = parseArgs({ args: argv, options: { db: { type: 'string' } }, strict: true });
    dbFlag = values.db;
  } catch (e) {
    throw new ConfigError(e instanceof Error ? e.message : String(e));
  }

  const result = configSchema.safeParse({
    dbPath: dbFlag ?? env.FINANCE_DB_PATH,
    backupDir: env.FINANCE_BACKUP_DIR,
    debug: env.FINANCE_DEBUG?.toLowerCase(),
  });
  if (!result.success) throw new ConfigError(`Invalid configuration: ${describeIssues(result.error)}`);
  return result.data;
}
