import { z } from 'zod';
import type { DatabaseConfig, SnapshotSource } from '../types/index.js';
import { ConfigError, DuplicateLabelError } from '../utils/errors.js';

export type Env = Record<string, string | undefined>;

const dbCountSchema = z.string().default('1').transform(Number).pipe(z.number().int().nonnegative());

const dbConfigSchema = z.object({
  host: z.string().default('localhost'),
  port: z.string().default('5432').transform(Number).pipe(z.number().int().min(1).max(65535)),
  user: z.string().default('postgres'),
  password: z.string().default('password'),
  database: z.string().default('postgres'),
  schema: z.string().default('public'),
  label: z.string().min(1).optional(),
});

/**
 * Reads `DB_COUNT` databases from the environment. Every setting of database `i`
 * (1-based) is overridable through `PG_DRIFT_DB_<SETTING>_<i>`.
 */
export function loadDatabaseConfigs(env: Env = process.env): DatabaseConfig[] {
  const count = dbCountSchema.safeParse(env.DB_COUNT);
  if (!count.success) {
    throw new ConfigError(count.error.issues.map(issue => ({ ...issue, path: ['DB_COUNT', ...issue.path] })));
  }

  const configs: DatabaseConfig[] = [];
  const labels = new Set<string>();

  for (let i = 1; i <= count.data; i++) {
    const parsed = dbConfigSchema.safeParse({
      host: env[`PG_DRIFT_DB_HOST_${i}`],
      port: env[`PG_DRIFT_DB_PORT_${i}`],
      user: env[`PG_DRIFT_DB_USER_${i}`],
      password: env[`PG_DRIFT_DB_PASSWORD_${i}`],
      database: env[`PG_DRIFT_DB_NAME_${i}`],
      schema: env[`PG_DRIFT_DB_SCHEMA_${i}`],
      label: env[`PG_DRIFT_DB_LABEL_${i}`],
    });

    if (!parsed.success) {
      throw new ConfigError(parsed.error.issues.map(issue => ({ ...issue, path: [`db${i}`, ...issue.path] })));
    }

    const { label, ...connection } = parsed.data;
    const resolvedLabel = label ?? `db${i}_${connection.database}`;
    if (labels.has(resolvedLabel)) throw new DuplicateLabelError(resolvedLabel);
    labels.add(resolvedLabel);

    configs.push({ ...connection, label: resolvedLabel });
  }

  return configs;
}

const sourceArgSchema = z
  .string()
  .regex(/^[^=]+=.+$/, 'expected label=path')
  .transform((arg): SnapshotSource => {
    const separator = arg.indexOf('=');
    return { label: arg.slice(0, separator), sourceId: arg.slice(separator + 1) };
  });

/** Parses `label=path` command line arguments, keeping their order. */
export function parseSnapshotSources(args: readonly string[]): SnapshotSource[] {
  const parsed = z.array(sourceArgSchema).safeParse(args);
  if (!parsed.success) throw new ConfigError(parsed.error.issues);

  const labels = new Set<string>();
  for (const { label } of parsed.data) {
    if (labels.has(label)) throw new DuplicateLabelError(label);
    labels.add(label);
  }

  return parsed.data;
}
