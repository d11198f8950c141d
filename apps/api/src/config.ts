/**
 * Server configuration from environment variables, validated with zod.
 *
 *   CASEFLOW_PORT       listen port (default 8080, 0 picks a free port)
 *   CASEFLOW_HOST       bind address (default 0.0.0.0)
 *   CASEFLOW_DB_PATH    SQLite file (default: platform data dir)
 *   CASEFLOW_LOG_LEVEL  debug | info | warn | error | silent (default info)
 */

import { z } from 'zod';
import type { ZodError } from 'zod';
import { getDefaultDbPath } from '@caseflow/core';
import type { LogThreshold } from '@caseflow/core';

export interface ApiConfig {
  port: number;
  host: string;
  dbPath: string;
  logLevel: LogThreshold;
}

/** Values that take precedence over the environment, e.g. from CLI flags */
export interface ConfigOverrides {
  port?: string;
  host?: string;
  dbPath?: string;
  logLevel?: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

const envSchema = z.object({
  CASEFLOW_PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(65535).default(8080)),
  CASEFLOW_HOST: z.preprocess(blankToUndefined, z.string().default('0.0.0.0')),
  CASEFLOW_DB_PATH: z.preprocess(blankToUndefined, z.string().optional()),
  CASEFLOW_LOG_LEVEL: z.preprocess(
    blankToUndefined,
    z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  ),
});

function formatZodErrors(error: ZodError): string {
  return error.errors.map(err => `${err.path.join('.')}: ${err.message}`).join('; ');
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: ConfigOverrides = {},
): ApiConfig {
  const result = envSchema.safeParse({
    CASEFLOW_PORT: overrides.port ?? env['CASEFLOW_PORT'],
    CASEFLOW_HOST: overrides.host ?? env['CASEFLOW_HOST'],
    CASEFLOW_DB_PATH: overrides.dbPath ?? env['CASEFLOW_DB_PATH'],
    CASEFLOW_LOG_LEVEL: overrides.logLevel ?? env['CASEFLOW_LOG_LEVEL'],
  });
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatZodErrors(result.error)}`);
  }

  const values = result.data;
  return {
    port: values.CASEFLOW_PORT,
    host: values.CASEFLOW_HOST,
    dbPath: values.CASEFLOW_DB_PATH ?? getDefaultDbPath(),
    logLevel: values.CASEFLOW_LOG_LEVEL,
  };
}
