/**
 * CLI helpers: store access, argument parsing, error handling.
 */

import type { Command } from 'commander';
import { InvalidArgumentError as InvalidOptionError } from 'commander';
import {
  createDb, SqliteTaskRepository, TaskService, InvalidArgumentError, isCaseflowError,
} from '@caseflow/core';
import type { CaseflowDb, TaskId } from '@caseflow/core';
import { ConfigError, loadConfig } from '@caseflow/api';
import * as out from './output.js';

/** Options registered on the root program */
export type GlobalOptions = {
  db?: string;
};

export interface Store {
  db: CaseflowDb;
  service: TaskService;
}

/** Open the SQLite store at `dbPath` and wire a service over it */
export function openStore(dbPath: string): Store {
  const db = createDb(dbPath);
  return { db, service: new TaskService(new SqliteTaskRepository(db)) };
}

export type ServiceOpener = (dbPath: string | undefined) => TaskService;

/** Default opener: `--db`, then CASEFLOW_DB_PATH, then the platform default */
export const openConfiguredService: ServiceOpener = (dbPath) => {
  const config = loadConfig(process.env, dbPath === undefined ? {} : { dbPath });
  return openStore(config.dbPath).service;
};

/**
 * Lazily opened service shared by the inspection commands. The store is only
 * opened once a command runs, after `--db` has been parsed.
 */
export class ServiceContext {
  private service: TaskService | null = null;

  constructor(private readonly open: ServiceOpener = openConfiguredService) {}

  get(cmd: Command): TaskService {
    this.service ??= this.open(cmd.optsWithGlobals<GlobalOptions>().db);
    return this.service;
  }
}

/**
 * Parse a task id argument.
 */
export function parseTaskId(raw: string): TaskId {
  if (!/^\d+$/.test(raw.trim())) throw new InvalidArgumentError(`Invalid task id: '${raw}'`);
  return Number(raw.trim());
}

/**
 * commander option parser for integer values.
 */
export function parseIntOption(value: string): number {
  if (!/^[+-]?\d+$/.test(value.trim())) throw new InvalidOptionError('Not an integer.');
  return Number(value.trim());
}

function report(err: unknown): void {
  if (isCaseflowError(err) || err instanceof ConfigError) {
    out.error(err.message);
    process.exitCode = 1;
    return;
  }
  throw err;
}

/**
 * Wrap a command action with error handling. Domain and configuration errors
 * are printed and set a failing exit code; anything else propagates.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    report(err);
  }
}

export async function $tryAsync(fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err: unknown) {
    report(err);
  }
}
