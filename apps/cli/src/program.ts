import { Command } from 'commander';
import { ServiceContext } from './helpers.js';
import { createServeCommand, onProcessSignals } from './commands/serve.js';
import type { ShutdownRegistrar } from './commands/serve.js';
import { createListCommand } from './commands/list.js';
import { createGetCommand } from './commands/get.js';
import { createStatusCommand } from './commands/status.js';
import { createStatsCommand, createOverdueCommand, createStatusesCommand } from './commands/reports.js';

export interface ProgramDeps {
  context?: ServiceContext;
  registerShutdown?: ShutdownRegistrar;
}

/** Build the `caseflow` program */
export function createProgram(deps: ProgramDeps = {}): Command {
  const context = deps.context ?? new ServiceContext();

  const program = new Command()
    .name('caseflow')
    .description('Caseworker task tracking: REST API server and store inspection')
    .version('1.0.0')
    .option('--db <path>', 'SQLite database file (env CASEFLOW_DB_PATH)');

  program.addCommand(createServeCommand(deps.registerShutdown ?? onProcessSignals));
  program.addCommand(createListCommand(context));
  program.addCommand(createGetCommand(context));
  program.addCommand(createStatusCommand(context));
  program.addCommand(createStatsCommand(context));
  program.addCommand(createOverdueCommand(context));
  program.addCommand(createStatusesCommand(context));

  return program;
}
