import { Command } from 'commander';
import chalk from 'chalk';
import * as out from '../output.js';
import { $try } from '../helpers.js';
import type { ServiceContext } from '../helpers.js';

export function createStatsCommand(context: ServiceContext): Command {
  return new Command('stats')
    .description('Show task counts by status and the number overdue')
    .action((_opts: unknown, cmd: Command) => $try(() => {
      console.log(chalk.bold.underline('Tasks'));
      out.printStatistics(context.get(cmd).getTaskStatistics());
    }));
}

export function createOverdueCommand(context: ServiceContext): Command {
  return new Command('overdue')
    .description('List tasks past their due date that are not completed')
    .action((_opts: unknown, cmd: Command) => $try(() => {
      out.printTasks(context.get(cmd).getOverdueTasks(), 'No overdue tasks');
    }));
}

export function createStatusesCommand(context: ServiceContext): Command {
  return new Command('statuses')
    .description('List the valid task statuses')
    .action((_opts: unknown, cmd: Command) => $try(() => {
      for (const status of context.get(cmd).getValidStatuses()) {
        console.log(out.formatStatus(status));
      }
    }));
}
