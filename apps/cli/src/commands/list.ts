import { Command } from 'commander';
import chalk from 'chalk';
import * as out from '../output.js';
import { parseIntOption, $try } from '../helpers.js';
import type { GlobalOptions, ServiceContext } from '../helpers.js';

export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;

type ListOptions = GlobalOptions & {
  search?: string;
  status?: string;
  page: number;
  pageSize: number;
};

export function createListCommand(context: ServiceContext): Command {
  return new Command('list')
    .description('List tasks, latest due first')
    .option('-s, --search <term>', 'Match case number, title or description')
    .option('--status <status>', 'Only tasks with this status')
    .option('-p, --page <n>', 'Page number (1-based)', parseIntOption, 1)
    .option('-n, --page-size <n>', `Tasks per page (1-${MAX_PAGE_SIZE})`, parseIntOption, DEFAULT_PAGE_SIZE)
    .action((_opts: unknown, cmd: Command) => $try(() => {
      const g = cmd.optsWithGlobals<ListOptions>();
      const service = context.get(cmd);

      const page = g.page < 1 ? 1 : g.page;
      const pageSize = g.pageSize < 1 || g.pageSize > MAX_PAGE_SIZE ? DEFAULT_PAGE_SIZE : g.pageSize;

      const tasks = service.searchTasks(g.search, g.status, (page - 1) * pageSize, pageSize);
      const total = service.countFilteredTasks(g.search, g.status);
      const totalPages = Math.ceil(total / pageSize);

      out.printTasks(tasks, 'No tasks found');
      if (total > 0) {
        console.log(chalk.dim(`Page ${page} of ${totalPages} (${total} task${total === 1 ? '' : 's'})`));
      }
    }));
}
