import { Command } from 'commander';
import * as out from '../output.js';
import { parseTaskId, $try } from '../helpers.js';
import type { ServiceContext } from '../helpers.js';

export function createGetCommand(context: ServiceContext): Command {
  return new Command('get')
    .description('Show a task by id or case number')
    .argument('<ref>', 'Task id, or a case number such as TASK000001')
    .action((ref: string, _opts: unknown, cmd: Command) => $try(() => {
      const service = context.get(cmd);
      const task = /^task/i.test(ref.trim())
        ? service.getTaskByCaseNumber(ref.trim().toUpperCase())
        : service.getTaskById(parseTaskId(ref));
      out.printTask(task);
    }));
}
