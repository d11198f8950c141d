import { Command } from 'commander';
import * as out from '../output.js';
import { parseTaskId, $try } from '../helpers.js';
import type { ServiceContext } from '../helpers.js';

export function createStatusCommand(context: ServiceContext): Command {
  return new Command('status')
    .description('Set the status of a task')
    .argument('<taskId>', 'The id of the task')
    .argument('<status>', 'PENDING, IN_PROGRESS, COMPLETED, CANCELLED or ON_HOLD (any case)')
    .action((taskId: string, status: string, _opts: unknown, cmd: Command) => $try(() => {
      const task = context.get(cmd).updateTaskStatus(parseTaskId(taskId), status);
      out.success(`${task.caseNumber} is now ${task.status}`);
    }));
}
