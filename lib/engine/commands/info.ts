import * as log from '../../util/log';
import { BaseCommand, CommandContext, CommandKind, OptionValues } from '../../commands/command';
import { describeTask } from '../task';

export class InfoCommand extends BaseCommand {
  public readonly name: string = 'info';
  public readonly purpose: string = 'show info about a task';
  public readonly kind: CommandKind = 'engine';
  public readonly usage: string = 'TASK';

  public async execute(ctx: CommandContext, _options: OptionValues, args: string[]): Promise<number> {
    if (args.length !== 1) {
      log.error('info: expects exactly one task name');
      return 3;
    }

    const { tasks } = await ctx.loader.load();
    const task = tasks.find(t => t.name === args[0]);
    if (!task) {
      log.error(`"${args[0]}" is not a task`);
      return 3;
    }

    for (const line of describeTask(task)) {
      ctx.out.write(`${line}\n`);
    }
    const upToDate = await ctx.engine.isUpToDate(task);
    ctx.out.write(`\n  status: ${upToDate ? 'up-to-date' : 'run'}\n`);
    return 0;
  }
}
