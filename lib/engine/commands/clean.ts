import { BaseCommand, CommandContext, CommandKind, CommandOption, flag, OptionValues } from '../../commands/command';
import { ExecutionConfig, Task } from '../task';

/**
 * Removes the targets of tasks and forgets that they ran
 */
export class CleanCommand extends BaseCommand {
  public readonly name: string = 'clean';
  public readonly purpose: string = 'clean action / remove targets';
  public readonly kind: CommandKind = 'engine';
  public readonly usage: string = '[TASK ...]';

  public get options(): CommandOption[] {
    return [
      {
        name: 'dryrun',
        long: 'dry-run',
        short: 'n',
        type: 'boolean',
        default: false,
        help: 'Print actions without really executing them.',
      },
    ];
  }

  public async execute(ctx: CommandContext, options: OptionValues, args: string[]): Promise<number> {
    const { tasks, config } = await ctx.loader.load();
    return this.cleanTasks(ctx, tasks, config, args, flag(options, 'dryrun'));
  }

  protected cleanTasks(ctx: CommandContext, tasks: Task[], config: ExecutionConfig, selection: string[], dryRun: boolean): Promise<number> {
    return ctx.engine.clean(tasks, config, selection, { dryRun, out: ctx.out });
  }
}
