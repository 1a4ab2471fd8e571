import { BaseCommand, CommandContext, CommandKind, CommandOption, flag, OptionValues } from '../../commands/command';

export class RunCommand extends BaseCommand {
  public readonly name: string = 'run';
  public readonly purpose: string = 'run tasks';
  public readonly kind: CommandKind = 'engine';
  public readonly usage: string = '[TASK ...]';

  public get options(): CommandOption[] {
    return [
      {
        name: 'always',
        long: 'always-execute',
        short: 'a',
        type: 'boolean',
        default: false,
        help: 'Always execute tasks even if up-to-date.',
      },
    ];
  }

  public async execute(ctx: CommandContext, options: OptionValues, args: string[]): Promise<number> {
    const { tasks, config } = await ctx.loader.load();
    return ctx.engine.run(tasks, config, args, { alwaysExecute: flag(options, 'always') });
  }
}
