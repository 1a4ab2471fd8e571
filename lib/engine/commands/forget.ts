import { BaseCommand, CommandContext, CommandKind, OptionValues } from '../../commands/command';

export class ForgetCommand extends BaseCommand {
  public readonly name: string = 'forget';
  public readonly purpose: string = 'clear successful run status from internal DB';
  public readonly kind: CommandKind = 'engine';
  public readonly usage: string = '[TASK ...]';

  public async execute(ctx: CommandContext, _options: OptionValues, args: string[]): Promise<number> {
    const { tasks, config } = await ctx.loader.load();
    return ctx.engine.forget(tasks, config, args);
  }
}
