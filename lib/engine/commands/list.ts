import { compareStrings } from '../../util/flow';
import { BaseCommand, CommandContext, CommandKind, CommandOption, flag, OptionValues } from '../../commands/command';

export class ListCommand extends BaseCommand {
  public readonly name: string = 'list';
  public readonly purpose: string = 'list tasks';
  public readonly kind: CommandKind = 'engine';

  public get options(): CommandOption[] {
    return [
      {
        name: 'all',
        long: 'all',
        type: 'boolean',
        default: false,
        help: 'list include all sub-tasks.',
      },
    ];
  }

  public async execute(ctx: CommandContext, options: OptionValues): Promise<number> {
    const { tasks } = await ctx.loader.load();
    const shown = tasks
      .filter(t => flag(options, 'all') || t.subtaskOf === undefined)
      .sort((a, b) => compareStrings(a.name, b.name));

    const width = Math.max(0, ...shown.map(t => t.name.length));
    for (const task of shown) {
      ctx.out.write(task.doc ? `${task.name.padEnd(width)}   ${task.doc}\n` : `${task.name}\n`);
    }
    return 0;
  }
}
