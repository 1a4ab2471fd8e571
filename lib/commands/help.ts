import * as log from '../util/log';
import { describeTask } from '../engine/task';
import { BaseCommand, Command, CommandContext, CommandKind, OptionValues } from './command';
import { compareStrings } from '../util/flow';
import { OutputStream } from '../util/streams';

const BANNER = 'Nikola is a tool to create static websites and blogs.';

export class HelpCommand extends BaseCommand {
  public readonly name: string = 'help';
  public readonly purpose: string = 'show help';
  public readonly kind: CommandKind = 'meta';
  public readonly needsConfig: boolean = false;
  public readonly usage: string = '[COMMAND | TASK]';
  // `nikola build --strict --help` ends up here with build's options
  public readonly strictOptions: boolean = false;

  public async execute(ctx: CommandContext, _options: OptionValues, args: string[]): Promise<number> {
    if (args.length === 0) {
      printUsage(ctx.out, ctx.registry.all());
      return 0;
    }

    const command = ctx.registry.lookup(args[0]);
    if (command) {
      printCommandHelp(ctx.out, command);
      return 0;
    }

    const { tasks } = await ctx.loader.load();
    const task = tasks.find(t => t.name === args[0]);
    if (task) {
      for (const line of describeTask(task)) {
        ctx.out.write(`${line}\n`);
      }
      return 0;
    }

    log.error(`Invalid command or task name: "${args[0]}"`);
    return 3;
  }
}

export function printUsage(out: OutputStream, commands: Command[]) {
  // 'run' is the bare engine command, 'build' supersedes it
  const listed = commands
    .filter(c => c.name !== 'run')
    .sort((a, b) => compareStrings(a.name, b.name));

  out.write(`${BANNER}\n\n`);
  out.write('Available commands:\n');
  for (const command of listed) {
    out.write(`  nikola ${command.name.padEnd(20)} ${command.purpose}\n`);
  }
  out.write('\n');
  out.write('  nikola help                 show help / reference\n');
  out.write('  nikola help <command>       show command usage\n');
  out.write('  nikola help <task-name>     show task usage\n');
}

export function printCommandHelp(out: OutputStream, command: Command) {
  const usage = [`nikola ${command.name}`, ...command.options.length > 0 ? ['[options]'] : [], command.usage]
    .filter(s => s !== '')
    .join(' ');

  out.write(`Purpose: ${command.purpose}\n`);
  out.write(`Usage:   ${usage}\n`);

  if (command.options.length > 0) {
    out.write('\nOptions:\n');
    for (const opt of command.options) {
      const spelling = `${opt.short ? `-${opt.short}, ` : ''}--${opt.long}`;
      out.write(`  ${spelling.padEnd(24)} ${opt.help} (default: ${opt.default})\n`);
    }
  }
}
