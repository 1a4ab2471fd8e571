import yargs = require('yargs');
import { InvalidCommandLineError, ProjectNotConfiguredError, UnknownCommandError } from '../errors';
import { Command, OptionValue, OptionValues } from './command';
import { CommandRegistry } from './registry';

const HELP_SPELLINGS = ['-h', '--help'];
const VERSION_SPELLINGS = ['-V', '--version'];

export interface ResolvedCommand {
  readonly command: Command;
  /**
   * Arguments after the command name
   */
  readonly args: string[];
}

export interface ProjectState {
  readonly configured: boolean;
}

/**
 * Rewrite the raw command line so that it starts with a command name
 *
 * - Nothing at all means `help`.
 * - A help flag anywhere means `help` with the remaining arguments.
 * - Otherwise a version flag anywhere means `version` and nothing else.
 */
export function rewriteArgs(args: string[]): string[] {
  if (args.length === 0) {
    return ['help'];
  }
  if (args.some(a => HELP_SPELLINGS.includes(a))) {
    return ['help', ...args.filter(a => !HELP_SPELLINGS.includes(a))];
  }
  if (args.some(a => VERSION_SPELLINGS.includes(a))) {
    return ['version'];
  }
  return args;
}

/**
 * Find the command that the command line asks for
 *
 * Commands that need a configured project are refused when there is none,
 * before anything else happens.
 */
export function resolveCommand(registry: CommandRegistry, args: string[], project: ProjectState): ResolvedCommand {
  const [name, ...rest] = rewriteArgs(args);

  const command = registry.lookup(name);
  if (!command) {
    throw new UnknownCommandError(name);
  }

  if (command.needsConfig && !project.configured) {
    throw new ProjectNotConfiguredError(name);
  }

  return { command, args: rest };
}

export interface ParsedCommandLine {
  readonly options: OptionValues;
  readonly positional: string[];
}

/**
 * Parse the arguments of a resolved command against the options it declares
 */
export function parseCommandLine(command: Command, args: string[]): ParsedCommandLine {
  const declared: Record<string, yargs.Options> = {};
  for (const opt of command.options) {
    declared[opt.long] = {
      alias: opt.short,
      type: opt.type,
      default: opt.default,
      describe: opt.help,
    };
  }

  let parser = yargs(args)
    .options(declared)
    .parserConfiguration({
      'camel-case-expansion': false,
      'parse-positional-numbers': false,
    })
    .help(false)
    .version(false)
    .exitProcess(false)
    .fail((msg, err) => {
      throw new InvalidCommandLineError(command.name, err?.message ?? msg);
    });
  if (command.strictOptions) {
    parser = parser.strictOptions();
  }

  const argv = parser.parseSync();

  const options: Record<string, OptionValue | undefined> = {};
  for (const opt of command.options) {
    options[opt.name] = optionValue(argv[opt.long]);
  }

  return {
    options,
    positional: argv._.map(x => `${x}`),
  };
}

function optionValue(x: unknown): OptionValue | undefined {
  if (typeof x === 'boolean' || typeof x === 'string' || typeof x === 'number') {
    return x;
  }
  return undefined;
}
