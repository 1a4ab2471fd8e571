import type { ITaskEngine } from '../engine/engine';
import type { Site } from '../site';
import type { TaskLoader } from '../task-loader';
import type { OutputStream } from '../util/streams';
import type { CommandRegistry } from './registry';

export type OptionType = 'boolean' | 'string' | 'number';
export type OptionValue = boolean | string | number;

export interface CommandOption {
  /**
   * Key under which the parsed value is passed to the command
   */
  readonly name: string;
  readonly long: string;
  readonly short?: string;
  readonly type: OptionType;
  readonly default: OptionValue;
  readonly help: string;
}

/**
 * Where a command came from
 *
 * - engine: generic commands of the task engine
 * - meta: help, version and init
 * - plugin: supplied by the site
 */
export type CommandKind = 'engine' | 'meta' | 'plugin';

export type OptionValues = Readonly<Record<string, OptionValue | undefined>>;

export interface CommandContext {
  readonly site: Site;
  readonly registry: CommandRegistry;
  readonly loader: TaskLoader;
  readonly engine: ITaskEngine;
  /**
   * Project directory
   */
  readonly cwd: string;
  readonly out: OutputStream;
}

export interface Command {
  readonly name: string;
  /**
   * One line describing what the command does
   */
  readonly purpose: string;
  readonly kind: CommandKind;
  /**
   * Whether the command refuses to run outside a configured site
   */
  readonly needsConfig: boolean;
  /**
   * Positional arguments, for usage output
   */
  readonly usage: string;
  readonly options: CommandOption[];
  /**
   * Whether unknown options are an error
   */
  readonly strictOptions: boolean;

  /**
   * Run the command, returns the process exit code
   */
  execute(ctx: CommandContext, options: OptionValues, args: string[]): Promise<number>;
}

export abstract class BaseCommand implements Command {
  public abstract readonly name: string;
  public abstract readonly purpose: string;
  public readonly kind: CommandKind = 'plugin';
  public readonly needsConfig: boolean = true;
  public readonly usage: string = '';
  public readonly strictOptions: boolean = true;

  public get options(): CommandOption[] {
    return [];
  }

  public abstract execute(ctx: CommandContext, options: OptionValues, args: string[]): Promise<number>;
}

export function flag(options: OptionValues, name: string): boolean {
  return options[name] === true;
}
