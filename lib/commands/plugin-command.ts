import { BaseCommand, CommandContext, CommandKind, CommandOption, OptionValues } from './command';

/**
 * A command as a site plugin may declare it in the configuration
 */
export interface PluginCommandSpec {
  readonly name: string;
  readonly purpose?: string;
  /**
   * @default true
   */
  readonly needsConfig?: boolean;
  readonly usage?: string;
  readonly options?: CommandOption[];
  execute(ctx: CommandContext, options: OptionValues, args: string[]): void | number | Promise<void | number>;
}

export class PluginCommand extends BaseCommand {
  public readonly name: string = '';
  public readonly purpose: string = '';
  public readonly kind: CommandKind = 'plugin';
  public readonly needsConfig: boolean = true;
  public readonly usage: string = '';

  constructor(private readonly spec: PluginCommandSpec) {
    super();
    this.name = spec.name;
    this.purpose = spec.purpose ?? '';
    this.needsConfig = spec.needsConfig ?? true;
    this.usage = spec.usage ?? '';
  }

  public get options(): CommandOption[] {
    return this.spec.options ?? [];
  }

  public async execute(ctx: CommandContext, options: OptionValues, args: string[]): Promise<number> {
    const ret = await this.spec.execute(ctx, options, args);
    return typeof ret === 'number' ? ret : 0;
  }
}

export function isPluginCommandSpec(x: unknown): x is PluginCommandSpec {
  return typeof x === 'object' && x !== null
    && 'name' in x && typeof x.name === 'string'
    && 'execute' in x && typeof x.execute === 'function';
}
