import { printVersion } from '../version';
import { BaseCommand, CommandContext, CommandKind } from './command';

export class VersionCommand extends BaseCommand {
  public readonly name: string = 'version';
  public readonly purpose: string = 'print the Nikola version number';
  public readonly kind: CommandKind = 'meta';
  public readonly needsConfig: boolean = false;

  public async execute(ctx: CommandContext): Promise<number> {
    printVersion(ctx.out);
    return 0;
  }
}
