import { CleanCommand } from '../engine/commands/clean';
import { ForgetCommand } from '../engine/commands/forget';
import { InfoCommand } from '../engine/commands/info';
import { ListCommand } from '../engine/commands/list';
import { RunCommand } from '../engine/commands/run';
import { DoitAutoCommand } from './auto';
import { BuildCommand } from './build';
import { SiteCleanCommand } from './clean';
import { Command } from './command';
import { HelpCommand } from './help';
import { InitCommand } from './init';
import { CommandRegistry } from './registry';
import { VersionCommand } from './version';

export function engineCommands(): Command[] {
  return [new RunCommand(), new CleanCommand(), new ListCommand(), new InfoCommand(), new ForgetCommand()];
}

export function siteCommands(): Command[] {
  return [new BuildCommand(), new SiteCleanCommand(), new DoitAutoCommand()];
}

export function metaCommands(): Command[] {
  return [new HelpCommand(), new VersionCommand(), new InitCommand()];
}

/**
 * All commands, later groups replacing earlier ones by name
 */
export function buildRegistry(pluginCommands: Command[]): CommandRegistry {
  return new CommandRegistry(
    ...engineCommands(),
    ...siteCommands(),
    ...metaCommands(),
    ...pluginCommands);
}
