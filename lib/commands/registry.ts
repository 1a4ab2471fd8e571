import * as log from '../util/log';
import { Command } from './command';

/**
 * Commands by name, in registration order
 *
 * Registering a name twice replaces the earlier command: the last one registered wins.
 */
export class CommandRegistry {
  private readonly commands = new Map<string, Command>();

  constructor(...commands: Command[]) {
    this.register(...commands);
  }

  public register(...commands: Command[]) {
    for (const command of commands) {
      const existing = this.commands.get(command.name);
      if (existing) {
        log.debug(`${command.kind} command '${command.name}' replaces ${existing.kind} command`);
      }
      this.commands.set(command.name, command);
    }
  }

  public lookup(name: string): Command | undefined {
    return this.commands.get(name);
  }

  public has(name: string) {
    return this.commands.has(name);
  }

  public get names(): string[] {
    return Array.from(this.commands.keys());
  }

  public all(): Command[] {
    return Array.from(this.commands.values());
  }
}
