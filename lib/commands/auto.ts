import { AutoCommand } from '../engine/commands/auto';

/**
 * The engine's watcher, renamed so that a site plugin can provide `auto`
 */
export class DoitAutoCommand extends AutoCommand {
  public readonly name: string = 'doit_auto';
}
