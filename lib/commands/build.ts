import { CommandOption } from './command';
import { RunCommand } from '../engine/commands/run';

/**
 * The engine's `run`, with the build mode flags
 *
 * The flags themselves are acted upon before the configuration is loaded.
 */
export class BuildCommand extends RunCommand {
  public readonly name: string = 'build';

  public get options(): CommandOption[] {
    return [
      ...super.options,
      {
        name: 'strict',
        long: 'strict',
        type: 'boolean',
        default: false,
        help: 'Fail on things that would normally be warnings.',
      },
      {
        name: 'invariant',
        long: 'invariant',
        type: 'boolean',
        default: false,
        help: 'Generate invariant output (for testing only!).',
      },
      {
        name: 'quiet',
        long: 'quiet',
        short: 'q',
        type: 'boolean',
        default: false,
        help: 'Run quietly.',
      },
    ];
  }
}
