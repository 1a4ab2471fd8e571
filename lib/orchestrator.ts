import * as log from './util/log';
import { buildRegistry } from './commands';
import { Command, CommandContext } from './commands/command';
import { ParsedCommandLine, parseCommandLine, resolveCommand } from './commands/dispatcher';
import { CommandRegistry } from './commands/registry';
import { ITaskEngine, TaskEngine } from './engine/engine';
import { InvalidCommandLineError, ProjectNotConfiguredError, UnknownCommandError } from './errors';
import { Site } from './site';
import { TaskLoader } from './task-loader';
import { OutputStream } from './util/streams';

export interface OrchestratorOptions {
  /**
   * Report only failing tasks
   */
  readonly quiet?: boolean;
  readonly engine?: ITaskEngine;
  readonly stdout?: OutputStream;
  readonly stderr?: OutputStream;
}

/**
 * Runs one command line against a site
 */
export class Orchestrator {
  public readonly registry: CommandRegistry;
  public readonly loader: TaskLoader;
  public readonly engine: ITaskEngine;
  private readonly stdout: OutputStream;

  constructor(public readonly site: Site, options: OrchestratorOptions = {}) {
    this.stdout = options.stdout ?? process.stdout;
    const stderr = options.stderr ?? process.stderr;

    this.registry = buildRegistry(site.commands);
    this.loader = new TaskLoader(site, options.quiet ?? false, stderr);
    this.engine = options.engine ?? new TaskEngine({ cwd: site.cwd, stdout: this.stdout, stderr });

    for (const plugin of site.plugins) {
      if (plugin.onInitialized) {
        this.loader.initialized.connect(s => plugin.onInitialized?.(s));
      }
    }
  }

  /**
   * Run the command line, returns the process exit code
   */
  public async run(args: string[]): Promise<number> {
    const invocation = this.resolve(args);
    if (typeof invocation === 'number') { return invocation; }

    const ctx: CommandContext = {
      site: this.site,
      registry: this.registry,
      loader: this.loader,
      engine: this.engine,
      cwd: this.site.cwd,
      out: this.stdout,
    };

    log.debug(`Running command ${invocation.command.name}`);
    return invocation.command.execute(ctx, invocation.options, invocation.positional);
  }

  /**
   * Find and parse the command, or the exit code to stop with
   */
  private resolve(args: string[]): Invocation | number {
    try {
      const { command, args: rest } = resolveCommand(this.registry, args, this.site);
      return { command, ...parseCommandLine(command, rest) };
    } catch (e) {
      if (e instanceof UnknownCommandError || e instanceof ProjectNotConfiguredError || e instanceof InvalidCommandLineError) {
        log.error(e.message);
        return 3;
      }
      throw e;
    }
  }
}

interface Invocation extends ParsedCommandLine {
  readonly command: Command;
}
