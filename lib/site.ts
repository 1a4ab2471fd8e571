import * as path from 'path';
import * as log from './util/log';
import { BaseCommand, Command } from './commands/command';
import { isPluginCommandSpec, PluginCommand, PluginCommandSpec } from './commands/plugin-command';
import { Config, hasUserSettings, INVARIANT_KEY } from './config/config';
import { TaskDefinition } from './engine/task';
import { Clock, SYSTEM_CLOCK } from './util/clock';
import { allFilesRecursive, copy, exists } from './util/files';
import { isRecord, stringRecord } from './util/runtime';

export type TaskPhase = 'render_site' | 'post_render';

export interface TaskGenerator {
  readonly phase: TaskPhase;
  generate(site: Site): TaskDefinition[] | Promise<TaskDefinition[]>;
}

export interface SitePlugin {
  readonly name: string;
  readonly commands?: ReadonlyArray<Command | PluginCommandSpec>;
  readonly tasks?: ReadonlyArray<TaskGenerator>;
  /**
   * Called once all tasks have been generated, before any of them runs
   */
  onInitialized?(site: Site): void;
}

export interface SiteOptions {
  /**
   * Project directory
   *
   * @default process.cwd()
   */
  readonly cwd?: string;
  readonly clock?: Clock;
}

/**
 * The site being built: its configuration, plugins and tasks
 */
export class Site {
  /**
   * Whether there is a site configuration at all
   */
  public readonly configured: boolean;
  public readonly invariant: boolean;
  public readonly cwd: string;
  private readonly clock: Clock;
  private readonly _plugins = new Array<SitePlugin>();
  private readonly _commands = new Array<Command>();
  private readonly generators = new Array<TaskGenerator>();

  constructor(public readonly config: Config, options: SiteOptions = {}) {
    this.configured = hasUserSettings(config);
    this.invariant = config[INVARIANT_KEY] === true;
    this.cwd = path.resolve(options.cwd ?? process.cwd());
    this.clock = options.clock ?? SYSTEM_CLOCK;

    this.registerPlugin(COPY_FILES);
    for (const plugin of pluginsFromConfig(config)) {
      this.registerPlugin(plugin);
    }
  }

  public registerPlugin(plugin: SitePlugin) {
    log.debug(`Registering plugin ${plugin.name}`);
    this._plugins.push(plugin);
    for (const command of plugin.commands ?? []) {
      this._commands.push(toCommand(command));
    }
    this.generators.push(...plugin.tasks ?? []);
  }

  public get plugins(): SitePlugin[] {
    return [...this._plugins];
  }

  /**
   * Commands contributed by plugins, in registration order
   */
  public get commands(): Command[] {
    return [...this._commands];
  }

  /**
   * The task definitions of every generator for the given phase
   */
  public async genTasks(phase: TaskPhase): Promise<TaskDefinition[]> {
    const ret = new Array<TaskDefinition>();
    for (const generator of this.generators.filter(g => g.phase === phase)) {
      ret.push(...await generator.generate(this));
    }
    return ret;
  }

  public now(): Date {
    return this.clock.now();
  }

  public getString(key: string, fallback: string): string {
    const value = this.config[key];
    return typeof value === 'string' ? value : fallback;
  }

  public getStringRecord(key: string, fallback: Record<string, string>): Record<string, string> {
    return stringRecord(this.config[key]) ?? fallback;
  }
}

function toCommand(command: Command | PluginCommandSpec): Command {
  return command instanceof BaseCommand ? command : new PluginCommand(command);
}

function pluginsFromConfig(config: Config): SitePlugin[] {
  const declared = config.PLUGINS;
  if (declared === undefined) { return []; }
  if (!Array.isArray(declared)) {
    log.warning('PLUGINS should be a list of plugins, ignoring it');
    return [];
  }

  const ret = new Array<SitePlugin>();
  for (const candidate of declared) {
    if (isSitePlugin(candidate)) {
      ret.push(candidate);
    } else {
      log.warning(`Ignoring invalid entry in PLUGINS (${typeof candidate})`);
    }
  }
  return ret;
}

export function isSitePlugin(x: unknown): x is SitePlugin {
  return isRecord(x)
    && typeof x.name === 'string'
    && (x.commands === undefined || (Array.isArray(x.commands) && x.commands.every(isCommandLike)))
    && (x.tasks === undefined || (Array.isArray(x.tasks) && x.tasks.every(isTaskGenerator)))
    && (x.onInitialized === undefined || typeof x.onInitialized === 'function');
}

function isCommandLike(x: unknown) {
  return x instanceof BaseCommand || isPluginCommandSpec(x);
}

function isTaskGenerator(x: unknown) {
  return isRecord(x)
    && (x.phase === 'render_site' || x.phase === 'post_render')
    && typeof x.generate === 'function';
}

/**
 * Copies every file of the FILES_FOLDERS into the output, one task per file
 */
const COPY_FILES: SitePlugin = {
  name: 'copy_files',
  tasks: [
    {
      phase: 'render_site',
      async generate(site: Site): Promise<TaskDefinition[]> {
        const output = site.getString('OUTPUT_FOLDER', 'output');
        const folders = site.getStringRecord('FILES_FOLDERS', { files: '' });

        const ret = new Array<TaskDefinition>();
        for (const [source, destination] of Object.entries(folders)) {
          const sourceDir = path.resolve(site.cwd, source);
          if (!await exists(sourceDir, s => s.isDirectory())) { continue; }

          for (const file of await allFilesRecursive(sourceDir)) {
            const relative = path.relative(sourceDir, file.fullPath);
            const src = path.join(source, relative);
            const target = path.join(output, destination, relative);
            ret.push({
              basename: 'copy_files',
              name: target,
              fileDep: [src],
              targets: [target],
              actions: [() => copy(path.resolve(site.cwd, src), path.resolve(site.cwd, target))],
              clean: true,
              doc: `Copy ${src} to ${target}`,
            });
          }
        }
        return ret;
      },
    },
  ],
};
