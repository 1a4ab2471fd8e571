import { ExecutionConfig, generateTasks, Task } from './engine/task';
import { Site } from './site';
import { Signal } from './util/signal';
import { OutputStream } from './util/streams';

export const DEFAULT_TASKS = ['render_site', 'post_render'];

export interface LoadedTasks {
  readonly tasks: Task[];
  readonly config: ExecutionConfig;
}

/**
 * Gets the tasks to execute from the site
 */
export class TaskLoader {
  /**
   * Sent with the site once all tasks have been generated
   */
  public readonly initialized = new Signal<Site>('initialized');

  constructor(
    private readonly site: Site,
    private readonly quiet: boolean = false,
    private readonly outfile: OutputStream = process.stderr) {
  }

  public async load(): Promise<LoadedTasks> {
    const config: ExecutionConfig = this.quiet
      ? { verbosity: 0, reporter: 'zero', outfile: this.outfile, defaultTasks: DEFAULT_TASKS }
      : { verbosity: 1, reporter: 'executed-only', outfile: this.outfile, defaultTasks: DEFAULT_TASKS };

    const tasks = generateTasks(
      'render_site',
      await this.site.genTasks('render_site'),
      'Group of tasks to render the site.');
    const lateTasks = generateTasks(
      'post_render',
      await this.site.genTasks('post_render'),
      'Group of tasks to be executed after site is rendered.');

    this.initialized.send(this.site);
    return { tasks: [...tasks, ...lateTasks], config };
  }
}
