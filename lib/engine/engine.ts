import * as path from 'path';
import * as log from '../util/log';
import { exists, fileHash, removeEmptyDirectory, rimraf } from '../util/files';
import { SimpleError } from '../util/flow';
import { OutputStream } from '../util/streams';
import { DEFAULT_DEP_FILE, DependencyStore } from './dependency-store';
import { IReporter, makeReporter } from './reporter';
import { shellExecute, ShellActionFailed } from './shell';
import { ExecutionConfig, Task, TaskAction } from './task';
import { TaskSet } from './task-set';

export interface RunOptions {
  /**
   * Execute tasks even if they are up to date
   */
  readonly alwaysExecute?: boolean;
}

export interface CleanOptions {
  readonly dryRun: boolean;
  readonly out: OutputStream;
}

/**
 * Executes a graph of tasks, skipping the ones that are up to date
 *
 * All methods return a process exit code: 0 on success, 1 if a task failed,
 * 3 if the task graph or selection is invalid.
 */
export interface ITaskEngine {
  run(tasks: Task[], config: ExecutionConfig, selection: string[], options?: RunOptions): Promise<number>;
  clean(tasks: Task[], config: ExecutionConfig, selection: string[], options: CleanOptions): Promise<number>;
  forget(tasks: Task[], config: ExecutionConfig, selection: string[]): Promise<number>;
  isUpToDate(task: Task): Promise<boolean>;
}

export interface TaskEngineOptions {
  /**
   * Directory that task paths and shell commands are relative to
   */
  readonly cwd: string;

  /**
   * Where to remember successful runs
   *
   * @default '.nikola-deps.json' in the working directory
   */
  readonly depFile?: string;

  readonly stdout?: OutputStream;
  readonly stderr?: OutputStream;
}

export class TaskEngine implements ITaskEngine {
  public readonly cwd: string;
  public readonly depFile: string;
  private readonly stdout: OutputStream;
  private readonly stderr: OutputStream;

  constructor(options: TaskEngineOptions) {
    this.cwd = path.resolve(options.cwd);
    this.depFile = path.resolve(this.cwd, options.depFile ?? DEFAULT_DEP_FILE);
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
  }

  public async run(tasks: Task[], config: ExecutionConfig, selection: string[], options: RunOptions = {}): Promise<number> {
    const selected = this.select(tasks, config, selection);
    if (selected === undefined) { return 3; }

    const reporter = makeReporter(config);
    const store = await DependencyStore.load(this.depFile);
    log.debug(`${selected.length} tasks selected`);

    try {
      for (const task of selected) {
        const failure = await this.runTask(task, config, store, reporter, options);
        if (failure !== undefined) {
          reporter.addFailure(task, failure);
          return 1;
        }
      }
    } finally {
      await store.flush();
    }
    return 0;
  }

  public async clean(tasks: Task[], config: ExecutionConfig, selection: string[], options: CleanOptions): Promise<number> {
    const selected = this.select(tasks, config, selection);
    if (selected === undefined) { return 3; }

    const store = await DependencyStore.load(this.depFile);

    // Dependents first, so directories they filled are emptied before their own removal
    for (const task of selected.reverse()) {
      if (Array.isArray(task.clean)) {
        options.out.write(`${task.name} - executing clean actions\n`);
        if (!options.dryRun) {
          const failure = await this.executeActions(task, task.clean, config);
          if (failure !== undefined) {
            log.error(`Clean actions of ${task.name} failed: ${failure}`);
            await store.flush();
            return 1;
          }
        }
      } else if (task.clean) {
        await this.removeTargets(task, options);
      }

      if (!options.dryRun) {
        store.forget(task.name);
      }
    }

    await store.flush();
    return 0;
  }

  public async forget(tasks: Task[], config: ExecutionConfig, selection: string[]): Promise<number> {
    const selected = this.select(tasks, config, selection);
    if (selected === undefined) { return 3; }

    const store = await DependencyStore.load(this.depFile);
    for (const task of selected) {
      if (store.forget(task.name)) {
        log.info(`forgetting ${task.name}`);
      }
    }
    await store.flush();
    return 0;
  }

  public async isUpToDate(task: Task): Promise<boolean> {
    return this.checkUpToDate(task, await DependencyStore.load(this.depFile));
  }

  private select(tasks: Task[], config: ExecutionConfig, selection: string[]): Task[] | undefined {
    try {
      const taskSet = new TaskSet(tasks);
      return taskSet.select(selection.length > 0 ? selection : config.defaultTasks);
    } catch (e) {
      if (e instanceof SimpleError) {
        log.error(e.message);
        return undefined;
      }
      throw e;
    }
  }

  /**
   * Run a single task if necessary, returns the reason of failure if it failed
   */
  private async runTask(task: Task, config: ExecutionConfig, store: DependencyStore, reporter: IReporter, options: RunOptions): Promise<string | undefined> {
    for (const dep of task.fileDep) {
      if (!await exists(this.resolve(dep))) {
        return `Dependent file '${dep}' does not exist`;
      }
    }

    if (!options.alwaysExecute && await this.checkUpToDate(task, store)) {
      reporter.skipUptodate(task);
      return undefined;
    }

    reporter.executeTask(task);
    const failure = await this.executeActions(task, task.actions, config);
    if (failure !== undefined) { return failure; }

    if (tracksState(task)) {
      store.save(task.name, { files: await this.hashFiles(task.fileDep) });
    }
    return undefined;
  }

  private async executeActions(task: Task, actions: TaskAction[], config: ExecutionConfig): Promise<string | undefined> {
    for (const action of actions) {
      try {
        if (typeof action === 'string') {
          const { stdout, stderr } = await shellExecute(action, this.cwd);
          if (config.verbosity >= 2) { this.stdout.write(stdout); }
          if (config.verbosity >= 1) { this.stderr.write(stderr); }
        } else if (await action(task) === false) {
          return 'action returned false';
        }
      } catch (e) {
        if (e instanceof ShellActionFailed) {
          this.stdout.write(e.stdout);
          this.stderr.write(e.stderr);
        }
        return e instanceof Error ? e.message : `${e}`;
      }
    }
    return undefined;
  }

  private async checkUpToDate(task: Task, store: DependencyStore): Promise<boolean> {
    // Tasks without file_dep or uptodate always run
    if (!tracksState(task)) { return false; }

    const record = store.get(task.name);
    if (!record) { return false; }

    for (const check of task.uptodate) {
      const ok = typeof check === 'boolean' ? check : await check(task);
      if (!ok) { return false; }
    }

    for (const target of task.targets) {
      if (!await exists(this.resolve(target))) { return false; }
    }

    for (const dep of task.fileDep) {
      const abs = this.resolve(dep);
      if (!await exists(abs) || record.files[dep] !== await fileHash(abs)) { return false; }
    }

    return true;
  }

  private async hashFiles(files: string[]) {
    const ret: Record<string, string> = {};
    for (const f of files) {
      ret[f] = await fileHash(this.resolve(f));
    }
    return ret;
  }

  private async removeTargets(task: Task, options: CleanOptions) {
    // Targets inside a directory target are listed after it, so remove back to front
    for (const target of [...task.targets].reverse()) {
      const abs = this.resolve(target);
      if (await exists(abs, s => s.isDirectory())) {
        options.out.write(`${task.name} - removing dir '${target}'\n`);
        if (!options.dryRun && !await removeEmptyDirectory(abs)) {
          log.warning(`${task.name} - cannot remove (it is not empty) '${target}'`);
        }
      } else if (await exists(abs)) {
        options.out.write(`${task.name} - removing file '${target}'\n`);
        if (!options.dryRun) {
          await rimraf(abs);
        }
      }
    }
  }

  private resolve(p: string) {
    return path.resolve(this.cwd, p);
  }
}

function tracksState(task: Task) {
  return task.fileDep.length > 0 || task.uptodate.length > 0;
}
