import { OutputStream } from '../util/streams';

/**
 * One step of a task: a shell command, or a function
 *
 * A function that returns `false` fails the task.
 */
export type TaskAction = string | ((task: Task) => void | boolean | Promise<void | boolean>);

export type UptodateCheck = boolean | ((task: Task) => boolean | Promise<boolean>);

/**
 * A task as a task generator yields it
 */
export interface TaskDefinition {
  readonly basename?: string;
  readonly name?: string;
  readonly actions?: TaskAction[];
  /**
   * Files (relative to the project directory) whose contents decide whether the task is up to date
   */
  readonly fileDep?: string[];
  readonly targets?: string[];
  /**
   * Tasks that must have run before this one
   */
  readonly taskDep?: string[];
  readonly uptodate?: UptodateCheck[];
  /**
   * `true` removes the targets on clean, a list of actions replaces that
   */
  readonly clean?: boolean | TaskAction[];
  readonly doc?: string;
}

export interface Task {
  readonly name: string;
  readonly actions: TaskAction[];
  readonly fileDep: string[];
  readonly targets: string[];
  readonly taskDep: string[];
  readonly uptodate: UptodateCheck[];
  readonly clean: boolean | TaskAction[];
  readonly doc: string;
  /**
   * Name of the group this task was generated as a subtask of
   */
  readonly subtaskOf?: string;
}

export type ReporterName = 'zero' | 'executed-only';

export interface ExecutionConfig {
  readonly verbosity: 0 | 1 | 2;
  readonly reporter: ReporterName;
  readonly outfile: OutputStream;
  /**
   * Tasks to run when the command line names none
   */
  readonly defaultTasks: string[];
}

/**
 * Turn the output of a task generator into tasks, plus a group task that depends on all of them
 *
 * Subtasks are named `<basename>:<name>`, where the basename defaults to the
 * group name. Every basename other than the group's gets its own group task too.
 */
export function generateTasks(groupName: string, definitions: Iterable<TaskDefinition>, doc: string): Task[] {
  const ret = new Array<Task>();
  const subtasks = new Map<string, string[]>();
  const explicit = new Set<string>();

  for (const def of definitions) {
    const basename = def.basename ?? groupName;
    if (def.name !== undefined) {
      const name = `${basename}:${def.name}`;
      ret.push(makeTask(name, def, basename));
      const subs = subtasks.get(basename) ?? [];
      subs.push(name);
      subtasks.set(basename, subs);
    } else {
      ret.push(makeTask(basename, def));
      explicit.add(basename);
    }
  }

  const groupDeps = new Array<string>();
  for (const task of ret) {
    if (task.subtaskOf === undefined || task.subtaskOf === groupName) {
      groupDeps.push(task.name);
    }
  }

  for (const [basename, names] of subtasks) {
    if (basename === groupName) { continue; }
    if (explicit.has(basename)) {
      groupDeps.push(...names);
    } else {
      ret.push(makeTask(basename, { taskDep: names }));
      groupDeps.push(basename);
    }
  }

  ret.push(makeTask(groupName, { taskDep: groupDeps, doc }));
  return ret;
}

function makeTask(name: string, def: TaskDefinition, subtaskOf?: string): Task {
  return {
    name,
    actions: def.actions ?? [],
    fileDep: def.fileDep ?? [],
    targets: def.targets ?? [],
    taskDep: def.taskDep ?? [],
    uptodate: def.uptodate ?? [],
    clean: def.clean ?? false,
    doc: def.doc ?? '',
    subtaskOf,
  };
}

/**
 * Human-readable description of a task, one line per attribute
 */
export function describeTask(task: Task): string[] {
  const ret = [`${task.name}`];
  if (task.doc) { ret.push(`  ${task.doc}`); }
  const lists: Array<[string, string[]]> = [
    ['file_dep', task.fileDep],
    ['task_dep', task.taskDep],
    ['targets', task.targets],
  ];
  for (const [label, values] of lists) {
    if (values.length === 0) { continue; }
    ret.push(`  ${label}:`);
    ret.push(...values.map(v => `    - ${v}`));
  }
  return ret;
}
