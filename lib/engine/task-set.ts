import { TaskGraphError } from '../errors';
import { Graph } from '../util/graph';
import { Task } from './task';

/**
 * A validated collection of tasks, with their task dependencies as a graph
 */
export class TaskSet {
  private readonly byName = new Map<string, Task>();
  private readonly graph = new Graph<Task>();

  constructor(tasks: Task[]) {
    for (const task of tasks) {
      if (this.byName.has(task.name)) {
        throw new TaskGraphError(`Task names must be unique. Duplicate: ${task.name}`);
      }
      this.byName.set(task.name, task);
      this.graph.addNode(task);
    }

    for (const task of tasks) {
      for (const dep of task.taskDep) {
        const depTask = this.byName.get(dep);
        if (!depTask) {
          throw new TaskGraphError(`Task '${task.name}' has an unknown task_dep: '${dep}'`);
        }
        this.graph.addEdge(depTask, task);
      }
    }
  }

  public get tasks(): Task[] {
    return Array.from(this.byName.values());
  }

  public lookup(name: string): Task | undefined {
    return this.byName.get(name);
  }

  /**
   * The named tasks plus everything they depend on
   *
   * Each named task is preceded by its own dependencies, and named tasks keep
   * the order they were given in.
   */
  public select(names: string[]): Task[] {
    const ret = new Array<Task>();
    const seen = new Set<Task>();
    for (const name of names) {
      const task = this.byName.get(name);
      if (!task) {
        throw new TaskGraphError(`"${name}" is not a task`);
      }
      const closure = this.graph.subgraph(this.graph.feedsInto(task)).sorted();
      for (const t of closure) {
        if (seen.has(t)) { continue; }
        seen.add(t);
        ret.push(t);
      }
    }
    return ret;
  }
}
