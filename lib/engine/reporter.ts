import { OutputStream } from '../util/streams';
import { ExecutionConfig, Task } from './task';

export interface IReporter {
  executeTask(task: Task): void;
  skipUptodate(task: Task): void;
  addFailure(task: Task, reason: string): void;
}

/**
 * Announces only the tasks that actually run
 */
export class ExecutedOnlyReporter implements IReporter {
  constructor(private readonly out: OutputStream) {
  }

  public executeTask(task: Task) {
    // Group tasks do nothing by themselves
    if (task.actions.length > 0) {
      this.out.write(`.  ${task.name}\n`);
    }
  }

  public skipUptodate(_task: Task) {
  }

  public addFailure(task: Task, reason: string) {
    this.out.write(`ERROR: Task ${task.name} failed (${reason})\n`);
  }
}

/**
 * Reports nothing but failures
 */
export class ZeroReporter implements IReporter {
  constructor(private readonly out: OutputStream) {
  }

  public executeTask(_task: Task) {
  }

  public skipUptodate(_task: Task) {
  }

  public addFailure(task: Task, reason: string) {
    this.out.write(`ERROR: Task ${task.name} failed (${reason})\n`);
  }
}

export function makeReporter(config: ExecutionConfig): IReporter {
  switch (config.reporter) {
    case 'zero':
      return new ZeroReporter(config.outfile);
    case 'executed-only':
      return new ExecutedOnlyReporter(config.outfile);
  }
}
