import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CleanOptions, ITaskEngine, RunOptions } from '../lib/engine/engine';
import { ExecutionConfig, Task } from '../lib/engine/task';
import { rimraf } from '../lib/util/files';

export class StringOutput {
  public text = '';

  public write(chunk: string) {
    this.text += chunk;
    return true;
  }

  public get lines() {
    return this.text.split('\n');
  }
}

export interface CapturedOutput {
  readonly text: string;
}

/**
 * Swallow everything written to stderr, keeping it for inspection
 */
export function captureStderr(): CapturedOutput {
  const spy = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
  return {
    get text() {
      return spy.mock.calls.map(c => `${c[0]}`).join('');
    },
  };
}

const tempDirs = new Array<string>();

/**
 * Make a temporary directory with the given files in it
 */
export async function makeSiteDir(files: Record<string, string> = {}): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'nikola-test-'));
  tempDirs.push(dir);
  for (const [name, contents] of Object.entries(files)) {
    const fullPath = path.join(dir, name);
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, contents, { encoding: 'utf-8' });
  }
  return dir;
}

export async function removeSiteDirs() {
  for (const dir of tempDirs.splice(0)) {
    await rimraf(dir);
  }
}

export function makeTask(name: string, props: Partial<Task> = {}): Task {
  return {
    name,
    actions: [],
    fileDep: [],
    targets: [],
    taskDep: [],
    uptodate: [],
    clean: false,
    doc: '',
    ...props,
  };
}

export interface EngineCall {
  readonly method: 'run' | 'clean' | 'forget';
  readonly tasks: Task[];
  readonly config: ExecutionConfig;
  readonly selection: string[];
}

/**
 * Engine that only records what it was asked to do
 */
export class FakeEngine implements ITaskEngine {
  public readonly calls = new Array<EngineCall>();

  constructor(private readonly exitCode = 0, private readonly onRun?: () => void) {
  }

  public async run(tasks: Task[], config: ExecutionConfig, selection: string[], _options?: RunOptions): Promise<number> {
    this.calls.push({ method: 'run', tasks, config, selection });
    this.onRun?.();
    return this.exitCode;
  }

  public async clean(tasks: Task[], config: ExecutionConfig, selection: string[], _options: CleanOptions): Promise<number> {
    this.calls.push({ method: 'clean', tasks, config, selection });
    return this.exitCode;
  }

  public async forget(tasks: Task[], config: ExecutionConfig, selection: string[]): Promise<number> {
    this.calls.push({ method: 'forget', tasks, config, selection });
    return this.exitCode;
  }

  public async isUpToDate(_task: Task): Promise<boolean> {
    return false;
  }
}
