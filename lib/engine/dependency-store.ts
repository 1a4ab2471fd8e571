import { readJsonIfExists, rimraf, writeJson } from '../util/files';

export const DEFAULT_DEP_FILE = '.nikola-deps.json';

/**
 * What we remember about a task after it ran successfully
 */
export interface TaskRecord {
  /**
   * Hash of every file dependency, by path
   */
  readonly files: Record<string, string>;
}

type DependencyStoreJson = Record<string, TaskRecord>;

/**
 * Persistent record of the last successful run of every task
 */
export class DependencyStore {
  public static async load(fileName: string) {
    const contents = await readJsonIfExists<DependencyStoreJson>(fileName);
    return new DependencyStore(fileName, contents ?? {});
  }

  private dirty = false;

  constructor(public readonly fileName: string, private readonly records: DependencyStoreJson) {
  }

  public get size() {
    return Object.keys(this.records).length;
  }

  public get(taskName: string): TaskRecord | undefined {
    return this.records[taskName];
  }

  public save(taskName: string, record: TaskRecord) {
    this.records[taskName] = record;
    this.dirty = true;
  }

  public forget(taskName: string) {
    if (!(taskName in this.records)) { return false; }
    delete this.records[taskName];
    this.dirty = true;
    return true;
  }

  /**
   * Write changes back, removing the file once nothing is remembered
   */
  public async flush() {
    if (!this.dirty) { return; }
    if (this.size === 0) {
      await rimraf(this.fileName);
    } else {
      await writeJson(this.fileName, this.records);
    }
    this.dirty = false;
  }
}
