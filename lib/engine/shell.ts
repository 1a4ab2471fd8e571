import * as child_process from 'child_process';
import * as util from 'util';
import * as log from '../util/log';
import { isErrnoException } from '../util/flow';

const cpExec = util.promisify(child_process.exec);

export interface ShellResult {
  readonly stdout: string;
  readonly stderr: string;
}

/**
 * A shell command exited with a nonzero status
 */
export class ShellActionFailed extends Error {
  constructor(message: string, public readonly stdout: string, public readonly stderr: string) {
    super(message);
    this.name = 'ShellActionFailed';
  }
}

export async function shellExecute(command: string, cwd: string): Promise<ShellResult> {
  log.debug(`[${cwd}] ${command}`);

  try {
    const { stdout, stderr } = await cpExec(command, {
      cwd,
      encoding: 'utf-8',
      maxBuffer: 5_000_000,
    });
    return { stdout, stderr };
  } catch (e) {
    if (isErrnoException(e)) {
      const stdout = 'stdout' in e && typeof e.stdout === 'string' ? e.stdout : '';
      const stderr = 'stderr' in e && typeof e.stderr === 'string' ? e.stderr : '';
      // The default message contains all of stdout/stderr again
      throw new ShellActionFailed(e.message.split('\n')[0], stdout, stderr);
    }
    throw e;
  }
}
