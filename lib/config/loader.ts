import { promises as fs } from 'fs';
import { createRequire } from 'module';
import * as path from 'path';
import * as vm from 'vm';
import { ConfigParseError } from '../errors';
import { findFileUp } from '../util/files';
import { isErrnoException } from '../util/flow';
import { isRecord } from '../util/runtime';

export const DEFAULT_CONFIG_FILE = 'conf.js';

export type ConfigLoadResult =
  | { readonly kind: 'loaded'; readonly file: string; readonly settings: Record<string, unknown> }
  | { readonly kind: 'missing'; readonly file: string }
  | { readonly kind: 'failed'; readonly file: string; readonly error: ConfigParseError };

/**
 * Commands that work without a site
 *
 * They also must not go looking for one: `init` would otherwise create the
 * new site inside whatever site the current directory is in.
 */
export function needsProject(commandName: string | undefined) {
  if (commandName === undefined) { return false; }
  return !['init', 'version'].includes(commandName) && !commandName.startsWith('import_');
}

/**
 * Directory of the nearest configuration file at or above the given directory
 */
export async function findProjectRoot(startDir: string, configFile: string = DEFAULT_CONFIG_FILE): Promise<string | undefined> {
  const found = await findFileUp(configFile, startDir);
  return found !== undefined ? path.dirname(found) : undefined;
}

/**
 * Evaluate a configuration file
 *
 * Never throws: a missing or broken file is reported in the result.
 *
 * @param displayName how the file is referred to in error messages
 */
export async function loadConfig(file: string, displayName: string = file): Promise<ConfigLoadResult> {
  let source: string;
  try {
    source = await fs.readFile(file, { encoding: 'utf-8' });
  } catch (e) {
    if (isErrnoException(e) && e.code === 'ENOENT') {
      return { kind: 'missing', file };
    }
    return { kind: 'failed', file, error: new ConfigParseError(displayName, e) };
  }

  try {
    return { kind: 'loaded', file, settings: evaluateConfig(source, file) };
  } catch (e) {
    return { kind: 'failed', file, error: new ConfigParseError(displayName, e) };
  }
}

/**
 * Run the source as a CommonJS module in a context of its own, returns what it exports
 */
function evaluateConfig(source: string, file: string): Record<string, unknown> {
  const mod: { exports: unknown } = { exports: {} };
  const sandbox = {
    module: mod,
    exports: mod.exports,
    require: createRequire(file),
    __filename: file,
    __dirname: path.dirname(file),
    console,
    process,
  };

  vm.runInNewContext(source, sandbox, { filename: file });

  const exported = mod.exports;
  if (!isRecord(exported)) {
    throw new TypeError(`configuration must export an object, got ${Array.isArray(exported) ? 'array' : typeof exported}`);
  }
  return { ...exported };
}
