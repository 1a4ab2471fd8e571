import { promises as fs, Stats } from 'fs';
import * as path from 'path';
import * as crypto from 'crypto';
import * as log from './log';
import { compareStrings, isErrnoException } from './flow';

export function standardHash() {
  return crypto.createHash('sha1');
}

export async function fileHash(fullPath: string) {
  const stats = await fs.lstat(fullPath);
  const hash = standardHash();
  if (stats.isSymbolicLink()) {
    hash.update(await fs.readlink(fullPath));
  } else {
    hash.update(await fs.readFile(fullPath));
  }
  return hash.digest('hex');
}

export async function copy(src: string, target: string) {
  await fs.mkdir(path.dirname(target), { recursive: true });
  const targetExists = await exists(target);
  let errorMessage = `Error copying ${src} -> ${target}`;
  try {
    const stat = await fs.lstat(src);
    if (stat.isSymbolicLink()) {
      const linkTarget = await fs.readlink(src);
      errorMessage = `Error copying symlink ${src} (${linkTarget}) -> ${target}`;
      if (targetExists) {
        await fs.unlink(target);
      }
      await fs.symlink(linkTarget, target);
    } else {
      await fs.copyFile(src, target);
    }
  } catch (e) {
    log.error(errorMessage);
    throw e;
  }
}

export async function exists(s: string, cb?: (s: Stats) => boolean) {
  try {
    const st = await fs.lstat(s);
    return cb === undefined || cb(st);
  } catch (e) {
    if (isErrnoException(e) && e.code === 'ENOENT') { return false; }
    throw e;
  }
}

export async function rimraf(x: string) {
  try {
    const s = await fs.lstat(x);
    if (s.isDirectory()) {
      for (const child of await fs.readdir(x)) {
        await rimraf(path.join(x, child));
      }
      await fs.rmdir(x);
    } else {
      await fs.unlink(x);
    }
  } catch (e) {
    if (isErrnoException(e) && e.code === 'ENOENT') { return; }
    throw e;
  }
}

/**
 * Remove a directory only if it has no entries left
 *
 * Returns whether the directory is gone.
 */
export async function removeEmptyDirectory(dir: string) {
  try {
    await fs.rmdir(dir);
    return true;
  } catch (e) {
    if (isErrnoException(e) && e.code === 'ENOENT') { return true; }
    if (isErrnoException(e) && (e.code === 'ENOTEMPTY' || e.code === 'EEXIST')) { return false; }
    throw e;
  }
}

export async function readJsonIfExists<A extends object>(filename: string): Promise<A | undefined> {
  let contents: string;
  try {
    contents = await fs.readFile(filename, { encoding: 'utf-8' });
  } catch (e) {
    if (isErrnoException(e) && e.code === 'ENOENT') { return undefined; }
    throw e;
  }
  try {
    return JSON.parse(contents);
  } catch (e) {
    throw new Error(`While reading ${filename}: ${e}`);
  }
}

export async function writeJson<A>(filename: string, obj: A) {
  await fs.writeFile(filename, JSON.stringify(obj, undefined, 2), { encoding: 'utf-8' });
}

export interface FileInfo {
  readonly fullPath: string;
  readonly mtimeMs: number;
  readonly size: number;
}

/**
 * All files under a directory, sorted by path
 */
export async function allFilesRecursive(root: string): Promise<FileInfo[]> {
  const ret = new Array<FileInfo>();
  await recurse(root);
  ret.sort((a, b) => compareStrings(a.fullPath, b.fullPath));
  return ret;

  async function recurse(dirName: string) {
    const entries = await fs.readdir(dirName);
    for (const e of entries) {
      const fullPath = path.join(dirName, e);
      const stat = await fs.lstat(fullPath);
      if (stat.isDirectory()) {
        await recurse(fullPath);
      } else {
        ret.push({ fullPath, mtimeMs: stat.mtimeMs, size: stat.size });
      }
    }
  }
}

/**
 * Find the most specific file with the given name up from the startin directory
 */
export async function findFileUp(filename: string, startDir: string, rootDir?: string): Promise<string | undefined> {
  const ret = await findFilesUp(filename, startDir, rootDir);
  return ret.length > 0 ? ret.pop() : undefined;
}

/**
 * Find all files with the given name up from the starting directory
 *
 * Returns the most specific file at the end.
 */
export async function findFilesUp(filename: string, startDir: string, rootDir?: string): Promise<string[]> {
  const ret = new Array<string>();

  startDir = path.resolve(startDir);
  const resolvedRoot = rootDir !== undefined ? path.resolve(rootDir) : undefined;

  let currentDir = startDir;
  while (true) {
    const fullPath = path.join(currentDir, filename);
    if (await exists(fullPath)) {
      ret.push(fullPath);
    }

    if (currentDir === resolvedRoot) { break; }
    const next = path.dirname(currentDir);
    if (next === currentDir) { break; }
    currentDir = next;
  }

  // Most specific file at the end
  return ret.reverse();
}
