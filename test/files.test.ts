import { promises as fs } from 'fs';
import * as path from 'path';
import { allFilesRecursive, copy, exists, fileHash, findFilesUp, removeEmptyDirectory, rimraf } from '../lib/util/files';
import { compareStrings, isErrnoException } from '../lib/util/flow';
import { topologicalSort } from '../lib/util/toposort';
import { makeSiteDir, removeSiteDirs } from './util';

afterEach(async () => {
  await removeSiteDirs();
});

test('all files are listed sorted by path', async () => {
  const dir = await makeSiteDir({ 'b.txt': '', 'a/z.txt': '', 'a/b/c.txt': '' });

  const files = await allFilesRecursive(dir);

  expect(files.map(f => path.relative(dir, f.fullPath))).toEqual(['a/b/c.txt', 'a/z.txt', 'b.txt']);
});

test('copy creates the target directory', async () => {
  const dir = await makeSiteDir({ 'src.txt': 'hello' });

  await copy(path.join(dir, 'src.txt'), path.join(dir, 'out', 'deep', 'src.txt'));

  expect(await fs.readFile(path.join(dir, 'out', 'deep', 'src.txt'), { encoding: 'utf-8' })).toEqual('hello');
});

test('copy keeps symlinks as symlinks', async () => {
  const dir = await makeSiteDir({ 'src.txt': 'hello' });
  await fs.symlink('src.txt', path.join(dir, 'link.txt'));

  await copy(path.join(dir, 'link.txt'), path.join(dir, 'out', 'link.txt'));

  expect(await fs.readlink(path.join(dir, 'out', 'link.txt'))).toEqual('src.txt');
});

test('file hash changes with the contents', async () => {
  const dir = await makeSiteDir({ 'a.txt': 'one', 'b.txt': 'one', 'c.txt': 'two' });

  const [a, b, c] = await Promise.all(['a.txt', 'b.txt', 'c.txt'].map(f => fileHash(path.join(dir, f))));

  expect(a).toEqual(b);
  expect(a).not.toEqual(c);
});

test('only empty directories are removed', async () => {
  const dir = await makeSiteDir({ 'full/a.txt': '' });
  await fs.mkdir(path.join(dir, 'empty'));

  expect(await removeEmptyDirectory(path.join(dir, 'full'))).toEqual(false);
  expect(await removeEmptyDirectory(path.join(dir, 'empty'))).toEqual(true);
  expect(await exists(path.join(dir, 'full', 'a.txt'))).toEqual(true);
});

test('rimraf of something that does not exist is fine', async () => {
  const dir = await makeSiteDir();

  await rimraf(path.join(dir, 'nope'));

  expect(await exists(path.join(dir, 'nope'))).toEqual(false);
});

test('files up the tree are found, most specific last', async () => {
  const dir = await makeSiteDir({ 'conf.js': '', 'a/conf.js': '', 'a/b/.keep': '' });

  const found = await findFilesUp('conf.js', path.join(dir, 'a', 'b'), dir);

  expect(found).toEqual([path.join(dir, 'conf.js'), path.join(dir, 'a', 'conf.js')]);
});

test('topological sort keeps the original order where it can', () => {
  const deps: Record<string, string[]> = { a: [], b: ['c'], c: [], d: ['a'] };

  expect(topologicalSort(Object.keys(deps), x => x, x => deps[x])).toEqual(['a', 'c', 'b', 'd']);
});

test('topological sort refuses cycles', () => {
  const deps: Record<string, string[]> = { a: ['b'], b: ['a'] };

  expect(() => topologicalSort(Object.keys(deps), x => x, x => deps[x])).toThrow('Dependency cycle between: a, b');
});

test('errno errors are recognized by their shape', async () => {
  // GIVEN
  const dir = await makeSiteDir();
  let thrown: unknown;

  // WHEN
  try {
    await fs.lstat(path.join(dir, 'nope'));
  } catch (e) {
    thrown = e;
  }

  // THEN
  expect(isErrnoException(thrown)).toEqual(true);
  expect(isErrnoException({ code: 'ENOENT', message: 'gone' })).toEqual(true);
  expect(isErrnoException(new Error('plain'))).toEqual(false);
  expect(await exists(path.join(dir, 'nope'))).toEqual(false);
});

test('strings compare by code point', () => {
  expect(['b', 'Z', 'a'].sort(compareStrings)).toEqual(['Z', 'a', 'b']);
});
