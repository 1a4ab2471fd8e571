import * as path from 'path';
import { main, MainOptions } from '../lib/main';
import { exists } from '../lib/util/files';
import { CapturedOutput, captureStderr, makeSiteDir, removeSiteDirs, StringOutput } from './util';

let stderr: CapturedOutput;
let stdout: StringOutput;

beforeEach(() => {
  stderr = captureStderr();
  stdout = new StringOutput();
});

afterEach(async () => {
  jest.restoreAllMocks();
  await removeSiteDirs();
});

function options(cwd: string): MainOptions {
  return { cwd, colorful: false, verbose: false, stdout, stderr: new StringOutput() };
}

test('clean removes the cache folder', async () => {
  // GIVEN
  const dir = await makeSiteDir({
    'conf.js': "module.exports = { BLOG_TITLE: 'Test' };\n",
    'cache/thumbnails/a.txt': 'x',
  });

  // WHEN
  const code = await main(['clean'], options(dir));

  // THEN
  expect(code).toEqual(0);
  expect(await exists(path.join(dir, 'cache'))).toEqual(false);
});

test('dry-run clean leaves the cache folder alone', async () => {
  // GIVEN
  const dir = await makeSiteDir({
    'conf.js': "module.exports = { BLOG_TITLE: 'Test' };\n",
    'cache/a.txt': 'x',
  });

  // WHEN
  const code = await main(['clean', '-n'], options(dir));

  // THEN
  expect(code).toEqual(0);
  expect(await exists(path.join(dir, 'cache', 'a.txt'))).toEqual(true);
});

test('clean without a cache folder is fine', async () => {
  const dir = await makeSiteDir({ 'conf.js': "module.exports = { BLOG_TITLE: 'Test' };\n" });

  expect(await main(['clean'], options(dir))).toEqual(0);
  expect(await main(['clean'], options(dir))).toEqual(0);
});

test('clean uses the configured cache folder', async () => {
  // GIVEN
  const dir = await makeSiteDir({
    'conf.js': "module.exports = { CACHE_FOLDER: 'mycache' };\n",
    'mycache/a.txt': 'x',
    'cache/b.txt': 'x',
  });

  // WHEN
  await main(['clean'], options(dir));

  // THEN
  expect(await exists(path.join(dir, 'mycache'))).toEqual(false);
  expect(await exists(path.join(dir, 'cache', 'b.txt'))).toEqual(true);
});

test('clean removes what the build copied', async () => {
  // GIVEN
  const dir = await makeSiteDir({
    'conf.js': "module.exports = { BLOG_TITLE: 'Test' };\n",
    'files/a.txt': 'a',
  });
  expect(await main(['build'], options(dir))).toEqual(0);
  expect(await exists(path.join(dir, 'output', 'a.txt'))).toEqual(true);

  // WHEN
  const code = await main(['clean'], options(dir));

  // THEN
  expect(code).toEqual(0);
  expect(await exists(path.join(dir, 'output', 'a.txt'))).toEqual(false);
  expect(stdout.text).toEqual("copy_files:output/a.txt - removing file 'output/a.txt'\n");
});

test('empty cache folder setting means there is no cache', async () => {
  // GIVEN
  const dir = await makeSiteDir({
    'conf.js': "module.exports = { CACHE_FOLDER: '' };\n",
    'files/keep.txt': 'x',
  });

  // WHEN
  const code = await main(['clean'], options(dir));

  // THEN
  expect(code).toEqual(0);
  expect(await exists(path.join(dir, 'conf.js'))).toEqual(true);
  expect(await exists(path.join(dir, 'files', 'keep.txt'))).toEqual(true);
});

test('cache folder that contains the site is not removed', async () => {
  // GIVEN
  const root = await makeSiteDir({
    'site/conf.js': "module.exports = { CACHE_FOLDER: '..' };\n",
    'site/files/keep.txt': 'x',
  });
  const dir = path.join(root, 'site');

  // WHEN
  const code = await main(['clean'], options(dir));

  // THEN
  expect(code).toEqual(0);
  expect(await exists(path.join(dir, 'conf.js'))).toEqual(true);
  expect(stderr.text).toEqual("Not removing CACHE_FOLDER '..': it contains the site itself\n");
});
