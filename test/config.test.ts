import * as path from 'path';
import * as log from '../lib/util/log';
import { hasUserSettings, INVARIANT_KEY, makeConfig, ReservedSettings } from '../lib/config/config';
import { findProjectRoot, loadConfig, needsProject } from '../lib/config/loader';
import { CapturedOutput, captureStderr, makeSiteDir, removeSiteDirs } from './util';

const RESERVED: ReservedSettings = {
  colorful: false,
  invariant: true,
  quiet: false,
  configurationFilename: 'conf.js',
};

let stderr: CapturedOutput;

beforeEach(() => {
  stderr = captureStderr();
  log.setColorful(false);
});

afterEach(async () => {
  jest.restoreAllMocks();
  await removeSiteDirs();
});

test('configuration file is evaluated as a module', async () => {
  // GIVEN
  const dir = await makeSiteDir({
    'conf.js': [
      "const path = require('path');",
      "module.exports = { BLOG_TITLE: 'Test', OUTPUT_FOLDER: path.join('public', 'site'), HERE: __dirname };",
    ].join('\n'),
  });

  // WHEN
  const result = await loadConfig(path.join(dir, 'conf.js'), 'conf.js');

  // THEN
  expect(result).toEqual({
    kind: 'loaded',
    file: path.join(dir, 'conf.js'),
    settings: { BLOG_TITLE: 'Test', OUTPUT_FOLDER: 'public/site', HERE: dir },
  });
});

test('missing configuration file is not an error', async () => {
  const dir = await makeSiteDir();

  const result = await loadConfig(path.join(dir, 'conf.js'));

  expect(result.kind).toEqual('missing');
});

test('syntax error in the configuration is a parse failure', async () => {
  // GIVEN
  const dir = await makeSiteDir({ 'conf.js': 'module.exports = {' });

  // WHEN
  const result = await loadConfig(path.join(dir, 'conf.js'), 'conf.js');

  // THEN
  expect(result.kind).toEqual('failed');
  if (result.kind === 'failed') {
    expect(result.error.fileName).toEqual('conf.js');
    expect(result.error.message.split('\n')[0]).toEqual('"conf.js" cannot be parsed.');
  }
});

test('commands that work without a site', () => {
  expect(needsProject(undefined)).toEqual(false);
  expect(needsProject('init')).toEqual(false);
  expect(needsProject('version')).toEqual(false);
  expect(needsProject('import_wordpress')).toEqual(false);
  expect(needsProject('build')).toEqual(true);
  expect(needsProject('help')).toEqual(true);
});

test('project root is the nearest directory with a configuration file', async () => {
  const dir = await makeSiteDir({ 'conf.js': '', 'sub/site/conf.js': '', 'sub/site/posts/x.md': '' });

  expect(await findProjectRoot(path.join(dir, 'sub', 'site', 'posts'))).toEqual(path.join(dir, 'sub', 'site'));
  expect(await findProjectRoot(path.join(dir, 'sub'))).toEqual(dir);
});

test('reserved settings are injected and cannot be set by the user', () => {
  // WHEN
  const config = makeConfig({ BLOG_TITLE: 'Test', [INVARIANT_KEY]: false }, RESERVED);

  // THEN
  expect(config).toEqual({
    BLOG_TITLE: 'Test',
    __colorful__: false,
    __invariant__: true,
    __quiet__: false,
    __configuration_filename__: 'conf.js',
  });
  expect(Object.isFrozen(config)).toEqual(true);
  expect(stderr.text).toEqual("Ignoring reserved configuration key '__invariant__'\n");
});

test('a configuration with only reserved settings has no user settings', () => {
  expect(hasUserSettings(makeConfig({}, RESERVED))).toEqual(false);
  expect(hasUserSettings(makeConfig({ BLOG_TITLE: 'Test' }, RESERVED))).toEqual(true);
});
