import { makeConfig } from '../lib/config/config';
import { Site, SitePlugin } from '../lib/site';
import { TaskLoader } from '../lib/task-loader';
import { makeSiteDir, removeSiteDirs, StringOutput } from './util';

afterEach(async () => {
  await removeSiteDirs();
});

async function makeSite(plugins: SitePlugin[], files: Record<string, string> = {}) {
  const dir = await makeSiteDir(files);
  const config = makeConfig({ BLOG_TITLE: 'Test', PLUGINS: plugins }, {
    colorful: false,
    invariant: false,
    quiet: false,
    configurationFilename: 'conf.js',
  });
  return new Site(config, { cwd: dir });
}

test('render_site tasks come before post_render tasks', async () => {
  // GIVEN
  const site = await makeSite([{
    name: 'sitemap',
    tasks: [{ phase: 'post_render', generate: () => [{ basename: 'sitemap', actions: [() => { }] }] }],
  }], { 'files/a.txt': 'a' });

  // WHEN
  const { tasks } = await new TaskLoader(site).load();

  // THEN
  expect(tasks.map(t => t.name)).toEqual([
    'copy_files:output/a.txt',
    'copy_files',
    'render_site',
    'sitemap',
    'post_render',
  ]);
  expect(tasks[4].taskDep).toEqual(['sitemap']);
});

test('copy tasks depend on their source and produce their target', async () => {
  const site = await makeSite([], { 'files/css/site.css': 'body {}' });

  const { tasks } = await new TaskLoader(site).load();

  expect(tasks[0]).toMatchObject({
    name: 'copy_files:output/css/site.css',
    fileDep: ['files/css/site.css'],
    targets: ['output/css/site.css'],
    clean: true,
  });
});

test('initialized is sent once every task has been generated', async () => {
  // GIVEN
  const events = new Array<string>();
  const site = await makeSite([{
    name: 'recorder',
    tasks: [
      { phase: 'render_site', generate: () => { events.push('render_site'); return []; } },
      { phase: 'post_render', generate: () => { events.push('post_render'); return []; } },
    ],
  }]);
  const loader = new TaskLoader(site);
  loader.initialized.connect(() => events.push('initialized'));

  // WHEN
  await loader.load();

  // THEN
  expect(events).toEqual(['render_site', 'post_render', 'initialized']);
});

test('quiet loading selects the silent reporter', async () => {
  const site = await makeSite([]);
  const out = new StringOutput();

  const { config } = await new TaskLoader(site, true, out).load();

  expect(config).toEqual({ verbosity: 0, reporter: 'zero', outfile: out, defaultTasks: ['render_site', 'post_render'] });
});

test('normal loading reports executed tasks', async () => {
  const site = await makeSite([]);
  const out = new StringOutput();

  const { config } = await new TaskLoader(site, false, out).load();

  expect(config).toEqual({ verbosity: 1, reporter: 'executed-only', outfile: out, defaultTasks: ['render_site', 'post_render'] });
});
