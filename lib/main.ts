import { promises as fs } from 'fs';
import * as path from 'path';
import * as log from './util/log';
import { makeConfig } from './config/config';
import { DEFAULT_CONFIG_FILE, findProjectRoot, loadConfig, needsProject } from './config/loader';
import { ITaskEngine } from './engine/engine';
import { Orchestrator } from './orchestrator';
import { Site } from './site';
import { BuildClock, ClockFreezer, FrozenTime, INVARIANT_INSTANT } from './util/clock';
import { exists } from './util/files';
import { OutputStream } from './util/streams';

const CONF_FLAG = '--conf=';

export interface MainOptions {
  /**
   * Directory to start looking for the site from
   *
   * @default process.cwd()
   */
  readonly cwd?: string;

  /**
   * @default whether stderr is a terminal
   */
  readonly colorful?: boolean;

  /**
   * Print debug output
   *
   * @default whether NIKOLA_DEBUG is set
   */
  readonly verbose?: boolean;

  readonly clock?: BuildClock;

  /**
   * What invariant builds freeze time with, `null` if there is nothing to do it with
   *
   * @default the clock
   */
  readonly freezer?: ClockFreezer | null;

  readonly engine?: ITaskEngine;
  readonly stdout?: OutputStream;
  readonly stderr?: OutputStream;
}

/**
 * Run the nikola command line, returns the process exit code
 */
export async function main(argv: string[], options: MainOptions = {}): Promise<number> {
  const args = [...argv];
  const isBuild = args[0] === 'build';

  const colorful = options.colorful ?? (process.stderr.isTTY === true && process.platform !== 'win32');
  log.setColorful(colorful);
  log.setVerbose(options.verbose ?? !!process.env.NIKOLA_DEBUG);
  log.markStartTime();
  log.setStrict(false);
  log.setQuiet(false);

  const strict = isBuild && args.includes('--strict');
  if (strict) {
    log.notice('Running in strict mode');
    log.setStrict(true);
  }
  const quiet = isBuild && (args.includes('-q') || args.includes('--quiet'));
  log.setQuiet(quiet);

  let confFilename = DEFAULT_CONFIG_FILE;
  const confIndex = args.findIndex(a => a.startsWith(CONF_FLAG));
  if (confIndex > -1) {
    confFilename = args[confIndex].slice(CONF_FLAG.length);
    log.info(`Using config file '${confFilename}'`);
    args.splice(confIndex, 1);
  }

  let cwd = path.resolve(options.cwd ?? process.cwd());
  const needsConfigFile = needsProject(args[0]);
  if (needsConfigFile) {
    const root = await findProjectRoot(cwd, confFilename);
    if (root !== undefined) {
      cwd = root;
    }
  }

  const loaded = await loadConfig(path.resolve(cwd, confFilename), confFilename);
  if (loaded.kind === 'failed') {
    log.error(loaded.error.message);
    return 1;
  }
  if (loaded.kind === 'missing' && needsConfigFile) {
    log.warning(`Cannot find configuration file "${confFilename}".`);
  }
  const settings = loaded.kind === 'loaded' ? loaded.settings : {};

  const clock = options.clock ?? new BuildClock();
  const freezer = options.freezer === undefined ? clock : options.freezer;
  let frozen: FrozenTime | undefined;
  if (isBuild && args.includes('--invariant')) {
    if (freezer) {
      frozen = freezer.freeze(INVARIANT_INSTANT);
    } else {
      log.warning('In order to perform invariant builds, you must install a clock freezer.');
    }
  }

  if (Object.keys(settings).length > 0) {
    await ensurePluginsMarker(cwd);
  }

  const config = makeConfig(settings, {
    colorful,
    invariant: frozen !== undefined,
    quiet,
    configurationFilename: confFilename,
  });

  const site = new Site(config, { cwd, clock });
  try {
    return await new Orchestrator(site, {
      quiet,
      engine: options.engine,
      stdout: options.stdout,
      stderr: options.stderr,
    }).run(args);
  } finally {
    if (site.invariant) {
      frozen?.stop();
    }
  }
}

/**
 * Make the plugins folder loadable as a module
 */
async function ensurePluginsMarker(cwd: string) {
  const pluginsDir = path.join(cwd, 'plugins');
  const marker = path.join(pluginsDir, 'index.js');
  if (await exists(pluginsDir, s => s.isDirectory()) && !await exists(marker)) {
    await fs.writeFile(marker, '// Plugin modules go here.\n', { encoding: 'utf-8' });
  }
}
