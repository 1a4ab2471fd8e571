import * as path from 'path';
import * as log from '../util/log';
import { CleanCommand } from '../engine/commands/clean';
import { ExecutionConfig, Task } from '../engine/task';
import { exists, rimraf } from '../util/files';
import { CommandContext } from './command';

/**
 * A clean that also removes the cache folder
 */
export class SiteCleanCommand extends CleanCommand {
  protected async cleanTasks(ctx: CommandContext, tasks: Task[], config: ExecutionConfig, selection: string[], dryRun: boolean): Promise<number> {
    if (!dryRun && ctx.site.configured) {
      await removeCacheFolder(ctx.cwd, ctx.site.getString('CACHE_FOLDER', 'cache'));
    }
    return super.cleanTasks(ctx, tasks, config, selection, dryRun);
  }
}

/**
 * Remove the cache folder, which must lie strictly inside the project directory
 */
async function removeCacheFolder(cwd: string, setting: string) {
  if (setting === '') { return; }

  const cacheFolder = path.resolve(cwd, setting);
  const fromCache = path.relative(cacheFolder, cwd);
  if (fromCache === '' || (!fromCache.startsWith('..') && !path.isAbsolute(fromCache))) {
    log.warning(`Not removing CACHE_FOLDER '${setting}': it contains the site itself`);
    return;
  }

  if (await exists(cacheFolder)) {
    log.debug(`Removing cache folder ${cacheFolder}`);
    await rimraf(cacheFolder);
  }
}
