import { watch } from 'chokidar';
import * as log from '../../util/log';
import { BaseCommand, CommandContext, CommandKind, OptionValues } from '../../commands/command';
import { OneAtATime } from '../../util/one-at-a-time';
import { unique } from '../../util/runtime';

/**
 * Runs tasks, then runs them again whenever one of their file dependencies changes
 */
export class AutoCommand extends BaseCommand {
  public readonly name: string = 'auto';
  public readonly purpose: string = 'automatically execute tasks when a dependency changes';
  public readonly kind: CommandKind = 'engine';
  public readonly usage: string = '[TASK ...]';

  public async execute(ctx: CommandContext, _options: OptionValues, args: string[]): Promise<number> {
    const runner = new OneAtATime();
    const watched = new Set<string>();
    const watcher = watch([], { cwd: ctx.cwd, ignoreInitial: true });

    const runOnce = async () => {
      const { tasks, config } = await ctx.loader.load();
      const code = await ctx.engine.run(tasks, config, args);
      if (code !== 0) {
        log.error(`Tasks finished with exit code ${code}`);
      }

      const newFiles = unique(tasks.flatMap(t => t.fileDep)).filter(f => !watched.has(f));
      if (newFiles.length > 0) {
        newFiles.forEach(f => watched.add(f));
        watcher.add(newFiles);
      }
    };

    watcher.on('all', (event, file) => {
      log.debug(`${event}: ${file}`);
      runner.tryRun(runOnce);
    });

    runner.tryRun(runOnce);
    await runner.idle();
    log.info('Watching for changes (Ctrl-C to stop)');

    await waitForInterrupt();
    await runner.idle();
    await watcher.close();
    return 0;
  }
}

function waitForInterrupt() {
  return new Promise<void>(ok => {
    process.once('SIGINT', () => ok());
  });
}
