import { promises as fs } from 'fs';
import * as path from 'path';
import * as log from '../util/log';
import { exists, findFileUp } from '../util/files';
import { SimpleError } from '../util/flow';
import { BaseCommand, CommandContext, CommandKind, OptionValues } from './command';

const CONF_TEMPLATE = 'templates/conf.js.in';
const SITE_FOLDERS = ['files', 'plugins', 'cache'];

export class InitCommand extends BaseCommand {
  public readonly name: string = 'init';
  public readonly purpose: string = 'create a Nikola site in the specified folder';
  public readonly kind: CommandKind = 'meta';
  public readonly needsConfig: boolean = false;
  public readonly usage: string = 'FOLDER';

  public async execute(ctx: CommandContext, _options: OptionValues, args: string[]): Promise<number> {
    if (args.length !== 1) {
      log.error('init: expects exactly one folder');
      return 3;
    }

    const target = path.resolve(ctx.cwd, args[0]);
    if (await exists(target) && (await fs.readdir(target)).length > 0) {
      log.error(`The folder ${target} is not empty.`);
      return 1;
    }

    await fs.mkdir(target, { recursive: true });
    await fs.writeFile(path.join(target, 'conf.js'), await readTemplate(), { encoding: 'utf-8' });
    for (const folder of SITE_FOLDERS) {
      await fs.mkdir(path.join(target, folder), { recursive: true });
    }

    log.info(`Created empty site at ${args[0]}.`);
    return 0;
  }
}

async function readTemplate() {
  const templateFile = await findFileUp(CONF_TEMPLATE, __dirname);
  if (!templateFile) {
    throw new SimpleError(`Could not find '${CONF_TEMPLATE}' upwards from ${__dirname}`);
  }
  return fs.readFile(templateFile, { encoding: 'utf-8' });
}
