import * as fs from 'fs';
import * as path from 'path';
import { SimpleError } from './util/flow';
import { isRecord } from './util/runtime';
import { OutputStream } from './util/streams';

/**
 * Version from the package.json nearest above this module, in the source tree and in dist/ alike
 */
export const VERSION = readPackageVersion(__dirname);

/**
 * What `nikola version` prints. Scripts parse this, keep the format.
 */
export function versionString() {
  return `Nikola v${VERSION}`;
}

export function printVersion(out: OutputStream) {
  out.write(`${versionString()}\n`);
}

function readPackageVersion(startDir: string): string {
  let dir = startDir;
  while (true) {
    const candidate = path.join(dir, 'package.json');
    if (fs.existsSync(candidate)) {
      const pkg: unknown = JSON.parse(fs.readFileSync(candidate, { encoding: 'utf-8' }));
      if (isRecord(pkg) && typeof pkg.version === 'string') { return pkg.version; }
    }
    const next = path.dirname(dir);
    if (next === dir) {
      throw new SimpleError(`No package.json with a version above ${startDir}`);
    }
    dir = next;
  }
}
