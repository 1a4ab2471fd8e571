// eslint-disable-next-line @typescript-eslint/no-require-imports
import chalk = require('chalk');
import { StrictModeError } from '../errors';

let verbose = false;
let quiet = false;
let strict = false;
let paint: chalk.Chalk = chalk;

let startTime = Date.now();

export function setVerbose(v: boolean) {
  verbose = v;
}

/**
 * Suppress everything but errors
 */
export function setQuiet(q: boolean) {
  quiet = q;
}

/**
 * Turn every warning into a StrictModeError
 */
export function setStrict(s: boolean) {
  strict = s;
}

export function setColorful(colorful: boolean) {
  paint = new chalk.Instance({ level: colorful ? (chalk.level > 0 ? chalk.level : 1) : 0 });
}

export function debug(s: string) {
  if (verbose && !quiet) {
    process.stderr.write(paint.gray(`[${pad(6, elapsedTime(), ' ')}] ${s}`) + '\n');
  }
}

export function info(s: string) {
  if (quiet) { return; }
  process.stderr.write(paint.blue(s) + '\n');
}

export function notice(s: string) {
  if (quiet) { return; }
  process.stderr.write(paint.cyan.bold(s) + '\n');
}

export function warning(s: string) {
  if (strict) {
    error(s);
    throw new StrictModeError(`Warning treated as error in strict mode: ${s}`);
  }
  if (quiet) { return; }
  process.stderr.write(paint.yellow(s) + '\n');
}

export function error(s: string) {
  process.stderr.write(paint.red(s) + '\n');
}

export function markStartTime() {
  startTime = Date.now();
}

function elapsedTime() {
  const elapsedS = (Date.now() - startTime) / 1000.0;
  return elapsedS.toFixed(1);
}

function pad(n: number, x: string, p: string = ' ') {
  return p.repeat(Math.max(n - x.length, 0)) + x;
}
