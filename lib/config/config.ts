import * as log from '../util/log';

/**
 * Site configuration, frozen once built
 */
export type Config = Readonly<Record<string, unknown>>;

export const COLORFUL_KEY = '__colorful__';
export const INVARIANT_KEY = '__invariant__';
export const QUIET_KEY = '__quiet__';
export const CONFIGURATION_FILENAME_KEY = '__configuration_filename__';

/**
 * Settings that are injected by the command line front end, never by the user
 */
export interface ReservedSettings {
  readonly colorful: boolean;
  readonly invariant: boolean;
  readonly quiet: boolean;
  readonly configurationFilename: string;
}

export function isReservedKey(key: string) {
  return key.startsWith('__') && key.endsWith('__');
}

/**
 * Combine user settings and reserved settings into the configuration
 */
export function makeConfig(userSettings: Readonly<Record<string, unknown>>, reserved: ReservedSettings): Config {
  const ret: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(userSettings)) {
    if (isReservedKey(key)) {
      log.warning(`Ignoring reserved configuration key '${key}'`);
      continue;
    }
    ret[key] = value;
  }

  ret[COLORFUL_KEY] = reserved.colorful;
  ret[INVARIANT_KEY] = reserved.invariant;
  ret[QUIET_KEY] = reserved.quiet;
  ret[CONFIGURATION_FILENAME_KEY] = reserved.configurationFilename;

  return Object.freeze(ret);
}

export function hasUserSettings(config: Config) {
  return Object.keys(config).some(k => !isReservedKey(k));
}
