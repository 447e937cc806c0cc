import * as os from 'node:os';
import { debugLog } from './logger.js';
import type { EnvironmentReader, PlatformFamily, UserDatabase } from './types.js';

/** User database backed by the operating system (`getpwuid` on Unix). */
export const systemUserDatabase: UserDatabase = {
  homeDir() {
    try {
      const dir = os.userInfo().homedir;
      return dir ? dir : undefined;
    } catch (err: unknown) {
      // Thrown when the current uid has no passwd entry.
      debugLog('home', { lookup: 'failed', error: err instanceof Error ? err.message : String(err) });
      return undefined;
    }
  },
  uid() {
    return process.getuid ? process.getuid() : undefined;
  },
};

/**
 * Resolves the current user's home directory.
 *
 * Unix families use `HOME`, then the user database. Windows uses
 * `USERPROFILE`, then `HOMEDRIVE` + `HOMEPATH`. Returns `undefined` when
 * nothing applies; never throws.
 */
export function resolveHome(
  platform: PlatformFamily,
  env: EnvironmentReader,
  userDatabase: UserDatabase,
): string | undefined {
  if (platform === 'windows') {
    const profile = env.read('USERPROFILE');
    if (profile) return profile;

    const drive = env.read('HOMEDRIVE');
    const homePath = env.read('HOMEPATH');
    if (drive && homePath) return `${drive}${homePath}`;
    return undefined;
  }

  const home = env.read('HOME');
  if (home) return home;
  return userDatabase.homeDir();
}
