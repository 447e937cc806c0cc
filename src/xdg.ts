import { pathFlavor } from './platform.js';
import type { DirectoryKind, EnvironmentReader, PlatformFamily } from './types.js';

/**
 * XDG variable that overrides each directory kind.
 * Kinds mapped to `undefined` have no override and always use the platform default.
 */
export const XDG_OVERRIDES: Record<DirectoryKind, string | undefined> = {
  home: undefined,
  binHome: 'XDG_BIN_HOME',
  cacheHome: 'XDG_CACHE_HOME',
  configHome: 'XDG_CONFIG_HOME',
  configLocal: undefined,
  dataHome: 'XDG_DATA_HOME',
  dataLocal: undefined,
  stateHome: 'XDG_STATE_HOME',
  desktop: 'XDG_DESKTOP_DIR',
  documents: 'XDG_DOCUMENTS_DIR',
  downloads: 'XDG_DOWNLOAD_DIR',
  music: 'XDG_MUSIC_DIR',
  pictures: 'XDG_PICTURES_DIR',
  videos: 'XDG_VIDEOS_DIR',
  templates: 'XDG_TEMPLATES_DIR',
  publicshare: 'XDG_PUBLICSHARE_DIR',
  runtime: 'XDG_RUNTIME_DIR',
  fonts: undefined,
  preferences: undefined,
};

/**
 * Returns the XDG override for `kind`, verbatim, when its variable holds an
 * absolute path. Relative values are ignored as the XDG Base Directory spec requires.
 */
export function resolveOverride(
  kind: DirectoryKind,
  platform: PlatformFamily,
  env: EnvironmentReader,
): string | undefined {
  const name = XDG_OVERRIDES[kind];
  if (!name) return undefined;

  const value = env.read(name);
  if (value && pathFlavor(platform).isAbsolute(value)) return value;
  return undefined;
}
