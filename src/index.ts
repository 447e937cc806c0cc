import { DirectoryResolver } from './resolver.js';
import type { DirectoryKind, ResolvedPath } from './types.js';

export { DirectoryResolver, createDirectoryResolver } from './resolver.js';
export { createEnvironment, processEnvironment } from './env.js';
export { resolveHome, systemUserDatabase } from './home.js';
export { resolveOverride, XDG_OVERRIDES } from './xdg.js';
export { DEFAULT_RULES, evaluateRule, resolveDefault } from './defaults.js';
export type { DefaultContext, DefaultRule } from './defaults.js';
export { CONFIG_VARIABLES, loadResolverConfig } from './config.js';
export { detectPlatform, DirectoryKindSchema, PlatformFamilySchema, RuntimePolicySchema } from './platform.js';
export { DIRECTORY_KINDS, PLATFORM_FAMILIES, RUNTIME_POLICIES } from './types.js';
export type {
  DirectoryKind,
  EnvironmentReader,
  PlatformFamily,
  ResolvedPath,
  ResolverConfig,
  ResolverOptions,
  RuntimePolicy,
  UserDatabase,
} from './types.js';

// A fresh resolver per call keeps configuration variables live, like the XDG ones.
function lookup(kind: DirectoryKind): ResolvedPath {
  return new DirectoryResolver().resolve(kind);
}

/** Current user's home directory. */
export const home = (): ResolvedPath => lookup('home');
/** User executables: `XDG_BIN_HOME`, else `~/.local/bin` or `%LOCALAPPDATA%\Programs`. */
export const binHome = (): ResolvedPath => lookup('binHome');
/** Non-essential cached data: `XDG_CACHE_HOME`, else the platform cache directory. */
export const cacheHome = (): ResolvedPath => lookup('cacheHome');
/** User configuration: `XDG_CONFIG_HOME`, else the platform config directory. */
export const configHome = (): ResolvedPath => lookup('configHome');
/** Machine-local configuration; `%LOCALAPPDATA%` on Windows, `configHome()` elsewhere. */
export const configLocal = (): ResolvedPath => lookup('configLocal');
/** User data: `XDG_DATA_HOME`, else the platform data directory. */
export const dataHome = (): ResolvedPath => lookup('dataHome');
/** Machine-local data; `%LOCALAPPDATA%` on Windows, `dataHome()` elsewhere. */
export const dataLocal = (): ResolvedPath => lookup('dataLocal');
/** Persistent state such as logs and history: `XDG_STATE_HOME`, else the platform default. */
export const stateHome = (): ResolvedPath => lookup('stateHome');
export const desktop = (): ResolvedPath => lookup('desktop');
export const documents = (): ResolvedPath => lookup('documents');
export const downloads = (): ResolvedPath => lookup('downloads');
export const music = (): ResolvedPath => lookup('music');
export const pictures = (): ResolvedPath => lookup('pictures');
/** `~/Movies` on macOS, `Videos` elsewhere. */
export const videos = (): ResolvedPath => lookup('videos');
export const templates = (): ResolvedPath => lookup('templates');
/** Shared files; always `C:\Users\Public` on Windows unless overridden. */
export const publicshare = (): ResolvedPath => lookup('publicshare');
/** Sockets and other runtime files: `XDG_RUNTIME_DIR`, else the platform temp or runtime dir. */
export const runtime = (): ResolvedPath => lookup('runtime');
/** User fonts. There is no per-user convention on Windows, so it is always absent there. */
export const fonts = (): ResolvedPath => lookup('fonts');
/** `~/Library/Preferences` on macOS, `configHome()` elsewhere. */
export const preferences = (): ResolvedPath => lookup('preferences');
