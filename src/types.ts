/** Every logical directory the resolver knows how to locate. */
export const DIRECTORY_KINDS = [
  'home',
  'binHome',
  'cacheHome',
  'configHome',
  'configLocal',
  'dataHome',
  'dataLocal',
  'stateHome',
  'desktop',
  'documents',
  'downloads',
  'music',
  'pictures',
  'videos',
  'templates',
  'publicshare',
  'runtime',
  'fonts',
  'preferences',
] as const;

export type DirectoryKind = (typeof DIRECTORY_KINDS)[number];

export const PLATFORM_FAMILIES = ['linux', 'macos', 'windows'] as const;

/** Operating-system family whose conventions decide the fallback paths. */
export type PlatformFamily = (typeof PLATFORM_FAMILIES)[number];

/**
 * How the Linux runtime directory is derived when `XDG_RUNTIME_DIR` is unset.
 * `uid` gives `/run/user/<uid>`; `tmp` gives `$TMPDIR` or `/tmp`.
 */
export const RUNTIME_POLICIES = ['uid', 'tmp'] as const;

export type RuntimePolicy = (typeof RUNTIME_POLICIES)[number];

/** An absolute path, or `undefined` when it cannot be determined. */
export type ResolvedPath = string | undefined;

/** Read-only view over environment variables. */
export interface EnvironmentReader {
  /** Returns the variable's value, or `undefined` when unset or empty. */
  read(name: string): string | undefined;
}

/** Access to the system user-account database for the current user. */
export interface UserDatabase {
  /** Home directory recorded for the current user, if the lookup succeeds. */
  homeDir(): string | undefined;
  /** Effective user ID; `undefined` where the platform has none. */
  uid(): number | undefined;
}

/** Options accepted by `createDirectoryResolver`. All are optional. */
export interface ResolverOptions {
  /** Platform conventions to apply. Detected from the host when omitted. */
  platform?: PlatformFamily;
  /** Source of environment variables. Defaults to the live process environment. */
  env?: EnvironmentReader;
  /** User database used for the Unix home fallback and the runtime uid. */
  userDatabase?: UserDatabase;
  /** Linux runtime-directory policy. */
  runtimePolicy?: RuntimePolicy;
}

/** Fully resolved resolver settings. */
export interface ResolverConfig {
  platform: PlatformFamily;
  runtimePolicy: RuntimePolicy;
}
