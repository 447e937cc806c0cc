import { pathFlavor } from './platform.js';
import type { DirectoryKind, EnvironmentReader, PlatformFamily, RuntimePolicy } from './types.js';

/** How a directory kind falls back when no override is present. */
export type DefaultRule =
  /** Join the home directory with `subpath`. */
  | { type: 'home'; subpath: string }
  /** Value of an environment variable, optionally joined with `subpath`. */
  | { type: 'env'; name: string; subpath?: string }
  /** A fixed absolute path. */
  | { type: 'literal'; path: string }
  /** Whatever another kind resolves to, its override included. */
  | { type: 'alias'; kind: DirectoryKind }
  /** Linux runtime directory, governed by the runtime policy. */
  | { type: 'runtime' }
  /** `$TMPDIR`, else `/tmp`. */
  | { type: 'tmp' }
  /** No convention exists. */
  | { type: 'none' };

type RuleTable = Record<Exclude<DirectoryKind, 'home'>, DefaultRule>;

const APP_SUPPORT = 'Library/Application Support';

const home = (subpath: string): DefaultRule => ({ type: 'home', subpath });
const env = (name: string, subpath?: string): DefaultRule => ({ type: 'env', name, subpath });
const alias = (kind: DirectoryKind): DefaultRule => ({ type: 'alias', kind });

/** Fallback rules per platform family and directory kind. */
export const DEFAULT_RULES: Record<PlatformFamily, RuleTable> = {
  linux: {
    binHome: home('.local/bin'),
    cacheHome: home('.cache'),
    configHome: home('.config'),
    configLocal: alias('configHome'),
    dataHome: home('.local/share'),
    dataLocal: alias('dataHome'),
    stateHome: home('.local/state'),
    desktop: home('Desktop'),
    documents: home('Documents'),
    downloads: home('Downloads'),
    music: home('Music'),
    pictures: home('Pictures'),
    videos: home('Videos'),
    templates: home('Templates'),
    publicshare: home('Public'),
    runtime: { type: 'runtime' },
    fonts: home('.local/share/fonts'),
    preferences: alias('configHome'),
  },
  macos: {
    binHome: home('.local/bin'),
    cacheHome: home('Library/Caches'),
    configHome: home(APP_SUPPORT),
    configLocal: alias('configHome'),
    dataHome: home(APP_SUPPORT),
    dataLocal: alias('dataHome'),
    stateHome: home(APP_SUPPORT),
    desktop: home('Desktop'),
    documents: home('Documents'),
    downloads: home('Downloads'),
    music: home('Music'),
    pictures: home('Pictures'),
    videos: home('Movies'),
    templates: home('Templates'),
    publicshare: home('Public'),
    runtime: { type: 'tmp' },
    fonts: home('Library/Fonts'),
    preferences: home('Library/Preferences'),
  },
  windows: {
    binHome: env('LOCALAPPDATA', 'Programs'),
    cacheHome: env('LOCALAPPDATA'),
    configHome: env('APPDATA'),
    configLocal: env('LOCALAPPDATA'),
    dataHome: env('APPDATA'),
    dataLocal: env('LOCALAPPDATA'),
    stateHome: env('LOCALAPPDATA'),
    desktop: env('USERPROFILE', 'Desktop'),
    documents: env('USERPROFILE', 'Documents'),
    downloads: env('USERPROFILE', 'Downloads'),
    music: env('USERPROFILE', 'Music'),
    pictures: env('USERPROFILE', 'Pictures'),
    videos: env('USERPROFILE', 'Videos'),
    templates: env('USERPROFILE', 'Templates'),
    publicshare: { type: 'literal', path: 'C:\\Users\\Public' },
    runtime: env('TEMP'),
    fonts: { type: 'none' },
    preferences: alias('configHome'),
  },
};

/** What a rule needs from its surroundings to produce a path. */
export interface DefaultContext {
  platform: PlatformFamily;
  env: EnvironmentReader;
  runtimePolicy: RuntimePolicy;
  home(): string | undefined;
  uid(): number | undefined;
  /** Full resolution of another kind, used by `alias` rules. */
  resolve(kind: DirectoryKind): string | undefined;
}

function tmpDir(ctx: DefaultContext): string {
  return ctx.env.read('TMPDIR') ?? '/tmp';
}

/** Evaluates a single rule. Returns `undefined` rather than a partial path. */
export function evaluateRule(rule: DefaultRule, ctx: DefaultContext): string | undefined {
  const p = pathFlavor(ctx.platform);

  switch (rule.type) {
    case 'home': {
      const base = ctx.home();
      return base ? p.join(base, rule.subpath) : undefined;
    }
    case 'env': {
      const base = ctx.env.read(rule.name);
      if (!base) return undefined;
      return rule.subpath ? p.join(base, rule.subpath) : base;
    }
    case 'literal':
      return rule.path;
    case 'alias':
      return ctx.resolve(rule.kind);
    case 'runtime': {
      const uid = ctx.runtimePolicy === 'uid' ? ctx.uid() : undefined;
      return uid !== undefined ? `/run/user/${uid}` : tmpDir(ctx);
    }
    case 'tmp':
      return tmpDir(ctx);
    case 'none':
      return undefined;
  }
}

/** Platform-conventional location for `kind`, ignoring any override. */
export function resolveDefault(kind: Exclude<DirectoryKind, 'home'>, ctx: DefaultContext): string | undefined {
  return evaluateRule(DEFAULT_RULES[ctx.platform][kind], ctx);
}
