import { loadResolverConfig } from './config.js';
import { resolveDefault } from './defaults.js';
import type { DefaultContext } from './defaults.js';
import { processEnvironment } from './env.js';
import { resolveHome, systemUserDatabase } from './home.js';
import { debugLog } from './logger.js';
import { DirectoryKindSchema } from './platform.js';
import { DIRECTORY_KINDS } from './types.js';
import type {
  DirectoryKind,
  EnvironmentReader,
  PlatformFamily,
  ResolvedPath,
  ResolverOptions,
  RuntimePolicy,
  UserDatabase,
} from './types.js';
import { resolveOverride } from './xdg.js';

/**
 * Resolves standard user directories for one platform family.
 *
 * Each lookup tries the kind's XDG override first and only consults the
 * platform default when the override is unset or relative. Nothing is
 * cached: every call reads the environment afresh.
 */
export class DirectoryResolver {
  readonly platform: PlatformFamily;
  readonly runtimePolicy: RuntimePolicy;
  private readonly env: EnvironmentReader;
  private readonly userDatabase: UserDatabase;
  private readonly context: DefaultContext;

  constructor(options: ResolverOptions = {}) {
    this.env = options.env ?? processEnvironment;
    this.userDatabase = options.userDatabase ?? systemUserDatabase;

    const config = loadResolverConfig(this.env, options);
    this.platform = config.platform;
    this.runtimePolicy = config.runtimePolicy;

    this.context = {
      platform: this.platform,
      env: this.env,
      runtimePolicy: this.runtimePolicy,
      home: () => this.home(),
      uid: () => this.userDatabase.uid(),
      resolve: (kind) => this.resolve(kind),
    };
  }

  /** Resolves any directory kind. */
  resolve(kind: DirectoryKind): ResolvedPath {
    if (kind === 'home') {
      const dir = resolveHome(this.platform, this.env, this.userDatabase);
      debugLog('resolver', { kind, source: dir ? 'home' : 'absent', path: dir });
      return dir;
    }

    const override = resolveOverride(kind, this.platform, this.env);
    if (override) {
      debugLog('resolver', { kind, source: 'override', path: override });
      return override;
    }

    const dir = resolveDefault(kind, this.context);
    debugLog('resolver', { kind, source: dir ? 'default' : 'absent', platform: this.platform, path: dir });
    return dir;
  }

  /**
   * Resolves a kind given by name, e.g. from user input.
   * @throws Error when `name` is not a known directory kind.
   */
  resolveByName(name: string): ResolvedPath {
    const parsed = DirectoryKindSchema.safeParse(name);
    if (!parsed.success) {
      throw new Error(`Unknown directory kind "${name}". Expected one of: ${DIRECTORY_KINDS.join(', ')}`);
    }
    return this.resolve(parsed.data);
  }

  /** Resolves every kind at once. */
  resolveAll(): Record<DirectoryKind, ResolvedPath> {
    return {
      home: this.home(),
      binHome: this.binHome(),
      cacheHome: this.cacheHome(),
      configHome: this.configHome(),
      configLocal: this.configLocal(),
      dataHome: this.dataHome(),
      dataLocal: this.dataLocal(),
      stateHome: this.stateHome(),
      desktop: this.desktop(),
      documents: this.documents(),
      downloads: this.downloads(),
      music: this.music(),
      pictures: this.pictures(),
      videos: this.videos(),
      templates: this.templates(),
      publicshare: this.publicshare(),
      runtime: this.runtime(),
      fonts: this.fonts(),
      preferences: this.preferences(),
    };
  }

  home(): ResolvedPath {
    return this.resolve('home');
  }

  binHome(): ResolvedPath {
    return this.resolve('binHome');
  }

  cacheHome(): ResolvedPath {
    return this.resolve('cacheHome');
  }

  configHome(): ResolvedPath {
    return this.resolve('configHome');
  }

  configLocal(): ResolvedPath {
    return this.resolve('configLocal');
  }

  dataHome(): ResolvedPath {
    return this.resolve('dataHome');
  }

  dataLocal(): ResolvedPath {
    return this.resolve('dataLocal');
  }

  stateHome(): ResolvedPath {
    return this.resolve('stateHome');
  }

  desktop(): ResolvedPath {
    return this.resolve('desktop');
  }

  documents(): ResolvedPath {
    return this.resolve('documents');
  }

  downloads(): ResolvedPath {
    return this.resolve('downloads');
  }

  music(): ResolvedPath {
    return this.resolve('music');
  }

  pictures(): ResolvedPath {
    return this.resolve('pictures');
  }

  videos(): ResolvedPath {
    return this.resolve('videos');
  }

  templates(): ResolvedPath {
    return this.resolve('templates');
  }

  publicshare(): ResolvedPath {
    return this.resolve('publicshare');
  }

  runtime(): ResolvedPath {
    return this.resolve('runtime');
  }

  fonts(): ResolvedPath {
    return this.resolve('fonts');
  }

  preferences(): ResolvedPath {
    return this.resolve('preferences');
  }
}

/** Creates a resolver; options default to the host platform and live process environment. */
export function createDirectoryResolver(options?: ResolverOptions): DirectoryResolver {
  return new DirectoryResolver(options);
}
