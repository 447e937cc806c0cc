import type { z } from 'zod';
import { debugLog } from './logger.js';
import { detectPlatform, PlatformFamilySchema, RuntimePolicySchema } from './platform.js';
import { PLATFORM_FAMILIES, RUNTIME_POLICIES } from './types.js';
import type { EnvironmentReader, ResolverConfig, ResolverOptions, RuntimePolicy } from './types.js';

const DEFAULT_RUNTIME_POLICY: RuntimePolicy = 'uid';

/**
 * Registry of environment variables that configure the resolver itself.
 *
 * Each entry maps a config key to its variable, default and description.
 */
export const CONFIG_VARIABLES: Record<
  keyof ResolverConfig,
  { envVar: string; default: string; description: string }
> = {
  platform: {
    envVar: 'DIRSPEC_PLATFORM',
    default: 'detected from process.platform',
    description: 'Platform conventions to apply (linux, macos or windows)',
  },
  runtimePolicy: {
    envVar: 'DIRSPEC_RUNTIME_POLICY',
    default: DEFAULT_RUNTIME_POLICY,
    description: 'Linux runtime directory fallback: uid (/run/user/<uid>) or tmp ($TMPDIR or /tmp)',
  },
};

interface Setting<T extends string> {
  schema: z.ZodType<T>;
  allowed: readonly T[];
  envVar: string;
  optionName: string;
  fallback: () => T;
}

function readSetting<T extends string>(setting: Setting<T>, option: T | undefined, env: EnvironmentReader): T {
  if (option !== undefined) {
    const parsed = setting.schema.safeParse(option);
    if (!parsed.success) {
      throw new Error(
        `Invalid ${setting.optionName} option "${option}". Expected one of: ${setting.allowed.join(', ')}`,
      );
    }
    return parsed.data;
  }

  const value = env.read(setting.envVar);
  if (value === undefined) return setting.fallback();

  const parsed = setting.schema.safeParse(value);
  if (parsed.success) return parsed.data;

  // A stray variable must not turn every lookup into a failure.
  const fallback = setting.fallback();
  debugLog('config', { envVar: setting.envVar, invalid: value, expected: setting.allowed, using: fallback });
  return fallback;
}

/**
 * Resolves resolver settings. Explicit options win over configuration
 * variables, which win over the built-in defaults. An unsupported
 * variable value is logged and replaced by the default.
 * @throws Error when an explicit option holds an unsupported value.
 */
export function loadResolverConfig(env: EnvironmentReader, options: ResolverOptions = {}): ResolverConfig {
  return {
    platform: readSetting(
      {
        schema: PlatformFamilySchema,
        allowed: PLATFORM_FAMILIES,
        envVar: CONFIG_VARIABLES.platform.envVar,
        optionName: 'platform',
        fallback: () => detectPlatform(),
      },
      options.platform,
      env,
    ),
    runtimePolicy: readSetting(
      {
        schema: RuntimePolicySchema,
        allowed: RUNTIME_POLICIES,
        envVar: CONFIG_VARIABLES.runtimePolicy.envVar,
        optionName: 'runtimePolicy',
        fallback: () => DEFAULT_RUNTIME_POLICY,
      },
      options.runtimePolicy,
      env,
    ),
  };
}
