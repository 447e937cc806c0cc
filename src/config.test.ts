import { describe, it, expect, vi, afterEach } from 'vitest';
import { CONFIG_VARIABLES, loadResolverConfig } from './config.js';
import { createEnvironment } from './env.js';
import { detectPlatform } from './platform.js';
import type { ResolverOptions } from './types.js';

describe('loadResolverConfig', () => {
  afterEach(() => {
    delete process.env.DIRSPEC_DEBUG;
    vi.restoreAllMocks();
  });

  it('detects the platform and uses the uid policy by default', () => {
    expect(loadResolverConfig(createEnvironment({}))).toEqual({
      platform: detectPlatform(),
      runtimePolicy: 'uid',
    });
  });

  it('reads DIRSPEC_PLATFORM and DIRSPEC_RUNTIME_POLICY', () => {
    const env = createEnvironment({ DIRSPEC_PLATFORM: 'windows', DIRSPEC_RUNTIME_POLICY: 'tmp' });
    expect(loadResolverConfig(env)).toEqual({ platform: 'windows', runtimePolicy: 'tmp' });
  });

  it('prefers explicit options over variables', () => {
    const env = createEnvironment({ DIRSPEC_PLATFORM: 'windows', DIRSPEC_RUNTIME_POLICY: 'tmp' });
    expect(loadResolverConfig(env, { platform: 'macos', runtimePolicy: 'uid' })).toEqual({
      platform: 'macos',
      runtimePolicy: 'uid',
    });
  });

  it('falls back to the detected platform for an unknown DIRSPEC_PLATFORM', () => {
    const env = createEnvironment({ DIRSPEC_PLATFORM: 'Linux' });
    expect(loadResolverConfig(env).platform).toBe(detectPlatform());
  });

  it('falls back to the uid policy for an unknown DIRSPEC_RUNTIME_POLICY', () => {
    const env = createEnvironment({ DIRSPEC_RUNTIME_POLICY: 'systemd' });
    expect(loadResolverConfig(env).runtimePolicy).toBe('uid');
  });

  it('logs the rejected variable when debug mode is on', () => {
    process.env.DIRSPEC_DEBUG = '1';
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    loadResolverConfig(createEnvironment({ DIRSPEC_RUNTIME_POLICY: 'systemd' }));

    expect(write).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(write.mock.calls[0][0]));
    expect(entry.label).toBe('config');
    expect(entry.data).toEqual({
      envVar: 'DIRSPEC_RUNTIME_POLICY',
      invalid: 'systemd',
      expected: ['uid', 'tmp'],
      using: 'uid',
    });
  });

  it('rejects an unknown platform option', () => {
    const options: ResolverOptions = JSON.parse('{"platform":"beos"}');
    expect(() => loadResolverConfig(createEnvironment({}), options)).toThrow(
      'Invalid platform option "beos". Expected one of: linux, macos, windows',
    );
  });

  it('rejects an unknown runtimePolicy option', () => {
    const options: ResolverOptions = JSON.parse('{"runtimePolicy":"systemd"}');
    expect(() => loadResolverConfig(createEnvironment({}), options)).toThrow(
      'Invalid runtimePolicy option "systemd". Expected one of: uid, tmp',
    );
  });
});

describe('CONFIG_VARIABLES', () => {
  it('documents a variable for every setting', () => {
    expect(CONFIG_VARIABLES.platform.envVar).toBe('DIRSPEC_PLATFORM');
    expect(CONFIG_VARIABLES.runtimePolicy.envVar).toBe('DIRSPEC_RUNTIME_POLICY');
    expect(CONFIG_VARIABLES.runtimePolicy.default).toBe('uid');
  });
});
