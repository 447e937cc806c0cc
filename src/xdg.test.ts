import { describe, it, expect } from 'vitest';
import { createEnvironment } from './env.js';
import { resolveOverride, XDG_OVERRIDES } from './xdg.js';
import { DIRECTORY_KINDS } from './types.js';
import type { DirectoryKind } from './types.js';

const overridable = DIRECTORY_KINDS.filter((kind) => XDG_OVERRIDES[kind] !== undefined);

describe('XDG_OVERRIDES', () => {
  it('assigns no variable to home, configLocal, dataLocal, fonts or preferences', () => {
    const without = DIRECTORY_KINDS.filter((kind) => XDG_OVERRIDES[kind] === undefined);
    expect(without).toEqual(['home', 'configLocal', 'dataLocal', 'fonts', 'preferences']);
  });

  it('uses XDG_DOWNLOAD_DIR for downloads', () => {
    expect(XDG_OVERRIDES.downloads).toBe('XDG_DOWNLOAD_DIR');
  });
});

describe('resolveOverride', () => {
  it.each(overridable)('returns an absolute %s override verbatim', (kind: DirectoryKind) => {
    const name = XDG_OVERRIDES[kind] ?? '';
    const env = createEnvironment({ [name]: '/test/override/' });
    expect(resolveOverride(kind, 'linux', env)).toBe('/test/override/');
  });

  it.each(overridable)('ignores a relative %s override', (kind: DirectoryKind) => {
    const name = XDG_OVERRIDES[kind] ?? '';
    const env = createEnvironment({ [name]: 'relative/override' });
    expect(resolveOverride(kind, 'macos', env)).toBeUndefined();
  });

  it('returns undefined when the variable is unset', () => {
    expect(resolveOverride('configHome', 'linux', createEnvironment({}))).toBeUndefined();
  });

  it('returns undefined for kinds without a variable', () => {
    const env = createEnvironment({ XDG_CONFIG_HOME: '/test/config' });
    expect(resolveOverride('preferences', 'linux', env)).toBeUndefined();
  });

  describe('windows', () => {
    it('accepts drive-qualified paths', () => {
      const env = createEnvironment({ XDG_CACHE_HOME: 'C:\\test\\cache' });
      expect(resolveOverride('cacheHome', 'windows', env)).toBe('C:\\test\\cache');
    });

    it('accepts rooted paths', () => {
      const env = createEnvironment({ XDG_CONFIG_HOME: '/test/config' });
      expect(resolveOverride('configHome', 'windows', env)).toBe('/test/config');
    });

    it('ignores relative paths', () => {
      const env = createEnvironment({ XDG_CACHE_HOME: 'relative\\cache' });
      expect(resolveOverride('cacheHome', 'windows', env)).toBeUndefined();
    });
  });

  it('treats drive-qualified paths as relative on unix families', () => {
    const env = createEnvironment({ XDG_DATA_HOME: 'C:\\data' });
    expect(resolveOverride('dataHome', 'linux', env)).toBeUndefined();
  });
});
