import * as path from 'node:path';
import { z } from 'zod';
import { DIRECTORY_KINDS, PLATFORM_FAMILIES, RUNTIME_POLICIES } from './types.js';
import type { PlatformFamily } from './types.js';

export const DirectoryKindSchema = z.enum(DIRECTORY_KINDS);
export const PlatformFamilySchema = z.enum(PLATFORM_FAMILIES);
export const RuntimePolicySchema = z.enum(RUNTIME_POLICIES);

/**
 * Maps a Node.js platform identifier (`process.platform`) to a platform family.
 * Anything that is neither macOS nor Windows follows the Linux conventions.
 */
export function detectPlatform(nodePlatform: string = process.platform): PlatformFamily {
  switch (nodePlatform) {
    case 'darwin':
      return 'macos';
    case 'win32':
      return 'windows';
    default:
      return 'linux';
  }
}

/** Path helpers for the family's separator and root rules, independent of the host. */
export function pathFlavor(platform: PlatformFamily): path.PlatformPath {
  return platform === 'windows' ? path.win32 : path.posix;
}
