import type { EnvironmentReader } from './types.js';

function nonEmpty(value: string | undefined): string | undefined {
  return value ? value : undefined;
}

/** Reads `process.env` on every call, so changes made at runtime are visible. */
export const processEnvironment: EnvironmentReader = {
  read: (name) => nonEmpty(process.env[name]),
};

/**
 * Builds a reader over a fixed record of variables.
 * Useful for embedding and for tests that must not touch `process.env`.
 */
export function createEnvironment(vars: Record<string, string | undefined>): EnvironmentReader {
  return {
    read: (name) => (Object.prototype.hasOwnProperty.call(vars, name) ? nonEmpty(vars[name]) : undefined),
  };
}
