/**
 * Write a JSON trace line to stderr when `DIRSPEC_DEBUG` is enabled.
 * No-ops silently when debug mode is off.
 * @param label - Short tag identifying the log source (e.g. `"resolver"`, `"home"`).
 * @param data - Arbitrary payload serialized as JSON.
 */
export function debugLog(label: string, data: unknown): void {
  if (process.env.DIRSPEC_DEBUG !== 'true' && process.env.DIRSPEC_DEBUG !== '1') return;

  const entry = JSON.stringify({ timestamp: new Date().toISOString(), label, data });
  process.stderr.write(entry + '\n');
}
