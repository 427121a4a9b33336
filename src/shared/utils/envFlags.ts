// Shared helpers for reading environment flags. The engine itself never
// depends on host configuration; these reads only gate debug tracing.

type ProcessEnv = Record<string, string | undefined>;
function getProcessEnv(): ProcessEnv | undefined {
  if (typeof process !== 'undefined' && typeof process.env === 'object') {
    return process.env;
  }
  return undefined;
}

export function readEnv(name: string): string | undefined {
  const env = getProcessEnv();
  if (env) {
    const value = env[name];
    if (typeof value === 'string') {
      return value;
    }
  }

  return undefined;
}

/**
 * Returns true if running inside a Jest worker process.
 * This is useful for detecting test runtime even when NODE_ENV might be
 * configured differently (e.g., NODE_ENV=development in Jest).
 */
export function isJestRuntime(): boolean {
  return readEnv('JEST_WORKER_ID') !== undefined;
}

export function flagEnabled(name: string): boolean {
  const raw = readEnv(name);
  if (!raw) return false;
  return raw === '1' || raw === 'true' || raw === 'TRUE';
}

/**
 * Trace capture resolution and turn settlement inside the shared engine.
 * Set OTHELLO_DEBUG_ENGINE=1 to enable.
 */
export function isEngineDebugEnabled(): boolean {
  return flagEnabled('OTHELLO_DEBUG_ENGINE');
}

/**
 * Debug logging wrapper for logs that are gated by environment flags.
 * The wrapped console.log is only invoked if the condition is true.
 *
 * @example
 * debugLog(isEngineDebugEnabled(), '[GameEngine] pass', { player });
 */
export function debugLog(condition: boolean, ...args: unknown[]): void {
  if (condition) {
    // eslint-disable-next-line no-console
    console.log(...args);
  }
}
