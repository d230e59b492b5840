/**
 * Debug logging
 *
 * Lines are written with console.debug and only when debugging is switched on,
 * either through `configure({ debug: true })` or the environment:
 * `DEBUG` containing `primitives-compat`, or `PRIMITIVES_COMPAT_DEBUG` set to
 * `1` / `true`. The environment is read once, when the module loads.
 */

/**
 * Whether an environment asks for debug output
 */
export function debugFromEnv(env: NodeJS.ProcessEnv = process.env): boolean {
  const debugEnv = env['DEBUG'];
  const compatDebugEnv = env['PRIMITIVES_COMPAT_DEBUG'];
  return (
    debugEnv?.includes('primitives-compat') === true ||
    compatDebugEnv === '1' ||
    compatDebugEnv === 'true'
  );
}

// read once at load
const ENV_DEBUG = debugFromEnv();

let debugEnabled = ENV_DEBUG;

/**
 * Set the configuration-level debug flag (called by the config module)
 *
 * Debug output stays on while the environment asks for it.
 */
export function setDebugFlag(enabled: boolean): void {
  debugEnabled = enabled || ENV_DEBUG;
}

/**
 * Whether debug lines are currently emitted
 */
export function isDebugEnabled(): boolean {
  return debugEnabled;
}

/**
 * Emit a debug line under the given scope
 *
 * @param scope - Subsystem name, e.g. 'compat' or 'config'
 * @param message - Log message
 * @param data - Optional structured context
 */
export function debugLog(scope: string, message: string, data?: Record<string, unknown>): void {
  if (!isDebugEnabled()) {
    return;
  }
  const timestamp = new Date().toISOString();
  const prefix = `[${timestamp}] [primitives-compat:${scope}]`;
  if (data) {
    console.debug(`${prefix} ${message}`, data);
  } else {
    console.debug(`${prefix} ${message}`);
  }
}
