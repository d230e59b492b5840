/**
 * Library Configuration
 *
 * Process-wide settings for the value constructors of both families.
 * Conversions do not read any of these settings; they only affect how
 * values are built from untrusted input and whether debug lines are written.
 *
 * @module config
 */

import { invalidConfigError } from './errors.js';
import { debugLog, setDebugFlag } from './debug.js';

/**
 * Global library configuration options
 *
 * @example
 * ```typescript
 * import { configure } from 'primitives-compat';
 *
 * configure({
 *   validateInputs: false, // trust inputs, wrap integers instead of throwing
 *   debug: true,
 * });
 * ```
 */
export interface CompatConfig {
  /**
   * Whether constructors run the non-structural input checks (default: true):
   * address checksum verification and the integer range check. Byte lengths
   * are always checked.
   */
  validateInputs?: boolean;
  /** Enable debug logging (default: false) */
  debug?: boolean;
}

const DEFAULT_CONFIG: Required<CompatConfig> = {
  validateInputs: true,
  debug: false,
};

const CONFIG_KEYS = Object.keys(DEFAULT_CONFIG);

// Global configuration state
let globalConfig: Required<CompatConfig> = { ...DEFAULT_CONFIG };

function assertConfig(config: CompatConfig): void {
  for (const [option, value] of Object.entries(config)) {
    if (!CONFIG_KEYS.includes(option)) {
      throw invalidConfigError(option, value, CONFIG_KEYS);
    }
    if (value !== undefined && typeof value !== 'boolean') {
      throw invalidConfigError(option, value, [true, false]);
    }
  }
}

/**
 * Configure global library settings
 *
 * @throws CompatError with INVALID_CONFIG for unknown keys or non-boolean values
 */
export function configure(config: CompatConfig): void {
  assertConfig(config);
  globalConfig = {
    validateInputs: config.validateInputs ?? globalConfig.validateInputs,
    debug: config.debug ?? globalConfig.debug,
  };
  setDebugFlag(globalConfig.debug);
  debugLog('config', 'Configuration updated', { ...globalConfig });
}

/**
 * Get the current library configuration
 */
export function getConfig(): Readonly<Required<CompatConfig>> {
  return { ...globalConfig };
}

/**
 * Reset configuration to defaults
 */
export function resetConfig(): void {
  globalConfig = { ...DEFAULT_CONFIG };
  setDebugFlag(globalConfig.debug);
  debugLog('config', 'Configuration reset');
}

/**
 * Run a function with input validation temporarily disabled
 *
 * The previous setting is restored even if `fn` throws.
 *
 * @param fn - Function to run without validation
 * @returns The result of the function
 */
export function withoutValidation<T>(fn: () => T): T {
  const previous = globalConfig.validateInputs;
  globalConfig = { ...globalConfig, validateInputs: false };
  try {
    return fn();
  } finally {
    globalConfig = { ...globalConfig, validateInputs: previous };
  }
}
