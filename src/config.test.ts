/**
 * Tests for library configuration and debug output
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { CompatError, ErrorCode } from './errors.js';
import {
  configure,
  getConfig,
  resetConfig,
  withoutValidation,
  type CompatConfig,
} from './config.js';
import { debugFromEnv, debugLog, isDebugEnabled } from './debug.js';

describe('configuration', () => {
  afterEach(() => {
    resetConfig();
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('should start from the defaults', () => {
    expect(getConfig()).toEqual({ validateInputs: true, debug: false });
  });

  it('should merge partial updates', () => {
    configure({ validateInputs: false });
    configure({});

    expect(getConfig()).toEqual({ validateInputs: false, debug: false });
  });

  it('should hand out a copy', () => {
    const config = getConfig();
    configure({ debug: false, validateInputs: false });

    expect(config.validateInputs).toBe(true);
  });

  it('should reset to the defaults', () => {
    configure({ validateInputs: false });
    resetConfig();

    expect(getConfig().validateInputs).toBe(true);
  });

  it('should reject unknown options', () => {
    const options: CompatConfig = {};
    Reflect.set(options, 'verbose', true);

    expect(() => configure(options)).toThrow("Invalid configuration option 'verbose': true");
  });

  it('should reject non-boolean values', () => {
    const options: CompatConfig = {};
    Reflect.set(options, 'debug', 'yes');

    try {
      configure(options);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(CompatError);
      if (error instanceof CompatError) {
        expect(error.code).toBe(ErrorCode.INVALID_CONFIG);
        expect(error.details).toEqual({
          option: 'debug',
          value: 'yes',
          validValues: [true, false],
        });
      }
    }
    expect(getConfig().debug).toBe(false);
  });

  it('should restore validation after withoutValidation', () => {
    const inside = withoutValidation(() => getConfig().validateInputs);

    expect(inside).toBe(false);
    expect(getConfig().validateInputs).toBe(true);
  });

  describe('debug output', () => {
    it('should follow the debug option', () => {
      expect(isDebugEnabled()).toBe(false);
      configure({ debug: true });
      expect(isDebugEnabled()).toBe(true);
      configure({ debug: false });
      expect(isDebugEnabled()).toBe(false);
    });

    it('should recognize the debug environment variables', () => {
      expect(debugFromEnv({ DEBUG: 'app,primitives-compat' })).toBe(true);
      expect(debugFromEnv({ PRIMITIVES_COMPAT_DEBUG: 'true' })).toBe(true);
      expect(debugFromEnv({ PRIMITIVES_COMPAT_DEBUG: '1' })).toBe(true);
      expect(debugFromEnv({ DEBUG: 'app', PRIMITIVES_COMPAT_DEBUG: '0' })).toBe(false);
      expect(debugFromEnv({})).toBe(false);
    });

    it('should not re-read the environment after loading', () => {
      vi.stubEnv('DEBUG', 'primitives-compat');

      expect(isDebugEnabled()).toBe(false);
    });

    it('should write scoped lines with structured data', () => {
      const spy = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
      configure({ debug: true });
      spy.mockClear();

      debugLog('test', 'hello', { n: 1 });

      expect(spy).toHaveBeenCalledTimes(1);
      expect(spy).toHaveBeenCalledWith(
        expect.stringMatching(/^\[.+\] \[primitives-compat:test\] hello$/),
        { n: 1 }
      );
    });

    it('should write nothing when disabled', () => {
      const spy = vi.spyOn(console, 'debug').mockImplementation(() => undefined);

      debugLog('test', 'hello');

      expect(spy).not.toHaveBeenCalled();
    });
  });
});
