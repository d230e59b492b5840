/**
 * primitives-compat
 *
 * Conversions between two families of binary value types that model the same
 * things (fixed-size hashes, addresses, bloom filters and wide unsigned
 * integers) with different representations:
 *
 * - `primitives`: `FixedBytes`-based `B64` … `B512`, `Address`, `Bloom`, and
 *   limb-backed `U64` … `U512` with `toLeBytes` / `fromLeBytes`
 * - `ethtypes`: per-width `H64` … `H512`, `Address` (= `H160`), `Bloom`, and
 *   word-backed `U64` … `U512` with `toLittleEndian` / `fromLittleEndian`
 *
 * @example
 * ```typescript
 * import { compat, primitives, ethtypes } from 'primitives-compat';
 *
 * // from primitives to ethtypes
 * const address = primitives.Address.fromHex('deadbeefdeadbeefdeadbeefdeadbeef00000000');
 * const ethAddress: ethtypes.Address = compat(address);
 *
 * // from ethtypes to primitives
 * const hash: primitives.B256 = compat(ethtypes.H256.zero());
 *
 * // integers are supported
 * const max: primitives.U128 = compat(ethtypes.U128.MAX);
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Value families
// ============================================================================
export * as primitives from './primitives/index.js';
export * as ethtypes from './ethtypes/index.js';

// ============================================================================
// Conversion
// ============================================================================
export { compat, type Compat, type Counterpart } from './compat/index.js';

// ============================================================================
// Configuration and errors
// ============================================================================
export {
  configure,
  getConfig,
  resetConfig,
  withoutValidation,
  type CompatConfig,
} from './config.js';

export {
  CompatError,
  ErrorCode,
  isCompatError,
  invalidByteLengthError,
  invalidHexError,
  invalidChecksumError,
  valueOutOfRangeError,
  invalidConfigError,
} from './errors.js';

export type {
  ByteLength,
  PairedByteLength,
  UnpairedByteLength,
  UintBits,
  UintBytes,
  UintInput,
} from './types.js';
