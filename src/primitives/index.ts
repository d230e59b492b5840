/**
 * `primitives` value family: fixed bytes (`B64` … `B512`), `Address`,
 * `Bloom` and limb-backed unsigned integers (`U64` … `U512`)
 */

export { FixedBytes, type FixedBytesClass } from './fixed-bytes.js';
export {
  B32,
  B64,
  B128,
  B160,
  B256,
  B264,
  B512,
  B520,
} from './bytes.js';
export { Address, toChecksumHex } from './address.js';
export { Bloom } from './bloom.js';
export { Uint, U64, U128, U256, U512, type UintClass } from './uint.js';
