/**
 * `ethtypes` value family: per-width hashes (`H64` … `H512`), `Address`
 * (= `H160`), `Bloom` and word-backed unsigned integers (`U64` … `U512`)
 */

export { FixedHash, type FixedHashClass } from './fixed-hash.js';
export { H64, H128, H160, H256, H512, Address } from './hash.js';
export { Bloom } from './bloom.js';
export { WordUint, U64, U128, U256, U512, type WordUintClass } from './uint.js';
