/**
 * Unified conversion entry point
 *
 * @example
 * ```typescript
 * import { compat, primitives, ethtypes } from 'primitives-compat';
 *
 * // from primitives to ethtypes
 * const address = primitives.Address.fromHex('0xdeadbeefdeadbeefdeadbeefdeadbeef00000000');
 * const ethAddress: ethtypes.Address = compat(address);
 *
 * // from ethtypes to primitives
 * const hash: primitives.B256 = compat(ethtypes.H256.zero());
 *
 * // integers are supported
 * const max: primitives.U128 = compat(ethtypes.U128.MAX);
 * ```
 *
 * @module compat
 */

import { debugLog, isDebugEnabled } from '../debug.js';
import { COMPAT, type Compat } from './sealed.js';

export type { Compat } from './sealed.js';

/**
 * The counterpart type of `S` in the other family, or `never` when `S` has
 * no pairing
 */
export type Counterpart<S> = S extends Compat<infer T> ? T : never;

function typeName(value: unknown): string {
  return typeof value === 'object' && value !== null ? value.constructor.name : typeof value;
}

/**
 * Convert a value into its counterpart in the other family
 *
 * The destination type is fixed by the source's type. Passing a value whose
 * type has no pairing is a compile-time error; for paired types the
 * conversion cannot fail.
 */
export function compat<T>(source: Compat<T>): T {
  const target = source[COMPAT]();
  if (isDebugEnabled()) {
    debugLog('compat', `${typeName(source)} -> ${typeName(target)}`);
  }
  return target;
}
