/**
 * 64-bit limb packing
 *
 * Both integer families keep their value as an array of 64-bit limbs in
 * little-endian limb order (limb 0 holds the least significant 64 bits).
 * These helpers move between limbs, bigint and byte buffers.
 */

const LIMB_MASK = (1n << 64n) - 1n;

/**
 * Convert a bigint value to limbs (little-endian)
 *
 * Bits above `64 * limbCount` are dropped; callers range-check beforehand.
 */
export function bigintToLimbs(value: bigint, limbCount: number): BigUint64Array {
  const limbs = new BigUint64Array(limbCount);

  let v = value;
  for (let i = 0; i < limbCount; i++) {
    limbs[i] = v & LIMB_MASK;
    v >>= 64n;
  }

  return limbs;
}

/**
 * Convert limbs to bigint (little-endian)
 */
export function limbsToBigint(limbs: BigUint64Array): bigint {
  let result = 0n;
  for (let i = limbs.length - 1; i >= 0; i--) {
    const limb = limbs[i];
    if (limb !== undefined) {
      result = (result << 64n) | limb;
    }
  }
  return result;
}

/**
 * Write limbs to a little-endian byte buffer of `limbs.length * 8` bytes
 */
export function limbsToLeBytes(limbs: BigUint64Array): Uint8Array {
  const bytes = new Uint8Array(limbs.length * 8);
  const view = new DataView(bytes.buffer);
  limbs.forEach((limb, i) => {
    view.setBigUint64(i * 8, limb, true);
  });
  return bytes;
}

/**
 * Read a little-endian byte buffer into `limbCount` limbs
 *
 * A buffer shorter than `limbCount * 8` is zero-extended at the most
 * significant end. Callers guarantee it is never longer.
 */
export function leBytesToLimbs(bytes: Uint8Array, limbCount: number): BigUint64Array {
  const padded = new Uint8Array(limbCount * 8);
  padded.set(bytes);
  const view = new DataView(padded.buffer);
  const limbs = new BigUint64Array(limbCount);
  for (let i = 0; i < limbCount; i++) {
    limbs[i] = view.getBigUint64(i * 8, true);
  }
  return limbs;
}

/**
 * Reverse byte order into a new buffer
 */
export function reverseBytes(bytes: Uint8Array): Uint8Array {
  return Uint8Array.from(bytes).reverse();
}

/**
 * Compare two limb arrays for equality
 */
export function limbsEqual(a: BigUint64Array, b: BigUint64Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Whether every limb is zero
 */
export function limbsAreZero(limbs: BigUint64Array): boolean {
  return limbs.every((limb) => limb === 0n);
}

/**
 * Number of significant bits (0 for zero)
 */
export function bitLength(value: bigint): number {
  return value === 0n ? 0 : value.toString(2).length;
}
