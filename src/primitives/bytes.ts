/**
 * Fixed bytes of each supported length
 *
 * Lengths that also exist in the `ethtypes` family implement the conversion
 * capability towards the matching hash type.
 */

import { COMPAT, type Compat } from '../compat/sealed.js';
import { fixedBytesToHash } from '../compat/fixed.js';
import { H64, H128, H256, H512 } from '../ethtypes/hash.js';
import { FixedBytes } from './fixed-bytes.js';

/** 4 bytes. No `ethtypes` counterpart. */
export class B32 extends FixedBytes<4> {
  static readonly BYTES = 4;

  constructor(bytes: Uint8Array) {
    super(bytes, B32.BYTES);
  }
}

export class B64 extends FixedBytes<8> implements Compat<H64> {
  static readonly BYTES = 8;

  constructor(bytes: Uint8Array) {
    super(bytes, B64.BYTES);
  }

  [COMPAT](): H64 {
    return fixedBytesToHash(this, H64);
  }
}

export class B128 extends FixedBytes<16> implements Compat<H128> {
  static readonly BYTES = 16;

  constructor(bytes: Uint8Array) {
    super(bytes, B128.BYTES);
  }

  [COMPAT](): H128 {
    return fixedBytesToHash(this, H128);
  }
}

/**
 * 20 raw bytes. Addresses use `Address`, which is the only 20-byte type that
 * converts to `ethtypes`.
 */
export class B160 extends FixedBytes<20> {
  static readonly BYTES = 20;

  constructor(bytes: Uint8Array) {
    super(bytes, B160.BYTES);
  }
}

/** 32 bytes, the canonical hash width */
export class B256 extends FixedBytes<32> implements Compat<H256> {
  static readonly BYTES = 32;

  constructor(bytes: Uint8Array) {
    super(bytes, B256.BYTES);
  }

  [COMPAT](): H256 {
    return fixedBytesToHash(this, H256);
  }
}

/** 33 bytes (compressed public key). No `ethtypes` counterpart. */
export class B264 extends FixedBytes<33> {
  static readonly BYTES = 33;

  constructor(bytes: Uint8Array) {
    super(bytes, B264.BYTES);
  }
}

export class B512 extends FixedBytes<64> implements Compat<H512> {
  static readonly BYTES = 64;

  constructor(bytes: Uint8Array) {
    super(bytes, B512.BYTES);
  }

  [COMPAT](): H512 {
    return fixedBytesToHash(this, H512);
  }
}

/** 65 bytes (uncompressed public key / signature). No `ethtypes` counterpart. */
export class B520 extends FixedBytes<65> {
  static readonly BYTES = 65;

  constructor(bytes: Uint8Array) {
    super(bytes, B520.BYTES);
  }
}
