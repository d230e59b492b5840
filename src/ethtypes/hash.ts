/**
 * Hashes of each supported width
 */

import { COMPAT, type Compat } from '../compat/sealed.js';
import { hashToFixedBytes } from '../compat/fixed.js';
import { B64, B128, B256, B512 } from '../primitives/bytes.js';
import { Address as PrimitivesAddress } from '../primitives/address.js';
import { FixedHash } from './fixed-hash.js';

export class H64 extends FixedHash<8> implements Compat<B64> {
  static readonly LEN = 8;

  constructor(bytes: Uint8Array) {
    super(bytes, H64.LEN);
  }

  [COMPAT](): B64 {
    return hashToFixedBytes(this, B64);
  }
}

export class H128 extends FixedHash<16> implements Compat<B128> {
  static readonly LEN = 16;

  constructor(bytes: Uint8Array) {
    super(bytes, H128.LEN);
  }

  [COMPAT](): B128 {
    return hashToFixedBytes(this, B128);
  }
}

/** 20 bytes; also exported as `Address` */
export class H160 extends FixedHash<20> implements Compat<PrimitivesAddress> {
  static readonly LEN = 20;

  constructor(bytes: Uint8Array) {
    super(bytes, H160.LEN);
  }

  [COMPAT](): PrimitivesAddress {
    return hashToFixedBytes(this, PrimitivesAddress);
  }
}

export class H256 extends FixedHash<32> implements Compat<B256> {
  static readonly LEN = 32;

  constructor(bytes: Uint8Array) {
    super(bytes, H256.LEN);
  }

  [COMPAT](): B256 {
    return hashToFixedBytes(this, B256);
  }
}

export class H512 extends FixedHash<64> implements Compat<B512> {
  static readonly LEN = 64;

  constructor(bytes: Uint8Array) {
    super(bytes, H512.LEN);
  }

  [COMPAT](): B512 {
    return hashToFixedBytes(this, B512);
  }
}

export { H160 as Address };
