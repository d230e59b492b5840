/**
 * 256-byte (2048-bit) bloom filter
 */

import {
  accrueBloomBytes,
  accrueInput,
  bloomContainsBloom,
  bloomContainsInput,
} from '../encoding/bloom.js';
import { COMPAT, type Compat } from '../compat/sealed.js';
import { hashToFixedBytes } from '../compat/fixed.js';
import { Bloom as PrimitivesBloom } from '../primitives/bloom.js';
import { FixedHash } from './fixed-hash.js';

export class Bloom extends FixedHash<256> implements Compat<PrimitivesBloom> {
  static readonly LEN = 256;

  constructor(bytes: Uint8Array) {
    super(bytes, Bloom.LEN);
  }

  /**
   * A filter with the three bits of `input` added
   */
  accrue(input: Uint8Array): Bloom {
    const bytes = this.asBytes();
    accrueInput(bytes, input);
    return new Bloom(bytes);
  }

  /**
   * A filter with every bit of `other` added
   */
  accrueBloom(other: Bloom): Bloom {
    const bytes = this.asBytes();
    accrueBloomBytes(bytes, other.asBytes());
    return new Bloom(bytes);
  }

  containsInput(input: Uint8Array): boolean {
    return bloomContainsInput(this.asBytes(), input);
  }

  containsBloom(other: Bloom): boolean {
    return bloomContainsBloom(this.asBytes(), other.asBytes());
  }

  isEmpty(): boolean {
    return this.isZero();
  }

  [COMPAT](): PrimitivesBloom {
    return hashToFixedBytes(this, PrimitivesBloom);
  }
}
