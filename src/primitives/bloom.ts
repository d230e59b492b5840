/**
 * 256-byte (2048-bit) bloom filter
 *
 * Values are immutable: `accrue` and `accrueBloom` return a new filter.
 */

import {
  accrueBloomBytes,
  accrueInput,
  bloomContainsBloom,
  bloomContainsInput,
} from '../encoding/bloom.js';
import { COMPAT, type Compat } from '../compat/sealed.js';
import { fixedBytesToHash } from '../compat/fixed.js';
import { Bloom as EthBloom } from '../ethtypes/bloom.js';
import { FixedBytes } from './fixed-bytes.js';

export class Bloom extends FixedBytes<256> implements Compat<EthBloom> {
  static readonly BYTES = 256;

  constructor(bytes: Uint8Array) {
    super(bytes, Bloom.BYTES);
  }

  /**
   * A filter with the three bits of `input` added
   */
  accrue(input: Uint8Array): Bloom {
    const bytes = this.toBytes();
    accrueInput(bytes, input);
    return new Bloom(bytes);
  }

  /**
   * A filter with every bit of `other` added
   */
  accrueBloom(other: Bloom): Bloom {
    const bytes = this.toBytes();
    accrueBloomBytes(bytes, other.toBytes());
    return new Bloom(bytes);
  }

  /**
   * Whether `input` may have been added (false positives are possible)
   */
  containsInput(input: Uint8Array): boolean {
    return bloomContainsInput(this.toBytes(), input);
  }

  containsBloom(other: Bloom): boolean {
    return bloomContainsBloom(this.toBytes(), other.toBytes());
  }

  isEmpty(): boolean {
    return this.isZero();
  }

  [COMPAT](): EthBloom {
    return fixedBytesToHash(this, EthBloom);
  }
}
