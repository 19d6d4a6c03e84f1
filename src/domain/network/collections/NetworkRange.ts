/**
 * NetworkRange - the children of a network at a longer prefix length
 *
 * Nothing is materialised: child `i` is computed on demand as
 * `parent.base + i * 2^(width - prefixLength)`, so a /64 split of an IPv6
 * /32 costs the same as a /25 split of an IPv4 /24. Each iteration starts
 * again from the first child.
 *
 * Built by `subnet()`, which validates the split.
 */

import { orNull, unwrap } from '@/core/errors';
import type { Result } from '@/core/errors';
import { IPNetwork } from '../value-objects/IPNetwork';
import { toIndex } from './rangeUtils';

export class NetworkRange implements Iterable<IPNetwork> {
  readonly parent: IPNetwork;
  readonly prefixLength: number;
  /** 2^(prefixLength - parent.prefixLength) */
  readonly count: bigint;
  private readonly step: bigint;

  constructor(parent: IPNetwork, prefixLength: number) {
    this.parent = parent;
    this.prefixLength = prefixLength;
    this.count = 1n << BigInt(prefixLength - parent.prefixLength);
    this.step = 1n << BigInt(parent.bitWidth - prefixLength);
  }

  atResult(index: bigint | number): Result<IPNetwork> {
    const i = toIndex(index, this.count);
    if (!i.ok) return i;
    return IPNetwork.fromIntegerResult(this.parent.networkValue + i.value * this.step, this.parent.family, this.prefixLength);
  }

  /**
   * @throws {IPNetworkError} IndexOutOfRange
   */
  at(index: bigint | number): IPNetwork {
    return unwrap(this.atResult(index));
  }

  tryAt(index: bigint | number): IPNetwork | null {
    return orNull(this.atResult(index));
  }

  get first(): IPNetwork {
    return this.at(0n);
  }

  get last(): IPNetwork {
    return this.at(this.count - 1n);
  }

  *[Symbol.iterator](): Iterator<IPNetwork> {
    for (let i = 0n; i < this.count; i++) {
      yield this.at(i);
    }
  }
}
