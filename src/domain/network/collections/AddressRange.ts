/**
 * AddressRange - the addresses of a network selected by a filter
 *
 * Filters:
 * - all       every address, network through broadcast
 * - usable    IPv4 hosts between network and broadcast; every address for IPv6
 * - unusable  IPv4 network and broadcast addresses (what "usable" leaves out)
 * - broadcast the IPv4 broadcast address (none for IPv6)
 * - network   the network address
 *
 * `count` is computed up front; addresses are produced one at a time.
 */

import { orNull, unwrap, ok } from '@/core/errors';
import type { Result } from '@/core/errors';
import { IPAddress } from '../value-objects/IPAddress';
import type { IPNetwork } from '../value-objects/IPNetwork';
import { toIndex } from './rangeUtils';

export type AddressFilter = 'all' | 'usable' | 'unusable' | 'broadcast' | 'network';

function countFor(network: IPNetwork, filter: AddressFilter): bigint {
  switch (filter) {
    case 'all':
      return network.total;
    case 'usable':
      return network.usable;
    case 'unusable':
      return network.total - network.usable;
    case 'broadcast':
      return network.family === 'IPv4' ? 1n : 0n;
    case 'network':
      return 1n;
  }
}

export class AddressRange implements Iterable<IPAddress> {
  readonly network: IPNetwork;
  readonly filter: AddressFilter;
  readonly count: bigint;

  constructor(network: IPNetwork, filter: AddressFilter = 'all') {
    this.network = network;
    this.filter = filter;
    this.count = countFor(network, filter);
  }

  private valueAt(i: bigint): bigint {
    const { networkValue, broadcastValue, family } = this.network;
    switch (this.filter) {
      case 'all':
        return networkValue + i;
      case 'usable':
        return family === 'IPv4' ? networkValue + 1n + i : networkValue + i;
      case 'unusable':
        return i === 0n ? networkValue : broadcastValue;
      case 'broadcast':
        return broadcastValue;
      case 'network':
        return networkValue;
    }
  }

  atResult(index: bigint | number): Result<IPAddress> {
    const i = toIndex(index, this.count);
    if (!i.ok) return i;
    return ok(new IPAddress(this.valueAt(i.value), this.network.family));
  }

  /**
   * @throws {IPNetworkError} IndexOutOfRange
   */
  at(index: bigint | number): IPAddress {
    return unwrap(this.atResult(index));
  }

  tryAt(index: bigint | number): IPAddress | null {
    return orNull(this.atResult(index));
  }

  *[Symbol.iterator](): Iterator<IPAddress> {
    for (let i = 0n; i < this.count; i++) {
      yield new IPAddress(this.valueAt(i), this.network.family);
    }
  }
}
