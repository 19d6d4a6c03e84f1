/**
 * IPNetwork Value Object
 *
 * A network prefix in CIDR form: the canonical triple
 * { base address, prefix length, family }. The base always has its host
 * bits cleared; every factory funnels into one canonicalising constructor.
 *
 * Immutable apart from the broadcast value, which is computed on first use
 * and then kept. The identity key is computed once at construction, so
 * instances can be indexed in a Map by `network.key`.
 *
 * @example
 * ```typescript
 * const net = IPNetwork.fromPrefix('192.168.168.100', 24);
 * net.toString();            // '192.168.168.0/24'
 * net.broadcast?.toString(); // '192.168.168.255'
 * net.usable;                // 254n
 * net.contains(IPAddress.parse('192.168.168.7')); // true
 * ```
 */

import { fail, ok, orNull, unwrap } from '@/core/errors';
import type { Result } from '@/core/errors';
import { bitWidth, compareFamilies, familyMask } from '../AddressFamily';
import type { AddressFamily } from '../AddressFamily';
import {
  broadcast,
  cidrFromNetmaskResult,
  netmaskResult,
  totalCount,
  usableCount,
  wildcard,
} from '../PrefixMath';
import { IPAddress } from './IPAddress';

function toAddress(address: IPAddress | string): Result<IPAddress> {
  return typeof address === 'string' ? IPAddress.parseResult(address) : ok(address);
}

export class IPNetwork {
  readonly family: AddressFamily;
  readonly prefixLength: number;
  readonly networkValue: bigint;
  readonly netmaskValue: bigint;
  /** `family|base|prefixLength`, fixed at construction */
  readonly key: string;

  private cachedBroadcast: bigint | undefined;

  private constructor(value: bigint, family: AddressFamily, prefixLength: number, mask: bigint) {
    this.family = family;
    this.prefixLength = prefixLength;
    this.netmaskValue = mask;
    this.networkValue = value & mask;
    this.key = `${family}|${this.networkValue}|${prefixLength}`;
  }

  // ─── Factories ─────────────────────────────────────────────────

  /**
   * Canonicalising entry point: validates the length and masks the base
   */
  static fromIntegerResult(value: bigint, family: AddressFamily, prefixLength: number): Result<IPNetwork> {
    const mask = netmaskResult(prefixLength, family);
    if (!mask.ok) return mask;
    if (value < 0n || value > familyMask(family)) {
      return fail('MalformedAddress', `Value ${value} does not fit in an ${family} address`);
    }
    return ok(new IPNetwork(value, family, prefixLength, mask.value));
  }

  static fromInteger(value: bigint, family: AddressFamily, prefixLength: number): IPNetwork {
    return unwrap(IPNetwork.fromIntegerResult(value, family, prefixLength));
  }

  static tryFromInteger(value: bigint, family: AddressFamily, prefixLength: number): IPNetwork | null {
    return orNull(IPNetwork.fromIntegerResult(value, family, prefixLength));
  }

  static fromPrefixResult(address: IPAddress | string, prefixLength: number): Result<IPNetwork> {
    const ip = toAddress(address);
    if (!ip.ok) return ip;
    return IPNetwork.fromIntegerResult(ip.value.value, ip.value.family, prefixLength);
  }

  /**
   * @throws {IPNetworkError} MalformedAddress or PrefixOutOfRange
   */
  static fromPrefix(address: IPAddress | string, prefixLength: number): IPNetwork {
    return unwrap(IPNetwork.fromPrefixResult(address, prefixLength));
  }

  static tryFromPrefix(address: IPAddress | string, prefixLength: number): IPNetwork | null {
    return orNull(IPNetwork.fromPrefixResult(address, prefixLength));
  }

  static fromNetmaskResult(address: IPAddress | string, netmask: IPAddress | string): Result<IPNetwork> {
    const ip = toAddress(address);
    if (!ip.ok) return ip;

    const mask = toAddress(netmask);
    if (!mask.ok) {
      return fail('MalformedNetmask', mask.error.message);
    }
    if (mask.value.family !== ip.value.family) {
      return fail('MixedAddressFamily', `Netmask ${mask.value} is ${mask.value.family} but address ${ip.value} is ${ip.value.family}`);
    }

    const cidr = cidrFromNetmaskResult(mask.value.value, mask.value.family);
    if (!cidr.ok) return cidr;
    return IPNetwork.fromIntegerResult(ip.value.value, ip.value.family, cidr.value);
  }

  /**
   * @throws {IPNetworkError} MalformedAddress, MalformedNetmask, MixedAddressFamily or InvalidNetmask
   */
  static fromNetmask(address: IPAddress | string, netmask: IPAddress | string): IPNetwork {
    return unwrap(IPNetwork.fromNetmaskResult(address, netmask));
  }

  static tryFromNetmask(address: IPAddress | string, netmask: IPAddress | string): IPNetwork | null {
    return orNull(IPNetwork.fromNetmaskResult(address, netmask));
  }

  /** The zero value, 0.0.0.0/0 */
  static zero(): IPNetwork {
    return new IPNetwork(0n, 'IPv4', 0, 0n);
  }

  // ─── Derived values ────────────────────────────────────────────

  get broadcastValue(): bigint {
    if (this.cachedBroadcast === undefined) {
      this.cachedBroadcast = broadcast(this.networkValue, this.netmaskValue, this.family);
    }
    return this.cachedBroadcast;
  }

  get network(): IPAddress {
    return new IPAddress(this.networkValue, this.family);
  }

  get netmask(): IPAddress {
    return new IPAddress(this.netmaskValue, this.family);
  }

  get wildcardMask(): IPAddress {
    return new IPAddress(wildcard(this.netmaskValue, this.family), this.family);
  }

  /** IPv4 only; IPv6 has no broadcast address */
  get broadcast(): IPAddress | null {
    return this.family === 'IPv6' ? null : this.lastAddress;
  }

  /** Highest address in the range, for either family */
  get lastAddress(): IPAddress {
    return new IPAddress(this.broadcastValue, this.family);
  }

  get firstUsable(): IPAddress {
    const first = this.family === 'IPv4' && this.usable > 0n ? this.networkValue + 1n : this.networkValue;
    return new IPAddress(first, this.family);
  }

  get lastUsable(): IPAddress {
    let last = this.broadcastValue;
    if (this.family === 'IPv4') {
      last = this.usable > 0n ? this.broadcastValue - 1n : this.networkValue;
    }
    return new IPAddress(last, this.family);
  }

  get usable(): bigint {
    return usableCount(this.prefixLength, this.family);
  }

  get total(): bigint {
    return totalCount(this.prefixLength, this.family);
  }

  get bitWidth(): number {
    return bitWidth(this.family);
  }

  // ─── Predicates ────────────────────────────────────────────────

  /**
   * Address: true when it lies in [network, broadcast].
   * Network: true when its whole range lies inside this one.
   * Always false across families.
   */
  contains(target: IPAddress | IPNetwork): boolean {
    if (target.family !== this.family) {
      return false;
    }
    if (target instanceof IPAddress) {
      return target.value >= this.networkValue && target.value <= this.broadcastValue;
    }
    return target.networkValue >= this.networkValue && target.broadcastValue <= this.broadcastValue;
  }

  /**
   * True if the two ranges share at least one address
   */
  overlaps(other: IPNetwork): boolean {
    if (other.family !== this.family) {
      return false;
    }
    const first = other.networkValue;
    const last = other.broadcastValue;
    const start = this.networkValue;
    const end = this.broadcastValue;

    return (first >= start && first <= end)
      || (last >= start && last <= end)
      || (first <= start && last >= end)
      || (first >= start && last <= end);
  }

  // ─── Comparison ────────────────────────────────────────────────

  /**
   * Orders by family, then base, then prefix length
   */
  static compare(left: IPNetwork, right: IPNetwork): number {
    if (left === right) return 0;

    const byFamily = compareFamilies(left.family, right.family);
    if (byFamily !== 0) return byFamily;

    if (left.networkValue !== right.networkValue) {
      return left.networkValue < right.networkValue ? -1 : 1;
    }
    return left.prefixLength - right.prefixLength;
  }

  compareTo(other: IPNetwork): number {
    return IPNetwork.compare(this, other);
  }

  equals(other: IPNetwork | null | undefined): boolean {
    return other != null && this.key === other.key;
  }

  // ─── Serialization ─────────────────────────────────────────────

  /** Canonical `address/prefixLength` */
  toString(): string {
    return `${this.network}/${this.prefixLength}`;
  }

  toJSON(): string {
    return this.toString();
  }

  /**
   * Multi-line dump of the derived fields, for diagnostics only
   */
  print(): string {
    const lines = [
      `IPNetwork   : ${this}`,
      `Network     : ${this.network}`,
      `Netmask     : ${this.netmask}`,
      `Cidr        : ${this.prefixLength}`,
      `Broadcast   : ${this.broadcast ?? ''}`,
      `FirstUsable : ${this.firstUsable}`,
      `LastUsable  : ${this.lastUsable}`,
      `Usable      : ${this.usable}`,
    ];
    return lines.map(line => `${line}\n`).join('');
  }
}
