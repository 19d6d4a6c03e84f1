/**
 * IPAddress Value Object
 *
 * Represents an IPv4 or IPv6 address as a family-tagged unsigned bigint.
 * Immutable value object following Domain-Driven Design principles.
 *
 * @example
 * ```typescript
 * const ip = IPAddress.parse('192.168.1.1');
 * console.log(ip.toString()); // '192.168.1.1'
 * console.log(ip.value);      // 3232235777n
 * ```
 */

import { IPNetworkError, orNull, unwrap } from '@/core/errors';
import type { Result } from '@/core/errors';
import { compareFamilies, familyMask, isAddressFamily } from '../AddressFamily';
import type { AddressFamily } from '../AddressFamily';
import { formatAddress, fromBytes, parseAddressText, toBytes, truncate } from '../AddressCodec';

export class IPAddress {
  readonly family: AddressFamily;
  readonly value: bigint;
  private readonly text: string;

  /**
   * @throws {IPNetworkError} InvalidFamily, or MalformedAddress if the value does not fit the family
   */
  constructor(value: bigint, family: AddressFamily) {
    if (!isAddressFamily(family)) {
      throw new IPNetworkError('InvalidFamily', `Unsupported address family: ${String(family)}`);
    }
    if (value < 0n || value > familyMask(family)) {
      throw new IPNetworkError('MalformedAddress', `Value ${value} does not fit in an ${family} address`);
    }
    this.family = family;
    this.value = value;
    this.text = formatAddress(value, family);
  }

  static parseResult(text: string): Result<IPAddress> {
    const raw = parseAddressText(text);
    if (!raw.ok) return raw;
    return { ok: true, value: new IPAddress(raw.value.value, raw.value.family) };
  }

  /**
   * @throws {IPNetworkError} EmptyOrMissingInput or MalformedAddress
   */
  static parse(text: string): IPAddress {
    return unwrap(IPAddress.parseResult(text));
  }

  static tryParse(text: string): IPAddress | null {
    return orNull(IPAddress.parseResult(text));
  }

  /**
   * Creates an address from an arbitrary integer, keeping the low 32 / 128 bits
   */
  static fromInteger(value: bigint, family: AddressFamily): IPAddress {
    return new IPAddress(truncate(value, family), family);
  }

  /**
   * Creates an address from 4 (IPv4) or 16 (IPv6) big-endian bytes
   */
  static fromBytes(bytes: Uint8Array): IPAddress {
    const raw = fromBytes(bytes);
    return new IPAddress(raw.value, raw.family);
  }

  toBytes(): Uint8Array {
    return toBytes(this.value, this.family);
  }

  equals(other: IPAddress): boolean {
    return this.family === other.family && this.value === other.value;
  }

  compareTo(other: IPAddress): number {
    const byFamily = compareFamilies(this.family, other.family);
    if (byFamily !== 0) return byFamily;
    if (this.value === other.value) return 0;
    return this.value < other.value ? -1 : 1;
  }

  toString(): string {
    return this.text;
  }

  toJSON(): string {
    return this.text;
  }
}
