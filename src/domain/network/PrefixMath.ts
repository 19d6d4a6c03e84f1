/**
 * PrefixMath - pure functions over (value, prefix length, family)
 *
 * All arithmetic is unsigned bigint bounded by the family's width:
 * complements are always taken as `~x & familyMask(family)`.
 *
 * @example
 * ```typescript
 * netmask(24, 'IPv4');                 // 0xffffff00n
 * cidrFromNetmask(0xffff0000n, 'IPv4'); // 16
 * usableCount(24, 'IPv4');             // 254n
 * ```
 */

import { fail, ok, orNull, unwrap } from '@/core/errors';
import type { Result } from '@/core/errors';
import { bitWidth, familyMask } from './AddressFamily';
import type { AddressFamily } from './AddressFamily';

export { bitWidth, familyMask };

const PREFIX_TEXT = /^\d{1,3}$/;

export function isValidPrefixLength(prefixLength: number, family: AddressFamily): boolean {
  return Number.isInteger(prefixLength) && prefixLength >= 0 && prefixLength <= bitWidth(family);
}

export function netmaskResult(prefixLength: number, family: AddressFamily): Result<bigint> {
  if (!isValidPrefixLength(prefixLength, family)) {
    return fail('PrefixOutOfRange', `Invalid prefix length /${prefixLength}: must be an integer between 0 and ${bitWidth(family)} for ${family}`);
  }
  const hostBits = BigInt(bitWidth(family) - prefixLength);
  return ok((familyMask(family) >> hostBits) << hostBits);
}

/** Left-aligned run of `prefixLength` ones over the family's width */
export function netmask(prefixLength: number, family: AddressFamily): bigint {
  return unwrap(netmaskResult(prefixLength, family));
}

export function tryNetmask(prefixLength: number, family: AddressFamily): bigint | null {
  return orNull(netmaskResult(prefixLength, family));
}

/**
 * A netmask is valid when its complement plus one is a power of two (or zero)
 */
export function isValidNetmask(mask: bigint, family: AddressFamily): boolean {
  const full = familyMask(family);
  if (mask < 0n || mask > full) return false;
  const inverted = ~mask & full;
  return ((inverted + 1n) & inverted) === 0n;
}

export function bitsSet(value: bigint): number {
  let count = 0;
  for (let v = value; v > 0n; v >>= 1n) {
    if (v & 1n) count++;
  }
  return count;
}

export function cidrFromNetmaskResult(mask: bigint, family: AddressFamily): Result<number> {
  if (!isValidNetmask(mask, family)) {
    return fail('InvalidNetmask', `Invalid netmask 0x${mask.toString(16)}: must be contiguous 1s followed by 0s`);
  }
  return ok(bitsSet(mask));
}

export function cidrFromNetmask(mask: bigint, family: AddressFamily): number {
  return unwrap(cidrFromNetmaskResult(mask, family));
}

export function tryCidrFromNetmask(mask: bigint, family: AddressFamily): number | null {
  return orNull(cidrFromNetmaskResult(mask, family));
}

/** Host bits all set on top of the network base */
export function broadcast(base: bigint, mask: bigint, family: AddressFamily): bigint {
  return base + (~mask & familyMask(family));
}

export function wildcard(mask: bigint, family: AddressFamily): bigint {
  return familyMask(family) - mask;
}

export function totalCount(prefixLength: number, family: AddressFamily): bigint {
  return 1n << BigInt(bitWidth(family) - prefixLength);
}

/**
 * IPv4 reserves the network and broadcast addresses, and /31 and /32 have
 * no usable hosts. IPv6 has no such reservation.
 */
export function usableCount(prefixLength: number, family: AddressFamily): bigint {
  if (family === 'IPv6') {
    return totalCount(prefixLength, family);
  }
  return prefixLength > 30 ? 0n : totalCount(prefixLength, family) - 2n;
}

/**
 * Parse a decimal prefix length ("24") and check it against the family width
 */
export function tryParsePrefixLength(text: string, family: AddressFamily): number | null {
  if (!PREFIX_TEXT.test(text)) return null;
  const prefixLength = parseInt(text, 10);
  return isValidPrefixLength(prefixLength, family) ? prefixLength : null;
}
