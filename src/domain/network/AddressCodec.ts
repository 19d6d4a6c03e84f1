/**
 * AddressCodec - textual and binary address forms <-> unsigned bigint
 *
 * Supports:
 *   - IPv4 dotted quad: 192.168.1.1
 *   - IPv6 full notation: 2001:0db8:0000:0000:0000:0000:0000:0001
 *   - IPv6 compressed notation: 2001:db8::1 (single :: replaces one or more zero groups)
 *   - IPv6 with embedded IPv4 tail: ::ffff:192.168.1.1
 *   - 4 / 16 byte big-endian buffers
 *
 * Zone ids (fe80::1%eth0) are rejected: a prefix has no scope.
 */

import { Buffer } from 'buffer';
import { IPNetworkError, fail, ok, unwrap, orNull } from '@/core/errors';
import type { Result } from '@/core/errors';
import { bitWidth, familyMask, isAddressFamily } from './AddressFamily';
import type { AddressFamily } from './AddressFamily';
import type { IPAddress } from './value-objects/IPAddress';

export interface RawAddress {
  family: AddressFamily;
  value: bigint;
}

const OCTET = /^\d{1,3}$/;
const HEXTET = /^[0-9a-fA-F]{1,4}$/;
const EMBEDDED_IPV4 = /^(.*:)(\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3})$/;

// ─── Text ────────────────────────────────────────────────────────────

function parseIPv4(text: string): Result<bigint> {
  const parts = text.split('.');
  if (parts.length !== 4) {
    return fail('MalformedAddress', `Invalid IPv4 address: expected 4 octets in '${text}'`);
  }

  let value = 0n;
  for (const part of parts) {
    if (!OCTET.test(part)) {
      return fail('MalformedAddress', `Invalid IPv4 octet '${part}' in '${text}'`);
    }
    const octet = parseInt(part, 10);
    if (octet > 255) {
      return fail('MalformedAddress', `Invalid IPv4 octet '${part}' in '${text}': must be between 0 and 255`);
    }
    value = (value << 8n) | BigInt(octet);
  }
  return ok(value);
}

function parseHextets(groups: string[], text: string): Result<number[]> {
  const hextets: number[] = [];
  for (const group of groups) {
    if (!HEXTET.test(group)) {
      return fail('MalformedAddress', `Invalid IPv6 hextet '${group}' in '${text}'`);
    }
    hextets.push(parseInt(group, 16));
  }
  return ok(hextets);
}

function parseIPv6(text: string): Result<bigint> {
  if (text.includes('%')) {
    return fail('MalformedAddress', `Invalid IPv6 address: zone ids are not supported in '${text}'`);
  }

  // Replace an embedded IPv4 tail with two placeholder groups, patched below
  let addr = text;
  let tail: bigint | null = null;
  const embedded = addr.match(EMBEDDED_IPV4);
  if (embedded) {
    const v4 = parseIPv4(embedded[2]);
    if (!v4.ok) return v4;
    tail = v4.value;
    addr = `${embedded[1]}0:0`;
  }

  const halves = addr.split('::');
  if (halves.length > 2) {
    return fail('MalformedAddress', `Invalid IPv6 address: multiple :: found in '${text}'`);
  }

  const left = parseHextets(halves[0] ? halves[0].split(':') : [], text);
  if (!left.ok) return left;
  const right = parseHextets(halves.length > 1 && halves[1] ? halves[1].split(':') : [], text);
  if (!right.ok) return right;

  const groupCount = left.value.length + right.value.length;
  if (halves.length === 1 && groupCount !== 8) {
    return fail('MalformedAddress', `Invalid IPv6 address: expected 8 groups, got ${groupCount} in '${text}'`);
  }
  if (halves.length === 2 && groupCount > 7) {
    return fail('MalformedAddress', `Invalid IPv6 address: too many groups in '${text}'`);
  }

  const hextets: number[] = new Array(8).fill(0);
  left.value.forEach((h, i) => { hextets[i] = h; });
  const rightStart = 8 - right.value.length;
  right.value.forEach((h, i) => { hextets[rightStart + i] = h; });

  let value = hextets.reduce((acc, h) => (acc << 16n) | BigInt(h), 0n);
  if (tail !== null) {
    value = (value & ~0xffffffffn) | tail;
  }
  return ok(value);
}

/**
 * Recognise an address in text. A ':' anywhere selects IPv6.
 */
export function parseAddressText(text: string): Result<RawAddress> {
  if (!text) {
    return fail('EmptyOrMissingInput', 'Address cannot be empty');
  }

  if (text.includes(':')) {
    const value = parseIPv6(text);
    return value.ok ? ok<RawAddress>({ family: 'IPv6', value: value.value }) : value;
  }

  const value = parseIPv4(text);
  return value.ok ? ok<RawAddress>({ family: 'IPv4', value: value.value }) : value;
}

function formatIPv4(value: bigint): string {
  return [24n, 16n, 8n, 0n].map(shift => ((value >> shift) & 0xffn).toString()).join('.');
}

/**
 * Compressed representation (RFC 5952):
 * - leading zeros in each hextet are omitted
 * - the longest run (two or more) of all-zero hextets becomes ::
 * - among equal-length runs the first is compressed
 */
function formatIPv6(value: bigint): string {
  const hextets: number[] = [];
  for (let shift = 112n; shift >= 0n; shift -= 16n) {
    hextets.push(Number((value >> shift) & 0xffffn));
  }

  let bestStart = -1, bestLen = 0;
  let runStart = -1, runLen = 0;

  for (let i = 0; i < 8; i++) {
    if (hextets[i] === 0) {
      if (runStart === -1) runStart = i;
      runLen++;
    } else {
      if (runLen > bestLen) {
        bestStart = runStart;
        bestLen = runLen;
      }
      runStart = -1;
      runLen = 0;
    }
  }
  if (runLen > bestLen) {
    bestStart = runStart;
    bestLen = runLen;
  }

  const hex = (hs: number[]): string => hs.map(h => h.toString(16)).join(':');
  if (bestLen < 2) {
    return hex(hextets);
  }
  return `${hex(hextets.slice(0, bestStart))}::${hex(hextets.slice(bestStart + bestLen))}`;
}

export function formatAddress(value: bigint, family: AddressFamily): string {
  return family === 'IPv4' ? formatIPv4(value) : formatIPv6(value);
}

// ─── Integer ─────────────────────────────────────────────────────────

function rawToInteger(address: IPAddress | string): Result<bigint> {
  if (typeof address !== 'string') {
    return ok(address.value);
  }
  const raw = parseAddressText(address);
  if (!raw.ok) {
    return fail('MalformedAddress', raw.error.message);
  }
  return ok(raw.value.value);
}

/**
 * Big-endian unsigned value of an address
 *
 * @example
 * toInteger('0.0.1.0'); // 256n
 */
export function toInteger(address: IPAddress | string): bigint {
  return unwrap(rawToInteger(address));
}

export function tryToInteger(address: IPAddress | string): bigint | null {
  return orNull(rawToInteger(address));
}

/** Keep the low 32 / 128 bits of a value (negative values wrap as two's complement) */
export function truncate(value: bigint, family: AddressFamily): bigint {
  if (!isAddressFamily(family)) {
    throw new IPNetworkError('InvalidFamily', `Unsupported address family: ${String(family)}`);
  }
  return value & familyMask(family);
}

/**
 * Textual address of a value, truncated to the family's width
 *
 * @example
 * fromInteger(256n, 'IPv4'); // '0.0.1.0'
 */
export function fromInteger(value: bigint, family: AddressFamily): string {
  return formatAddress(truncate(value, family), family);
}

// ─── Bytes ───────────────────────────────────────────────────────────

export function toBytes(value: bigint, family: AddressFamily): Uint8Array {
  const hex = truncate(value, family).toString(16).padStart(bitWidth(family) / 4, '0');
  return Uint8Array.from(Buffer.from(hex, 'hex'));
}

export function fromBytes(bytes: Uint8Array): RawAddress {
  if (bytes.length !== 4 && bytes.length !== 16) {
    throw new IPNetworkError('MalformedAddress', `Address must be 4 or 16 bytes, got ${bytes.length}`);
  }
  const family: AddressFamily = bytes.length === 4 ? 'IPv4' : 'IPv6';
  return { family, value: BigInt(`0x${Buffer.from(bytes).toString('hex')}`) };
}
