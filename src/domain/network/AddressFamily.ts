/**
 * Address families and their bit widths
 */

export type AddressFamily = 'IPv4' | 'IPv6';

export const IPV4_BITS = 32;
export const IPV6_BITS = 128;

const IPV4_MASK = (1n << 32n) - 1n;
const IPV6_MASK = (1n << 128n) - 1n;

export function isAddressFamily(value: unknown): value is AddressFamily {
  return value === 'IPv4' || value === 'IPv6';
}

export function bitWidth(family: AddressFamily): number {
  return family === 'IPv4' ? IPV4_BITS : IPV6_BITS;
}

/** All-ones value over the family's width */
export function familyMask(family: AddressFamily): bigint {
  return family === 'IPv4' ? IPV4_MASK : IPV6_MASK;
}

/** IPv4 sorts before IPv6 */
export function compareFamilies(a: AddressFamily, b: AddressFamily): number {
  if (a === b) return 0;
  return a === 'IPv4' ? -1 : 1;
}
