/**
 * IANA private-use blocks (RFC 1918)
 * - 10.0.0.0/8
 * - 172.16.0.0/12
 * - 192.168.0.0/16
 */

import { IPAddress } from '../value-objects/IPAddress';
import { IPNetwork } from '../value-objects/IPNetwork';

export const IANA_ABLK_RESERVED = IPNetwork.fromInteger(0x0a000000n, 'IPv4', 8);
export const IANA_BBLK_RESERVED = IPNetwork.fromInteger(0xac100000n, 'IPv4', 12);
export const IANA_CBLK_RESERVED = IPNetwork.fromInteger(0xc0a80000n, 'IPv4', 16);

const RESERVED_BLOCKS: readonly IPNetwork[] = [IANA_ABLK_RESERVED, IANA_BBLK_RESERVED, IANA_CBLK_RESERVED];

/**
 * True if the address, or the whole network, lies in one of the private blocks
 */
export function isIANAReserved(target: IPAddress | IPNetwork | string): boolean {
  const value = typeof target === 'string' ? IPAddress.parse(target) : target;
  return RESERVED_BLOCKS.some(block => block.contains(value));
}
