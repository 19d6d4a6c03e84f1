/**
 * CidrGuess - strategies that supply a prefix length for a bare address
 *
 * The parser calls `tryGuessCidr` when the input carries no length or
 * netmask. Any object with this shape can be injected through ParseOptions.
 */

import { IPAddress } from '../value-objects/IPAddress';

export interface CidrGuess {
  /** Prefix length for the address text, or null when no guess applies */
  tryGuessCidr(address: string): number | null;
}

/**
 * Legacy classful lengths for IPv4:
 * - Class A (0.x - 127.x)   → /8
 * - Class B (128.x - 191.x) → /16
 * - Class C (192.x - 223.x) → /24
 * Classes D/E and IPv6 have no guess.
 */
export const ClassFullCidrGuess: CidrGuess = {
  tryGuessCidr(address: string): number | null {
    const ip = IPAddress.tryParse(address);
    if (ip === null || ip.family !== 'IPv4') {
      return null;
    }

    const first = Number(ip.value >> 24n);
    if (first <= 127) return 8;
    if (first <= 191) return 16;
    if (first <= 223) return 24;
    return null;
  },
};

/**
 * Host route for any address: /32 for IPv4, /128 for IPv6
 */
export const ClassLessCidrGuess: CidrGuess = {
  tryGuessCidr(address: string): number | null {
    const ip = IPAddress.tryParse(address);
    if (ip === null) {
      return null;
    }
    return ip.family === 'IPv4' ? 32 : 128;
  },
};
