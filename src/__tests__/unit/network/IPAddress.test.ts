/**
 * Unit tests for IPAddress value object
 */

import { describe, it, expect } from 'vitest';
import { IPAddress } from '@/domain/network/value-objects/IPAddress';
import { errorCode } from '../../helpers/errorCode';

describe('IPAddress', () => {
  describe('parse', () => {
    it('should create valid IPv4 address', () => {
      const ip = IPAddress.parse('192.168.1.1');
      expect(ip.family).toBe('IPv4');
      expect(ip.value).toBe(3232235777n);
      expect(ip.toString()).toBe('192.168.1.1');
    });

    it('should create valid IPv6 address in canonical form', () => {
      const ip = IPAddress.parse('2001:DB8:0:0:0:0:0:1');
      expect(ip.family).toBe('IPv6');
      expect(ip.toString()).toBe('2001:db8::1');
    });

    it('should throw for invalid format', () => {
      expect(errorCode(() => IPAddress.parse('invalid'))).toBe('MalformedAddress');
      expect(errorCode(() => IPAddress.parse('192.168.1.256'))).toBe('MalformedAddress');
    });

    it('should throw for empty address', () => {
      expect(errorCode(() => IPAddress.parse(''))).toBe('EmptyOrMissingInput');
    });

    it('should return null from tryParse', () => {
      expect(IPAddress.tryParse('')).toBeNull();
      expect(IPAddress.tryParse('10.0.0')).toBeNull();
      expect(IPAddress.tryParse('10.0.0.1')?.value).toBe(0x0a000001n);
    });
  });

  describe('constructor', () => {
    it('should reject values outside the family range', () => {
      expect(errorCode(() => new IPAddress(1n << 32n, 'IPv4'))).toBe('MalformedAddress');
      expect(errorCode(() => new IPAddress(-1n, 'IPv6'))).toBe('MalformedAddress');
    });

    it('should accept the family bounds', () => {
      expect(new IPAddress(0xffffffffn, 'IPv4').toString()).toBe('255.255.255.255');
      expect(new IPAddress(0n, 'IPv6').toString()).toBe('::');
    });
  });

  describe('fromInteger', () => {
    it('should keep the low bits', () => {
      expect(IPAddress.fromInteger((1n << 32n) + 1n, 'IPv4').toString()).toBe('0.0.0.1');
      expect(IPAddress.fromInteger(-1n, 'IPv6').toString()).toBe('ffff:ffff:ffff:ffff:ffff:ffff:ffff:ffff');
    });
  });

  describe('bytes', () => {
    it('should round-trip through bytes', () => {
      const ip = IPAddress.parse('172.16.0.9');
      expect(Array.from(ip.toBytes())).toEqual([172, 16, 0, 9]);
      expect(IPAddress.fromBytes(ip.toBytes()).equals(ip)).toBe(true);
    });

    it('should pick the family from the byte count', () => {
      const bytes = new Uint8Array(16);
      bytes[15] = 1;
      const ip = IPAddress.fromBytes(bytes);
      expect(ip.family).toBe('IPv6');
      expect(ip.toString()).toBe('::1');
    });
  });

  describe('comparison', () => {
    it('should compare equal addresses', () => {
      expect(IPAddress.parse('10.0.0.1').equals(IPAddress.parse('10.0.0.1'))).toBe(true);
      expect(IPAddress.parse('10.0.0.1').equals(IPAddress.parse('10.0.0.2'))).toBe(false);
    });

    it('should not equate families with the same value', () => {
      expect(IPAddress.parse('0.0.0.1').equals(IPAddress.parse('::1'))).toBe(false);
    });

    it('should order by family then value', () => {
      expect(IPAddress.parse('10.0.0.1').compareTo(IPAddress.parse('10.0.0.2'))).toBe(-1);
      expect(IPAddress.parse('10.0.0.2').compareTo(IPAddress.parse('10.0.0.1'))).toBe(1);
      expect(IPAddress.parse('255.255.255.255').compareTo(IPAddress.parse('::'))).toBe(-1);
      expect(IPAddress.parse('::1').compareTo(IPAddress.parse('::1'))).toBe(0);
    });
  });

  describe('toJSON', () => {
    it('should serialize as the textual form', () => {
      expect(JSON.stringify({ gateway: IPAddress.parse('10.0.0.1') })).toBe('{"gateway":"10.0.0.1"}');
    });
  });
});
