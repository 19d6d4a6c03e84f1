/**
 * Unit tests for NetworkParser
 *
 * Every accepted form is checked through both the throwing and the
 * null-returning entry points.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Logger } from '@/core/Logger';
import type { NetworkLog } from '@/core/Logger';
import { ClassLessCidrGuess } from '@/domain/network/parsing/CidrGuess';
import type { CidrGuess } from '@/domain/network/parsing/CidrGuess';
import { NetworkParser, parse, toCanonicalString, tryParse } from '@/domain/network/parsing/NetworkParser';
import { errorCode } from '../../helpers/errorCode';

describe('NetworkParser', () => {
  beforeEach(() => {
    Logger.reset();
  });

  describe('address and prefix length', () => {
    it('should parse slash notation', () => {
      const net = parse('192.168.168.100/24');
      expect(net.toString()).toBe('192.168.168.0/24');
      expect(net.broadcast?.toString()).toBe('192.168.168.255');
      expect(net.usable).toBe(254n);
      expect(net.firstUsable.toString()).toBe('192.168.168.1');
      expect(net.lastUsable.toString()).toBe('192.168.168.254');
      expect(tryParse('192.168.168.100/24')?.toString()).toBe('192.168.168.0/24');
    });

    it('should parse space separated length', () => {
      expect(parse('192.168.168.100 24').toString()).toBe('192.168.168.0/24');
      expect(tryParse('192.168.168.100 24')?.toString()).toBe('192.168.168.0/24');
    });

    it('should parse an explicit numeric length', () => {
      expect(parse('10.0.0.1', 8).toString()).toBe('10.0.0.0/8');
      expect(tryParse('10.0.0.1', 8)?.toString()).toBe('10.0.0.0/8');
    });

    it('should parse IPv6 prefixes', () => {
      expect(parse('2001:db8::/32').toString()).toBe('2001:db8::/32');
      expect(parse('FE80::1/10').toString()).toBe('fe80::/10');
    });

    it('should reject a length beyond the family width', () => {
      expect(errorCode(() => parse('10.0.0.1/33'))).toBe('PrefixOutOfRange');
      expect(errorCode(() => parse('10.0.0.1', 33))).toBe('PrefixOutOfRange');
      expect(tryParse('10.0.0.1/33')).toBeNull();
      expect(tryParse('::1/129')).toBeNull();
    });
  });

  describe('address and netmask', () => {
    it('should parse an explicit netmask', () => {
      expect(parse('10.0.0.1', '255.255.255.0').toString()).toBe('10.0.0.0/24');
      expect(tryParse('10.0.0.1', '255.255.255.0')?.toString()).toBe('10.0.0.0/24');
    });

    it('should parse a netmask in the same string', () => {
      expect(parse('192.168.168.100 255.255.255.0').toString()).toBe('192.168.168.0/24');
    });

    it('should strip stray characters when sanitizing', () => {
      expect(parse('192.168.168.100 - 255.255.255.0').toString()).toBe('192.168.168.0/24');
      expect(parse('  10.0.0.1   24  ').toString()).toBe('10.0.0.0/24');
    });

    it('should reject a non-contiguous netmask', () => {
      expect(errorCode(() => parse('10.0.0.1', '255.0.255.0'))).toBe('InvalidNetmask');
      expect(tryParse('10.0.0.1', '255.0.255.0')).toBeNull();
    });

    it('should treat a number above 255 as a malformed netmask', () => {
      expect(errorCode(() => parse('10.0.0.1/300'))).toBe('MalformedNetmask');
    });

    it('should reject trailing tokens', () => {
      expect(errorCode(() => parse('10.0.0.1/24/8'))).toBe('MalformedNetmask');
    });

    it('should reject a netmask of the other family', () => {
      expect(errorCode(() => parse('10.0.0.1', 'ffff:ffff::'))).toBe('MixedAddressFamily');
    });

    it('should reject an empty netmask', () => {
      expect(errorCode(() => parse('10.0.0.1', ''))).toBe('EmptyOrMissingInput');
      expect(tryParse('10.0.0.1', null)).toBeNull();
    });
  });

  describe('address alone', () => {
    it('should guess classful lengths by default', () => {
      expect(parse('10.0.0.1').toString()).toBe('10.0.0.0/8');
      expect(parse('172.16.5.4').toString()).toBe('172.16.0.0/16');
      expect(parse('192.168.1.1').toString()).toBe('192.168.1.0/24');
    });

    it('should fail when no class applies', () => {
      expect(errorCode(() => parse('224.0.0.1'))).toBe('UnguessableLength');
      expect(errorCode(() => parse('2001:db8::1'))).toBe('UnguessableLength');
      expect(tryParse('224.0.0.1')).toBeNull();
    });

    it('should report a bad address before trying to guess', () => {
      expect(errorCode(() => parse('300.1.1.1'))).toBe('MalformedAddress');
    });

    it('should use an injected guess strategy', () => {
      const parser = new NetworkParser({ cidrGuess: ClassLessCidrGuess });
      expect(parser.parse('10.0.0.1').toString()).toBe('10.0.0.1/32');
      expect(parser.parse('2001:db8::1').toString()).toBe('2001:db8::1/128');
    });

    it('should accept any object with the guess shape', () => {
      const fixed: CidrGuess = { tryGuessCidr: () => 30 };
      const parser = new NetworkParser({ cidrGuess: fixed });
      expect(parser.parse('10.0.0.5').toString()).toBe('10.0.0.4/30');
    });
  });

  describe('empty and malformed input', () => {
    it('should fail on empty input in both forms', () => {
      expect(errorCode(() => parse(''))).toBe('EmptyOrMissingInput');
      expect(tryParse('')).toBeNull();
      expect(tryParse(null)).toBeNull();
      expect(tryParse(undefined)).toBeNull();
    });

    it('should fail when sanitizing leaves nothing', () => {
      expect(errorCode(() => parse('---'))).toBe('EmptyOrMissingInput');
    });

    it('should fail on garbage', () => {
      expect(errorCode(() => parse('not a network'))).toBe('MalformedAddress');
      expect(tryParse('not a network')).toBeNull();
    });
  });

  describe('sanitize option', () => {
    it('should keep empty tokens when not sanitizing', () => {
      const parser = new NetworkParser({ sanitize: false });
      expect(errorCode(() => parser.parse('10.0.0.1  24'))).toBe('MalformedNetmask');
      expect(parser.parse('10.0.0.1/24').toString()).toBe('10.0.0.0/24');
    });

    it('should keep stray characters when not sanitizing', () => {
      const parser = new NetworkParser({ sanitize: false });
      expect(parser.tryParse('10.0.0.1/24!')).toBeNull();
    });
  });

  describe('logging', () => {
    it('should log every failed parse', () => {
      const logs: NetworkLog[] = [];
      Logger.subscribe(log => logs.push(log), { source: 'parser' });

      tryParse('');
      expect(() => parse('224.0.0.1')).toThrow();

      expect(logs.map(log => log.event)).toEqual(['parse:failed', 'parse:failed']);
      expect(logs[0].data).toEqual({ input: '', code: 'EmptyOrMissingInput' });
      expect(logs[1].data).toEqual({ input: '224.0.0.1', code: 'UnguessableLength' });
    });

    it('should not log a successful parse', () => {
      parse('10.0.0.0/8');
      expect(Logger.getLogsBySource('parser')).toEqual([]);
    });
  });

  describe('toCanonicalString', () => {
    it('should produce address/prefixLength', () => {
      expect(toCanonicalString(parse('10.1.2.3/8'))).toBe('10.0.0.0/8');
      expect(toCanonicalString(parse('2001:db8::1/64'))).toBe('2001:db8::/64');
    });
  });
});
