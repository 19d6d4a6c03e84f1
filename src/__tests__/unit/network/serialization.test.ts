import { describe, it, expect } from 'vitest';
import { IPNetworkError } from '@/core/errors';
import { parse } from '@/domain/network/parsing/NetworkParser';
import { deserializeNetwork, serializeNetwork } from '@/domain/network/parsing/serialization';
import { errorCode } from '../../helpers/errorCode';

describe('serialization', () => {
  it('should store the canonical string under IPNetwork', () => {
    expect(serializeNetwork(parse('10.0.0.1/8'))).toBe('{"IPNetwork":"10.0.0.0/8"}');
  });

  it('should read a stored network back', () => {
    const restored = deserializeNetwork('{"IPNetwork":"10.0.0.0/8"}');
    expect(restored.equals(parse('10.0.0.0/8'))).toBe(true);
  });

  it('should round-trip IPv6 networks', () => {
    const net = parse('2001:db8:1::/48');
    expect(deserializeNetwork(serializeNetwork(net)).equals(net)).toBe(true);
  });

  it('should reject a payload without a network', () => {
    expect(errorCode(() => deserializeNetwork('{}'))).toBe('EmptyOrMissingInput');
    expect(errorCode(() => deserializeNetwork('{"IPNetwork":42}'))).toBe('EmptyOrMissingInput');
    expect(errorCode(() => deserializeNetwork('null'))).toBe('EmptyOrMissingInput');
  });

  it('should reject a network that does not parse', () => {
    expect(() => deserializeNetwork('{"IPNetwork":"10.0.0.1/40"}')).toThrow(IPNetworkError);
  });

  it('should let invalid JSON fail as a syntax error', () => {
    expect(() => deserializeNetwork('not json')).toThrow(SyntaxError);
  });
});
