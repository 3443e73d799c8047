import { describe, it, expect } from 'vitest';
import {
  canonicalLinkAddress,
  formatLinkAddress,
  isGroupLinkAddress,
  isUnicast,
  parseCidr,
  parseIp,
  prefixFromNetmask,
} from '../../../src/model/address.js';

function ip(text: string) {
  const parsed = parseIp(text);
  if (!parsed) throw new Error(`test address did not parse: ${text}`);
  return parsed;
}

describe('parseIp', () => {
  it('should parse dotted quads', () => {
    expect(ip('192.168.1.10').text).toBe('192.168.1.10');
    expect(ip(' 10.0.0.1 ').family).toBe(4);
  });

  it('should refuse malformed IPv4', () => {
    expect(parseIp('192.168.001.1')).toBeNull();
    expect(parseIp('256.1.1.1')).toBeNull();
    expect(parseIp('10.0.0')).toBeNull();
    expect(parseIp('')).toBeNull();
  });

  it('should print IPv6 in canonical compressed form', () => {
    expect(ip('2001:DB8:0:0:0:0:0:1').text).toBe('2001:db8::1');
    expect(ip('2001:db8:0:0:1:0:0:1').text).toBe('2001:db8::1:0:0:1');
    expect(ip('2001:db8:1:2:3:4:5:0').text).toBe('2001:db8:1:2:3:4:5:0');
    expect(ip('::').text).toBe('::');
  });

  it('should fold IPv4-mapped addresses and refuse zone ids', () => {
    const mapped = ip('::ffff:10.0.0.1');
    expect(mapped.family).toBe(4);
    expect(mapped.text).toBe('10.0.0.1');
    expect(parseIp('fe80::1%eth0')).toBeNull();
    expect(parseIp('1::2::3')).toBeNull();
  });
});

describe('isUnicast', () => {
  it.each([
    ['10.0.0.1', true],
    ['2001:db8::1', true],
    ['0.0.0.0', false],
    ['127.0.0.1', false],
    ['224.0.0.251', false],
    ['255.255.255.255', false],
    ['::1', false],
    ['ff02::1', false],
  ])('%s -> %s', (text, expected) => {
    expect(isUnicast(ip(text))).toBe(expected);
  });
});

describe('parseCidr', () => {
  it('should canonicalize networks', () => {
    const result = parseCidr('10.0.0.0/8');
    expect(result).toMatchObject({ ok: true, cidr: { prefixLength: 8, text: '10.0.0.0/8' } });
    expect(parseCidr('2001:DB8::/32')).toMatchObject({ ok: true, cidr: { text: '2001:db8::/32' } });
  });

  it('should treat a bare address as a host route', () => {
    expect(parseCidr('10.0.0.5')).toMatchObject({ ok: true, cidr: { text: '10.0.0.5/32' } });
  });

  it('should reject host bits and bad prefixes', () => {
    expect(parseCidr('10.0.0.1/8')).toEqual({ ok: false, reason: 'cidr-host-bits' });
    expect(parseCidr('10.0.0.0/33')).toEqual({ ok: false, reason: 'invalid-address' });
    expect(parseCidr('10.0.0.0/8/1')).toEqual({ ok: false, reason: 'invalid-address' });
    expect(parseCidr('nonsense/8')).toEqual({ ok: false, reason: 'invalid-address' });
  });
});

describe('prefixFromNetmask', () => {
  it('should convert contiguous masks', () => {
    expect(prefixFromNetmask('255.255.255.0')).toBe(24);
    expect(prefixFromNetmask('255.255.128.0')).toBe(17);
    expect(prefixFromNetmask('0.0.0.0')).toBe(0);
    expect(prefixFromNetmask('255.255.255.255')).toBe(32);
  });

  it('should reject non-contiguous masks', () => {
    expect(prefixFromNetmask('255.0.255.0')).toBeNull();
  });
});

describe('link addresses', () => {
  it('should canonicalize every accepted spelling', () => {
    expect(canonicalLinkAddress('AA-BB-CC-DD-EE-FF')).toBe('aabbccddeeff');
    expect(canonicalLinkAddress('a:b:c:d:e:f')).toBe('0a0b0c0d0e0f');
    expect(canonicalLinkAddress('aabb.ccdd.eeff')).toBe('aabbccddeeff');
    expect(canonicalLinkAddress('AABBCCDDEEFF')).toBe('aabbccddeeff');
  });

  it('should refuse mixed separators, junk and the zero address', () => {
    expect(canonicalLinkAddress('aa:bb-cc:dd:ee:ff')).toBeNull();
    expect(canonicalLinkAddress('zz:bb:cc:dd:ee:ff')).toBeNull();
    expect(canonicalLinkAddress('00:00:00:00:00:00')).toBeNull();
  });

  it('should detect group addresses', () => {
    expect(isGroupLinkAddress('ffffffffffff')).toBe(true);
    expect(isGroupLinkAddress('01005e0000fb')).toBe(true);
    expect(isGroupLinkAddress('aabbccddeeff')).toBe(false);
  });

  it('should format with colons', () => {
    expect(formatLinkAddress('aabbccddeeff')).toBe('aa:bb:cc:dd:ee:ff');
  });
});
