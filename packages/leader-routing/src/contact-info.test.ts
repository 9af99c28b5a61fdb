import { describe, it, expect } from 'vitest';
import { extractIpFromSocket, preferredAddress, type ContactInfo } from './contact-info.js';

describe('extractIpFromSocket', () => {
  it('supports IPv4 and IPv6 sockets', () => {
    expect(extractIpFromSocket('95.217.151.43:8001')).toBe('95.217.151.43');
    expect(extractIpFromSocket('[2001:db8::1]:8001')).toBe('2001:db8::1');
  });

  it('accepts bare addresses', () => {
    expect(extractIpFromSocket('10.0.0.1')).toBe('10.0.0.1');
    expect(extractIpFromSocket('2001:db8::1')).toBe('2001:db8::1');
  });

  it('rejects anything that is not an address', () => {
    expect(extractIpFromSocket('not-an-ip')).toBeNull();
    expect(extractIpFromSocket('host.example:8001')).toBeNull();
    expect(extractIpFromSocket('[]:8001')).toBeNull();
    expect(extractIpFromSocket('')).toBeNull();
  });
});

describe('preferredAddress', () => {
  const base: ContactInfo = {
    pubkey: 'leader',
    tpuQuic: '203.0.113.10:1000',
    tpu: '203.0.113.20:2000',
    gossip: '203.0.113.30:3000',
    rpc: '203.0.113.40:4000',
  };

  it('prioritises transport addresses', () => {
    expect(preferredAddress(base)).toBe('203.0.113.10');
    expect(preferredAddress({ ...base, tpuQuic: null })).toBe('203.0.113.20');
    expect(preferredAddress({ ...base, tpuQuic: null, tpu: null })).toBe('203.0.113.30');
    expect(preferredAddress({ ...base, tpuQuic: null, tpu: null, gossip: null })).toBe(
      '203.0.113.40'
    );
  });

  it('skips sockets that do not parse', () => {
    expect(preferredAddress({ ...base, tpuQuic: 'garbage' })).toBe('203.0.113.20');
  });

  it('returns null when nothing is advertised', () => {
    expect(
      preferredAddress({ pubkey: 'leader', tpuQuic: null, tpu: null, gossip: null, rpc: null })
    ).toBeNull();
  });
});
