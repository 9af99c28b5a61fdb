import { describe, it, expect } from 'vitest';
import { encodePublicKey } from '@leader-geo/geo-rules';
import type { ContactInfo } from '@leader-geo/leader-routing';
import { filterNodesByIdentity, rowsFromClusterNodes } from './cluster-rows.js';
import { KEY_A, KEY_B, KEY_C } from '../__tests__/fixtures.js';

function node(pubkey: string, sockets: Partial<ContactInfo> = {}): ContactInfo {
  return { pubkey, tpuQuic: null, tpu: null, gossip: null, rpc: null, ...sockets };
}

describe('rowsFromClusterNodes', () => {
  it('uses the preferred socket address', () => {
    const { rows, skipped } = rowsFromClusterNodes([
      node(KEY_A, { tpuQuic: '192.0.2.1:8009', gossip: '192.0.2.2:8001' }),
      node(KEY_B, { tpu: 'bogus', gossip: '[2001:db8::5]:8001' }),
    ]);

    expect(skipped).toEqual([]);
    expect(rows.map((row) => [encodePublicKey(row.publicKey), row.source, row.origin])).toEqual([
      [KEY_A, { kind: 'address', address: '192.0.2.1' }, 'getClusterNodes[0]'],
      [KEY_B, { kind: 'address', address: '2001:db8::5' }, 'getClusterNodes[1]'],
    ]);
  });

  it('skips nodes with a bad pubkey or no usable address', () => {
    const { rows, skipped } = rowsFromClusterNodes([
      node('short', { gossip: '192.0.2.1:8001' }),
      node(KEY_C),
    ]);

    expect(rows).toEqual([]);
    expect(skipped).toEqual([
      { origin: 'getClusterNodes[0]', reason: 'invalid pubkey short' },
      { origin: 'getClusterNodes[1]', reason: `no usable address for ${KEY_C}` },
    ]);
  });
});

describe('filterNodesByIdentity', () => {
  it('keeps only listed identities', () => {
    const nodes = [node(KEY_A), node(KEY_B), node(KEY_C)];

    expect(filterNodesByIdentity(nodes, new Set([KEY_C, KEY_A])).map((n) => n.pubkey)).toEqual([
      KEY_A,
      KEY_C,
    ]);
  });
});
