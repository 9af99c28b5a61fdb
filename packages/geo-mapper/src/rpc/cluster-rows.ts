/**
 * Cluster Node Rows
 *
 * Turns getClusterNodes output into builder rows: one row per node whose
 * pubkey decodes to a 32-byte key and which advertises at least one socket
 * with a usable IP address.
 */

import { decodePublicKey } from '@leader-geo/geo-rules';
import { preferredAddress, type ContactInfo } from '@leader-geo/leader-routing';
import type { GeoRow } from '../core/map-builder.js';

export interface SkippedRow {
  readonly origin: string;
  readonly reason: string;
}

export interface RowCollection {
  readonly rows: GeoRow[];
  readonly skipped: SkippedRow[];
}

export function rowsFromClusterNodes(nodes: readonly ContactInfo[]): RowCollection {
  const rows: GeoRow[] = [];
  const skipped: SkippedRow[] = [];

  nodes.forEach((node, index) => {
    const origin = `getClusterNodes[${index}]`;

    const publicKey = decodePublicKey(node.pubkey);
    if (!publicKey) {
      skipped.push({ origin, reason: `invalid pubkey ${node.pubkey}` });
      return;
    }

    const address = preferredAddress(node);
    if (!address) {
      skipped.push({ origin, reason: `no usable address for ${node.pubkey}` });
      return;
    }

    rows.push({ publicKey, source: { kind: 'address', address }, origin });
  });

  return { rows, skipped };
}

/**
 * Keep only nodes whose pubkey is in `identities`
 */
export function filterNodesByIdentity(
  nodes: readonly ContactInfo[],
  identities: ReadonlySet<string>
): ContactInfo[] {
  return nodes.filter((node) => identities.has(node.pubkey));
}
