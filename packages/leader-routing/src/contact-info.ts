/**
 * Cluster Contact Info
 *
 * Normalised view of a cluster node's advertised sockets and helpers to
 * pick the address used for geolocation.
 *
 * @module leader-routing/contact-info
 */

import { isIP } from 'node:net';

export interface ContactInfo {
  readonly pubkey: string;
  readonly tpuQuic: string | null;
  readonly tpu: string | null;
  readonly gossip: string | null;
  readonly rpc: string | null;
}

/**
 * Transport sockets in order of preference
 */
export const CONTACT_PREFERENCE = ['tpuQuic', 'tpu', 'gossip', 'rpc'] as const;

/**
 * Extract the IP address from a socket string.
 *
 * Accepts `ip:port`, `[v6]:port` and bare IPv4/IPv6 literals.
 *
 * @example
 * ```typescript
 * extractIpFromSocket('95.217.151.43:8001');  // '95.217.151.43'
 * extractIpFromSocket('[2001:db8::1]:8001');  // '2001:db8::1'
 * extractIpFromSocket('not-an-ip');           // null
 * ```
 */
export function extractIpFromSocket(socket: string): string | null {
  const trimmed = socket.trim();

  if (isIP(trimmed) !== 0) {
    return trimmed;
  }

  if (trimmed.startsWith('[')) {
    const end = trimmed.indexOf(']');
    if (end > 1) {
      const host = trimmed.slice(1, end);
      return isIP(host) === 6 ? host : null;
    }
    return null;
  }

  const separator = trimmed.lastIndexOf(':');
  if (separator > 0) {
    const host = trimmed.slice(0, separator);
    return isIP(host) !== 0 ? host : null;
  }

  return null;
}

/**
 * First advertised socket that yields an IP address, in preference order
 */
export function preferredAddress(node: ContactInfo): string | null {
  for (const field of CONTACT_PREFERENCE) {
    const socket = node[field];
    if (socket) {
      const ip = extractIpFromSocket(socket);
      if (ip) {
        return ip;
      }
    }
  }
  return null;
}
