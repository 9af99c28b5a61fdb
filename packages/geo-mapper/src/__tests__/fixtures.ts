/**
 * Shared fixtures for geo mapper tests
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { decodePublicKey } from '@leader-geo/geo-rules';
import type { GeoIpResolver } from '../geoip/geoip-resolver.js';

// Ascending byte order: KEY_ZERO < KEY_A < KEY_B < KEY_C < KEY_D
export const KEY_ZERO = '11111111111111111111111111111111';
export const KEY_A = '2jXy799ynN5A6xM4mT2QPY2ATqNnSboP8Gr3HdWu3UwR';
export const KEY_B = '7XSXtg2CWwjWCa7j4kXfYLMi8xawJbq6XW6xMa6Y5P9Q';
export const KEY_C = '9QxCLckBiJc783jnMvXZubK4wH86Eqqvashtrwvcsgkv';
export const KEY_D = '9YvS2fH5A2m2W6B8hWcP8d9Yhrb2nJbLg2xwqQ8CbW2s';

export function keyBytes(text: string): Uint8Array {
  const key = decodePublicKey(text);
  if (!key) {
    throw new Error(`fixture key does not decode: ${text}`);
  }
  return key;
}

/**
 * In-memory geoip resolver keyed by address
 */
export class FakeGeoIpResolver implements GeoIpResolver {
  readonly lookups: string[] = [];

  constructor(private readonly countries: Readonly<Record<string, string>> = {}) {}

  countryCode(address: string): string | null {
    this.lookups.push(address);
    return this.countries[address] ?? null;
  }
}

export async function createTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), 'geo-mapper-test-'));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}
