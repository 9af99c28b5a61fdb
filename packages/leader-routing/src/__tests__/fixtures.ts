/**
 * Shared fixtures for leader routing tests
 */

import { RECORD_SIZE, comparePublicKeys, decodePublicKey } from '@leader-geo/geo-rules';

export const KEY_A = '2jXy799ynN5A6xM4mT2QPY2ATqNnSboP8Gr3HdWu3UwR';
export const KEY_B = '7XSXtg2CWwjWCa7j4kXfYLMi8xawJbq6XW6xMa6Y5P9Q';
export const KEY_C = '9QxCLckBiJc783jnMvXZubK4wH86Eqqvashtrwvcsgkv';
export const KEY_D = '9YvS2fH5A2m2W6B8hWcP8d9Yhrb2nJbLg2xwqQ8CbW2s';
export const KEY_ZERO = '11111111111111111111111111111111';

export function keyBytes(text: string): Uint8Array {
  const key = decodePublicKey(text);
  if (!key) {
    throw new Error(`fixture key does not decode: ${text}`);
  }
  return key;
}

/**
 * Build a sorted map blob from (base58 key, raw bucket byte) pairs
 */
export function buildGeoMap(entries: ReadonlyArray<readonly [string, number]>): Uint8Array {
  const decoded = entries
    .map(([text, bucket]) => [keyBytes(text), bucket] as const)
    .sort(([a], [b]) => comparePublicKeys(a, b));

  const blob = new Uint8Array(decoded.length * RECORD_SIZE);
  decoded.forEach(([key, bucket], index) => {
    blob.set(key, index * RECORD_SIZE);
    blob[index * RECORD_SIZE + key.length] = bucket;
  });
  return blob;
}
