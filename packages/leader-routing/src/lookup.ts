/**
 * Binary Geo Map Lookup
 *
 * Point queries against the raw leader geo map: a concatenation of 33-byte
 * records (32 key bytes, 1 bucket byte) sorted ascending by key.
 *
 * The map may be supplied from outside the process, so every access is
 * bounded by the observed blob length. A blob whose length is not a
 * multiple of the record size answers "not found" for every key.
 *
 * @module leader-routing/lookup
 */

import {
  GeoBucket,
  KEY_SIZE,
  RECORD_SIZE,
  bucketFromByte,
  bucketLabel,
  decodePublicKey,
  type GeoLabel,
} from '@leader-geo/geo-rules';

/**
 * Compare the key stored at `offset` with `key`, byte by byte, in place
 */
function compareKeyAt(blob: Uint8Array, offset: number, key: Uint8Array): number {
  for (let i = 0; i < KEY_SIZE; i++) {
    const diff = blob[offset + i] - key[i];
    if (diff !== 0) {
      return diff;
    }
  }
  return 0;
}

/**
 * Binary search the map for a 32-byte key.
 *
 * O(log n), no allocation. A stored byte outside the bucket domain is
 * reported as not found.
 *
 * @returns The stored bucket, or null when the key is absent or the blob
 * is malformed
 */
export function lookupGeoBucket(blob: Uint8Array, key: Uint8Array): GeoBucket | null {
  if (blob.length % RECORD_SIZE !== 0 || key.length !== KEY_SIZE) {
    return null;
  }

  let left = 0;
  let right = blob.length / RECORD_SIZE;

  while (left < right) {
    const mid = left + Math.floor((right - left) / 2);
    const offset = mid * RECORD_SIZE;
    const order = compareKeyAt(blob, offset, key);

    if (order < 0) {
      left = mid + 1;
    } else if (order > 0) {
      right = mid;
    } else {
      return bucketFromByte(blob[offset + KEY_SIZE]);
    }
  }

  return null;
}

/**
 * Look up a base58 leader identity and return its bucket label.
 *
 * Unknown, absent, undecodable and illegal entries all give null.
 */
export function lookupLeaderGeo(blob: Uint8Array, identifier: string): GeoLabel | null {
  const key = decodePublicKey(identifier);
  if (!key) {
    return null;
  }

  const bucket = lookupGeoBucket(blob, key);
  if (bucket === null || bucket === GeoBucket.Unknown) {
    return null;
  }

  return bucketLabel(bucket);
}
