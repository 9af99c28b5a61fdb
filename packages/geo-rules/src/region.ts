/**
 * Region Selector
 *
 * Deterministic mapping from a leader's geo classification to one of the
 * four server regions. When no classification is available the region is
 * picked by hashing the leader identifier, so the same leader always lands
 * in the same region across calls and process restarts.
 *
 * @module geo-rules/region
 */

import { APAC_COUNTRIES, EU_COUNTRIES, ME_COUNTRIES, NA_COUNTRIES } from './classifier.js';
import { GeoBucket } from './geo-bucket.js';

export enum Region {
  Dubai = 'Dubai',
  Frankfurt = 'Frankfurt',
  NewYork = 'NewYork',
  Tokyo = 'Tokyo',
}

/**
 * Fallback order, indexed by `fnv1a64(identifier) % 4`
 */
export const FALLBACK_REGIONS: readonly [Region, Region, Region, Region] = [
  Region.Dubai,
  Region.Frankfurt,
  Region.NewYork,
  Region.Tokyo,
];

const FNV_OFFSET_BASIS = 0xcbf29ce484222325n;
const FNV_PRIME = 0x100000001b3n;

const textEncoder = new TextEncoder();

export function regionFromBucket(bucket: GeoBucket): Region | null {
  switch (bucket) {
    case GeoBucket.Eu:
      return Region.Frankfurt;
    case GeoBucket.Me:
      return Region.Dubai;
    case GeoBucket.Na:
      return Region.NewYork;
    case GeoBucket.Apac:
      return Region.Tokyo;
    case GeoBucket.Unknown:
      return null;
  }
}

/**
 * Map a bucket label or country code to a region.
 *
 * Accepts the bucket itself as well; UNKNOWN and unrecognised text give null.
 */
export function regionFromGeo(geo: string | GeoBucket): Region | null {
  if (typeof geo === 'number') {
    return regionFromBucket(geo);
  }

  const normalized = geo.trim().toUpperCase();

  if (normalized === 'EU' || EU_COUNTRIES.has(normalized)) return Region.Frankfurt;
  if (normalized === 'ME' || ME_COUNTRIES.has(normalized)) return Region.Dubai;
  if (normalized === 'NA' || NA_COUNTRIES.has(normalized)) return Region.NewYork;
  if (normalized === 'APAC' || APAC_COUNTRIES.has(normalized)) return Region.Tokyo;

  return null;
}

/**
 * 64-bit FNV-1a over raw bytes
 */
export function fnv1a64(bytes: Uint8Array): bigint {
  let hash = FNV_OFFSET_BASIS;
  for (const byte of bytes) {
    hash ^= BigInt(byte);
    hash = BigInt.asUintN(64, hash * FNV_PRIME);
  }
  return hash;
}

/**
 * Pick a region from the UTF-8 bytes of the identifier
 */
export function fallbackRegion(identifier: string): Region {
  const index = Number(fnv1a64(textEncoder.encode(identifier)) % 4n);
  return FALLBACK_REGIONS[index] ?? Region.Tokyo;
}

export function chooseRegion(geo: string | GeoBucket, identifier: string): Region {
  return regionFromGeo(geo) ?? fallbackRegion(identifier);
}
