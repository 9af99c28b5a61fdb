/**
 * Leader Geo Map Builder
 *
 * Aggregates per-key geo sources into a deduplicated map sorted by key.
 *
 * MERGE POLICY:
 * The first bucket seen for a key wins, except that Unknown is upgraded by
 * any later concrete bucket. A concrete bucket is never downgraded.
 *
 * FAILURE POLICY:
 * Rows with a key that is not 32 bytes are skipped. A geoip backend failure
 * aborts the whole build with a BackendError naming the row.
 *
 * @module core/map-builder
 */

import {
  GeoBucket,
  KEY_SIZE,
  RECORD_SIZE,
  bucketFromCountryIso,
  comparePublicKeys,
  encodePublicKey,
  publicKeyToHex,
} from '@leader-geo/geo-rules';
import type { GeoIpResolver } from '../geoip/geoip-resolver.js';
import { BackendError, errorMessage } from './errors.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Where a row's geolocation comes from
 */
export type GeoSource =
  | { readonly kind: 'bucket'; readonly bucket: GeoBucket }
  | { readonly kind: 'address'; readonly address: string };

export interface GeoRow {
  readonly publicKey: Uint8Array;
  readonly source: GeoSource;
  /** Where the row came from, for diagnostics */
  readonly origin: string;
}

export interface MapEntry {
  readonly publicKey: Uint8Array;
  readonly bucket: GeoBucket;
}

export interface GenerationStats {
  readonly totalEntries: number;
  readonly mappedEntries: number;
  readonly unknownEntries: number;
  /** Percentage of entries left Unknown, 0 for an empty map */
  readonly unknownRatePct: number;
  /** Size of the encoded map: entries × 33 */
  readonly outputBytes: number;
}

export interface BuildResult {
  readonly entries: readonly MapEntry[];
  readonly stats: GenerationStats;
  readonly rowsProcessed: number;
  readonly rowsSkipped: number;
}

// ============================================================================
// Builder
// ============================================================================

export class GeoMapBuilder {
  private readonly byKey = new Map<string, MapEntry>();

  get size(): number {
    return this.byKey.size;
  }

  /**
   * Record a bucket for a key under the merge policy.
   *
   * @returns false when the key is not 32 bytes and was ignored
   */
  insert(publicKey: Uint8Array, bucket: GeoBucket): boolean {
    if (publicKey.length !== KEY_SIZE) {
      return false;
    }

    const id = publicKeyToHex(publicKey);
    const existing = this.byKey.get(id);

    if (!existing) {
      this.byKey.set(id, { publicKey: Uint8Array.from(publicKey), bucket });
    } else if (existing.bucket === GeoBucket.Unknown && bucket !== GeoBucket.Unknown) {
      this.byKey.set(id, { publicKey: existing.publicKey, bucket });
    }

    return true;
  }

  get(publicKey: Uint8Array): GeoBucket | undefined {
    return this.byKey.get(publicKeyToHex(publicKey))?.bucket;
  }

  /**
   * All entries in ascending key order
   */
  entries(): MapEntry[] {
    return [...this.byKey.values()].sort((a, b) => comparePublicKeys(a.publicKey, b.publicKey));
  }
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Resolve a row's source to a bucket
 *
 * @throws {BackendError} If the geoip resolver fails
 */
export function resolveBucket(row: GeoRow, resolver: GeoIpResolver, index: number): GeoBucket {
  if (row.source.kind === 'bucket') {
    return row.source.bucket;
  }

  const { address } = row.source;
  let country: string | null;
  try {
    country = resolver.countryCode(address);
  } catch (error) {
    throw new BackendError(
      `geoip lookup failed for row ${index} (${row.origin}) address ${address}: ${errorMessage(error)}`,
      'geoip',
      'lookup',
      { row: index, origin: row.origin, publicKey: encodePublicKey(row.publicKey), address },
      error
    );
  }

  return country === null ? GeoBucket.Unknown : bucketFromCountryIso(country);
}

export function computeGenerationStats(entries: readonly MapEntry[]): GenerationStats {
  const totalEntries = entries.length;
  const unknownEntries = entries.filter((entry) => entry.bucket === GeoBucket.Unknown).length;
  const mappedEntries = totalEntries - unknownEntries;

  return {
    totalEntries,
    mappedEntries,
    unknownEntries,
    unknownRatePct: totalEntries === 0 ? 0 : (unknownEntries / totalEntries) * 100,
    outputBytes: totalEntries * RECORD_SIZE,
  };
}

/**
 * Build the map from rows, resolving them one at a time in order
 *
 * @throws {BackendError} On the first geoip backend failure
 */
export function buildGeoMap(rows: Iterable<GeoRow>, resolver: GeoIpResolver): BuildResult {
  const builder = new GeoMapBuilder();
  let rowsProcessed = 0;
  let rowsSkipped = 0;

  for (const row of rows) {
    const index = rowsProcessed++;
    if (row.publicKey.length !== KEY_SIZE) {
      rowsSkipped++;
      continue;
    }
    builder.insert(row.publicKey, resolveBucket(row, resolver, index));
  }

  const entries = builder.entries();

  return {
    entries,
    stats: computeGenerationStats(entries),
    rowsProcessed,
    rowsSkipped,
  };
}
