/**
 * Map Metadata Sidecar
 *
 * Every generated map gets a `<name>.meta.json` beside it recording where the
 * data came from (RPC endpoint and slot, geoip database digest) and what was
 * produced (statistics, map digest), so a deployed map can be audited later.
 *
 * @module metadata
 */

import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { format, parse } from 'node:path';
import { RECORD_SIZE } from '@leader-geo/geo-rules';
import type { GenerationStats } from './core/map-builder.js';
import { atomicWriteJSON } from './core/utils/atomic-write.js';

export const METADATA_SCHEMA_VERSION = 1;

export interface MapMetadata {
  readonly schema_version: number;
  readonly generated_at_unix_secs: number;
  readonly rpc_url: string;
  readonly rpc_slot: number;
  readonly db_path: string;
  readonly mmdb_sha256: string;
  readonly record_size_bytes: number;
  readonly total_leaders: number;
  readonly mapped_leaders: number;
  readonly unknown_leaders: number;
  readonly unknown_rate_pct: number;
  readonly map_size_bytes: number;
  readonly map_sha256: string;
}

export interface MetadataInput {
  readonly rpcUrl: string;
  readonly rpcSlot: number;
  readonly dbPath: string;
  readonly mapPath: string;
  readonly stats: GenerationStats;
  /** Defaults to now */
  readonly generatedAt?: Date;
}

export interface MetadataOutput {
  readonly path: string;
  readonly metadata: MapMetadata;
}

/**
 * `data/leader_geo_map.bin` → `data/leader_geo_map.meta.json`
 */
export function metadataPathForMap(mapPath: string): string {
  const { dir, name } = parse(mapPath);
  return format({ dir, name, ext: '.meta.json' });
}

/**
 * Hex SHA-256 of a file, streamed
 */
export function sha256File(path: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash('sha256');
    createReadStream(path)
      .on('data', (chunk) => hash.update(chunk))
      .on('error', reject)
      .on('end', () => resolve(hash.digest('hex')));
  });
}

/**
 * Hash the map and database and atomically write the sidecar
 *
 * @throws Error if either file cannot be read or the sidecar cannot be written
 */
export async function writeMapMetadata(input: MetadataInput): Promise<MetadataOutput> {
  const generatedAt = input.generatedAt ?? new Date();
  const [mapSha256, mmdbSha256] = await Promise.all([
    sha256File(input.mapPath),
    sha256File(input.dbPath),
  ]);

  const metadata: MapMetadata = {
    schema_version: METADATA_SCHEMA_VERSION,
    generated_at_unix_secs: Math.floor(generatedAt.getTime() / 1000),
    rpc_url: input.rpcUrl,
    rpc_slot: input.rpcSlot,
    db_path: input.dbPath,
    mmdb_sha256: mmdbSha256,
    record_size_bytes: RECORD_SIZE,
    total_leaders: input.stats.totalEntries,
    mapped_leaders: input.stats.mappedEntries,
    unknown_leaders: input.stats.unknownEntries,
    unknown_rate_pct: input.stats.unknownRatePct,
    map_size_bytes: input.stats.outputBytes,
    map_sha256: mapSha256,
  };

  const path = metadataPathForMap(input.mapPath);
  await atomicWriteJSON(path, metadata);

  return { path, metadata };
}
