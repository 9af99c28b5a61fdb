/**
 * Binary Leader Geo Map Codec
 *
 * FORMAT:
 * Concatenation of 33-byte records, no header, no footer, no length prefix:
 *
 *   [ 32 key bytes | 1 bucket byte ] × n     (ascending by key)
 *
 * A blob is well-formed iff its length is a multiple of 33. Readers never
 * trust more than that: records are only read from well-formed blobs and
 * every offset stays within the observed length.
 *
 * @module core/binary-map
 */

import { readFile } from 'node:fs/promises';
import {
  KEY_SIZE,
  RECORD_SIZE,
  bucketFromByte,
  bucketLabel,
  comparePublicKeys,
  type GeoLabel,
} from '@leader-geo/geo-rules';
import { CodecError } from './errors.js';
import type { MapEntry } from './map-builder.js';
import { atomicWriteFile } from './utils/atomic-write.js';

// ============================================================================
// Types
// ============================================================================

export interface MapRecord {
  /** View into the blob; copy before keeping it */
  readonly publicKey: Uint8Array;
  readonly bucketByte: number;
}

export interface MapVerification {
  readonly byteLength: number;
  readonly wellFormed: boolean;
  readonly records: number;
  /** Keys strictly ascending (no duplicates) */
  readonly sorted: boolean;
  /** Records whose bucket byte is outside 0-4 */
  readonly illegalBuckets: number;
  readonly bucketCounts: Readonly<Record<GeoLabel, number>>;
}

// ============================================================================
// Encoding
// ============================================================================

/**
 * Encode entries that are already in ascending key order.
 *
 * @throws {CodecError} If a key is not 32 bytes or keys are not strictly ascending
 */
export function encodeGeoMap(entries: readonly MapEntry[]): Uint8Array {
  const output = new Uint8Array(entries.length * RECORD_SIZE);

  entries.forEach((entry, index) => {
    if (entry.publicKey.length !== KEY_SIZE) {
      throw new CodecError(
        `record ${index}: expected ${KEY_SIZE}-byte key, got ${entry.publicKey.length}`,
        index
      );
    }

    const previous = index > 0 ? entries[index - 1] : undefined;
    if (previous && comparePublicKeys(previous.publicKey, entry.publicKey) >= 0) {
      throw new CodecError(`record ${index}: keys must be strictly ascending`, index);
    }

    const offset = index * RECORD_SIZE;
    output.set(entry.publicKey, offset);
    output[offset + KEY_SIZE] = entry.bucket;
  });

  return output;
}

/**
 * Encode and atomically write the map, creating missing directories
 *
 * @returns Number of bytes written
 * @throws {CodecError} For invalid entries
 * @throws Error for any I/O failure
 */
export async function writeBinaryMap(path: string, entries: readonly MapEntry[]): Promise<number> {
  const bytes = encodeGeoMap(entries);
  await atomicWriteFile(path, bytes);
  return bytes.length;
}

// ============================================================================
// Decoding
// ============================================================================

export function isWellFormed(blob: Uint8Array): boolean {
  return blob.length % RECORD_SIZE === 0;
}

/**
 * Iterate records of a well-formed blob. A malformed blob yields nothing.
 */
export function* readRecords(blob: Uint8Array): Generator<MapRecord> {
  if (!isWellFormed(blob)) {
    return;
  }

  for (let offset = 0; offset < blob.length; offset += RECORD_SIZE) {
    yield {
      publicKey: blob.subarray(offset, offset + KEY_SIZE),
      bucketByte: blob[offset + KEY_SIZE],
    };
  }
}

/**
 * Check alignment, key order and bucket bytes of a map
 */
export function verifyBinaryMap(blob: Uint8Array): MapVerification {
  const bucketCounts: Record<GeoLabel, number> = { UNKNOWN: 0, EU: 0, NA: 0, APAC: 0, ME: 0 };
  const wellFormed = isWellFormed(blob);
  let records = 0;
  let sorted = true;
  let illegalBuckets = 0;
  let previous: Uint8Array | null = null;

  for (const record of readRecords(blob)) {
    records++;

    if (previous && comparePublicKeys(previous, record.publicKey) >= 0) {
      sorted = false;
    }
    previous = record.publicKey;

    const bucket = bucketFromByte(record.bucketByte);
    if (bucket === null) {
      illegalBuckets++;
    } else {
      bucketCounts[bucketLabel(bucket)]++;
    }
  }

  return {
    byteLength: blob.length,
    wellFormed,
    records,
    sorted,
    illegalBuckets,
    bucketCounts,
  };
}

export function isValidMap(verification: MapVerification): boolean {
  return verification.wellFormed && verification.sorted && verification.illegalBuckets === 0;
}

/**
 * Read a map file as raw bytes
 */
export async function readBinaryMap(path: string): Promise<Uint8Array> {
  const bytes = await readFile(path);
  return new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}
