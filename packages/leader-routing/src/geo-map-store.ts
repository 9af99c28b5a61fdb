/**
 * Process-wide Leader Geo Map
 *
 * The map is loaded once at startup and treated as immutable until the
 * process exits. Readers share the same bytes without locking; nothing
 * in this package writes to them after load.
 *
 * @module leader-routing/geo-map-store
 */

import { readFile } from 'node:fs/promises';
import { RECORD_SIZE, createLogger } from '@leader-geo/geo-rules';

const log = createLogger('geo-map');

const EMPTY_MAP = new Uint8Array(0);

let geoMap: Uint8Array = EMPTY_MAP;
let loadedFrom: string | null = null;

/**
 * Load the map from disk. Later calls return the already loaded map.
 *
 * A malformed file is kept as loaded: lookups against it answer
 * "not found" and routing falls back to the identifier hash.
 *
 * @throws Error if the file cannot be read
 */
export async function loadGeoMap(path: string): Promise<Uint8Array> {
  if (loadedFrom !== null) {
    return geoMap;
  }

  const bytes = await readFile(path);
  setGeoMap(bytes, path);

  return geoMap;
}

/**
 * Install an in-memory map (for an embedded blob or tests)
 */
export function setGeoMap(blob: Uint8Array, source = 'memory'): void {
  geoMap = blob;
  loadedFrom = source;

  if (blob.length % RECORD_SIZE !== 0) {
    log.warn('Leader geo map is not a whole number of records; every lookup will miss', {
      source,
      bytes: blob.length,
      recordSize: RECORD_SIZE,
    });
  } else {
    log.debug('Leader geo map loaded', { source, records: blob.length / RECORD_SIZE });
  }
}

/**
 * The loaded map, or an empty map before any load
 */
export function getGeoMap(): Uint8Array {
  return geoMap;
}

export function geoMapSource(): string | null {
  return loadedFrom;
}

export function resetGeoMap(): void {
  geoMap = EMPTY_MAP;
  loadedFrom = null;
}
