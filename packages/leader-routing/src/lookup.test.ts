import { describe, it, expect } from 'vitest';
import { GeoBucket } from '@leader-geo/geo-rules';
import { lookupGeoBucket, lookupLeaderGeo } from './lookup.js';
import { KEY_A, KEY_B, KEY_C, KEY_D, KEY_ZERO, buildGeoMap, keyBytes } from './__tests__/fixtures.js';

describe('lookupGeoBucket', () => {
  const geoMap = buildGeoMap([
    [KEY_B, 1],
    [KEY_A, 2],
    [KEY_C, 3],
  ]);

  it('finds every stored key', () => {
    expect(lookupGeoBucket(geoMap, keyBytes(KEY_A))).toBe(GeoBucket.Na);
    expect(lookupGeoBucket(geoMap, keyBytes(KEY_B))).toBe(GeoBucket.Eu);
    expect(lookupGeoBucket(geoMap, keyBytes(KEY_C))).toBe(GeoBucket.Apac);
  });

  it('misses keys that are not stored', () => {
    expect(lookupGeoBucket(geoMap, keyBytes(KEY_ZERO))).toBeNull();
    expect(lookupGeoBucket(geoMap, keyBytes(KEY_D))).toBeNull();
  });

  it('misses everything in an empty map', () => {
    expect(lookupGeoBucket(new Uint8Array(0), keyBytes(KEY_A))).toBeNull();
  });

  it('rejects misaligned data without reading it', () => {
    expect(lookupGeoBucket(new Uint8Array([1, 2, 3]), new Uint8Array(32))).toBeNull();
    expect(lookupGeoBucket(geoMap.subarray(0, geoMap.length - 1), keyBytes(KEY_A))).toBeNull();
  });

  it('rejects query keys that are not 32 bytes', () => {
    expect(lookupGeoBucket(geoMap, keyBytes(KEY_A).subarray(0, 31))).toBeNull();
  });

  it('treats bucket bytes outside the domain as not found', () => {
    const corrupt = buildGeoMap([
      [KEY_A, 9],
      [KEY_B, 1],
    ]);
    expect(lookupGeoBucket(corrupt, keyBytes(KEY_A))).toBeNull();
    expect(lookupGeoBucket(corrupt, keyBytes(KEY_B))).toBe(GeoBucket.Eu);
  });

  it('finds the first and last of a larger map', () => {
    const entries: Array<[string, number]> = [
      [KEY_ZERO, 0],
      [KEY_A, 1],
      [KEY_B, 2],
      [KEY_C, 3],
      [KEY_D, 4],
    ];
    const large = buildGeoMap(entries);
    expect(lookupGeoBucket(large, keyBytes(KEY_ZERO))).toBe(GeoBucket.Unknown);
    expect(lookupGeoBucket(large, keyBytes(KEY_D))).toBe(GeoBucket.Me);
  });
});

describe('lookupLeaderGeo', () => {
  const geoMap = buildGeoMap([
    [KEY_B, 1],
    [KEY_A, 2],
    [KEY_C, 3],
    [KEY_D, 4],
  ]);

  it('decodes the identifier and returns the label', () => {
    expect(lookupLeaderGeo(geoMap, KEY_C)).toBe('APAC');
    expect(lookupLeaderGeo(geoMap, KEY_D)).toBe('ME');
  });

  it('returns null for absent, undecodable and unknown leaders', () => {
    expect(lookupLeaderGeo(geoMap, KEY_ZERO)).toBeNull();
    expect(lookupLeaderGeo(geoMap, 'not-a-key')).toBeNull();
    expect(lookupLeaderGeo(buildGeoMap([[KEY_A, 0]]), KEY_A)).toBeNull();
  });
});
