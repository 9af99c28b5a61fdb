import { describe, it, expect } from 'vitest';
import { GeoBucket, encodePublicKey } from '@leader-geo/geo-rules';
import { BackendError } from './errors.js';
import {
  GeoMapBuilder,
  buildGeoMap,
  computeGenerationStats,
  resolveBucket,
  type GeoRow,
} from './map-builder.js';
import { FakeGeoIpResolver, KEY_A, KEY_B, KEY_C, keyBytes } from '../__tests__/fixtures.js';

function addressRow(key: string, address: string, origin = 'test'): GeoRow {
  return { publicKey: keyBytes(key), source: { kind: 'address', address }, origin };
}

function bucketRow(key: string, bucket: GeoBucket, origin = 'test'): GeoRow {
  return { publicKey: keyBytes(key), source: { kind: 'bucket', bucket }, origin };
}

describe('GeoMapBuilder', () => {
  it('upgrades Unknown to a later concrete bucket', () => {
    const builder = new GeoMapBuilder();
    builder.insert(keyBytes(KEY_A), GeoBucket.Unknown);
    builder.insert(keyBytes(KEY_A), GeoBucket.Eu);

    expect(builder.get(keyBytes(KEY_A))).toBe(GeoBucket.Eu);
    expect(builder.size).toBe(1);
  });

  it('never downgrades a concrete bucket to Unknown', () => {
    const builder = new GeoMapBuilder();
    builder.insert(keyBytes(KEY_A), GeoBucket.Eu);
    builder.insert(keyBytes(KEY_A), GeoBucket.Unknown);

    expect(builder.get(keyBytes(KEY_A))).toBe(GeoBucket.Eu);
  });

  it('keeps the first concrete bucket', () => {
    const builder = new GeoMapBuilder();
    builder.insert(keyBytes(KEY_A), GeoBucket.Na);
    builder.insert(keyBytes(KEY_A), GeoBucket.Apac);

    expect(builder.get(keyBytes(KEY_A))).toBe(GeoBucket.Na);
  });

  it('rejects keys that are not 32 bytes', () => {
    const builder = new GeoMapBuilder();

    expect(builder.insert(new Uint8Array(31), GeoBucket.Eu)).toBe(false);
    expect(builder.size).toBe(0);
  });

  it('returns entries in ascending key order', () => {
    const builder = new GeoMapBuilder();
    builder.insert(keyBytes(KEY_C), GeoBucket.Me);
    builder.insert(keyBytes(KEY_A), GeoBucket.Eu);
    builder.insert(keyBytes(KEY_B), GeoBucket.Na);

    expect(builder.entries().map((entry) => encodePublicKey(entry.publicKey))).toEqual([
      KEY_A,
      KEY_B,
      KEY_C,
    ]);
  });

  it('copies inserted keys', () => {
    const builder = new GeoMapBuilder();
    const key = keyBytes(KEY_A);
    builder.insert(key, GeoBucket.Eu);
    key.fill(0);

    expect(encodePublicKey(builder.entries()[0]?.publicKey ?? new Uint8Array())).toBe(KEY_A);
  });
});

describe('resolveBucket', () => {
  it('uses explicit buckets without a lookup', () => {
    const resolver = new FakeGeoIpResolver();

    expect(resolveBucket(bucketRow(KEY_A, GeoBucket.Me), resolver, 0)).toBe(GeoBucket.Me);
    expect(resolver.lookups).toEqual([]);
  });

  it('classifies the resolved country', () => {
    const resolver = new FakeGeoIpResolver({ '192.0.2.10': 'SG', '192.0.2.11': 'BR' });

    expect(resolveBucket(addressRow(KEY_A, '192.0.2.10'), resolver, 0)).toBe(GeoBucket.Apac);
    expect(resolveBucket(addressRow(KEY_A, '192.0.2.11'), resolver, 1)).toBe(GeoBucket.Unknown);
    expect(resolveBucket(addressRow(KEY_A, '192.0.2.99'), resolver, 2)).toBe(GeoBucket.Unknown);
  });

  it('wraps resolver failures in a BackendError naming the row', () => {
    const resolver = {
      countryCode: (): string | null => {
        throw new Error('corrupt database');
      },
    };

    let caught: unknown;
    try {
      resolveBucket(addressRow(KEY_B, '192.0.2.10', 'getClusterNodes[7]'), resolver, 7);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(BackendError);
    expect(caught).toMatchObject({
      backend: 'geoip',
      operation: 'lookup',
      context: { row: 7, origin: 'getClusterNodes[7]', publicKey: KEY_B, address: '192.0.2.10' },
    });
  });
});

describe('buildGeoMap', () => {
  it('merges rows and reports statistics', () => {
    const resolver = new FakeGeoIpResolver({ '192.0.2.1': 'DE', '192.0.2.2': 'US' });

    const result = buildGeoMap(
      [
        addressRow(KEY_A, '192.0.2.1'),
        addressRow(KEY_B, '192.0.2.9'),
        addressRow(KEY_C, '192.0.2.2'),
        bucketRow(KEY_B, GeoBucket.Me),
      ],
      resolver
    );

    expect(result.entries.map((entry) => entry.bucket)).toEqual([
      GeoBucket.Eu,
      GeoBucket.Me,
      GeoBucket.Na,
    ]);
    expect(result.rowsProcessed).toBe(4);
    expect(result.rowsSkipped).toBe(0);
    expect(result.stats).toEqual({
      totalEntries: 3,
      mappedEntries: 3,
      unknownEntries: 0,
      unknownRatePct: 0,
      outputBytes: 99,
    });
  });

  it('skips rows with a bad key length', () => {
    const result = buildGeoMap(
      [{ publicKey: new Uint8Array(16), source: { kind: 'bucket', bucket: GeoBucket.Eu }, origin: 'x' }],
      new FakeGeoIpResolver()
    );

    expect(result.entries).toEqual([]);
    expect(result.rowsSkipped).toBe(1);
  });

  it('aborts on the first backend failure', () => {
    const resolver = {
      countryCode: (): string | null => {
        throw new Error('read error');
      },
    };

    expect(() => buildGeoMap([addressRow(KEY_A, '192.0.2.1')], resolver)).toThrow(BackendError);
  });
});

describe('computeGenerationStats', () => {
  it('reports zero rates for an empty map', () => {
    expect(computeGenerationStats([])).toEqual({
      totalEntries: 0,
      mappedEntries: 0,
      unknownEntries: 0,
      unknownRatePct: 0,
      outputBytes: 0,
    });
  });

  it('computes the unknown percentage', () => {
    const stats = computeGenerationStats([
      { publicKey: keyBytes(KEY_A), bucket: GeoBucket.Unknown },
      { publicKey: keyBytes(KEY_B), bucket: GeoBucket.Eu },
      { publicKey: keyBytes(KEY_C), bucket: GeoBucket.Unknown },
      { publicKey: keyBytes(KEY_C), bucket: GeoBucket.Na },
    ]);

    expect(stats.unknownEntries).toBe(2);
    expect(stats.mappedEntries).toBe(2);
    expect(stats.unknownRatePct).toBe(50);
    expect(stats.outputBytes).toBe(132);
  });
});
