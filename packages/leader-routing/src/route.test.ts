import { afterEach, describe, it, expect } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Region } from '@leader-geo/geo-rules';
import { route } from './route.js';
import { getGeoMap, geoMapSource, loadGeoMap, resetGeoMap, setGeoMap } from './geo-map-store.js';
import { KEY_A, KEY_B, buildGeoMap } from './__tests__/fixtures.js';

afterEach(() => {
  resetGeoMap();
});

describe('route', () => {
  const geoMap = buildGeoMap([
    [KEY_A, 1],
    [KEY_B, 4],
  ]);

  it('routes mapped leaders by their bucket', () => {
    expect(route(KEY_A, geoMap)).toEqual({ leaderGeo: 'EU', closestRegion: Region.Frankfurt });
    expect(route(KEY_B, geoMap)).toEqual({ leaderGeo: 'ME', closestRegion: Region.Dubai });
  });

  it('falls back deterministically for unmapped leaders', () => {
    expect(route('validator-x', geoMap)).toEqual({
      leaderGeo: 'UNKNOWN',
      closestRegion: Region.Dubai,
    });
    expect(route('validator-y', geoMap).closestRegion).toBe(Region.Tokyo);
  });

  it('never fails on a malformed map', () => {
    expect(route(KEY_A, new Uint8Array([1, 2, 3]))).toEqual({
      leaderGeo: 'UNKNOWN',
      closestRegion: route(KEY_A, new Uint8Array(0)).closestRegion,
    });
  });

  it('uses the process-wide map by default', () => {
    expect(route(KEY_A).leaderGeo).toBe('UNKNOWN');
    setGeoMap(geoMap);
    expect(route(KEY_A).leaderGeo).toBe('EU');
  });
});

describe('geo map store', () => {
  it('starts empty', () => {
    expect(getGeoMap().length).toBe(0);
    expect(geoMapSource()).toBeNull();
  });

  it('loads a map file once', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'leader-geo-store-'));
    const path = join(dir, 'leader_geo_map.bin');
    await writeFile(path, buildGeoMap([[KEY_A, 3]]));

    try {
      const first = await loadGeoMap(path);
      expect(first.length).toBe(33);
      expect(geoMapSource()).toBe(path);

      await writeFile(path, new Uint8Array(0));
      const second = await loadGeoMap(path);
      expect(second).toBe(first);
      expect(route(KEY_A).leaderGeo).toBe('APAC');
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('keeps a malformed map loaded and misses every lookup', () => {
    setGeoMap(new Uint8Array(34), 'test');
    expect(getGeoMap().length).toBe(34);
    expect(route(KEY_A).leaderGeo).toBe('UNKNOWN');
  });
});
