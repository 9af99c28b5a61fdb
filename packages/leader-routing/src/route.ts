/**
 * Leader Routing Decision
 *
 * Pure routing step: leader identity in, geo label and closest region out.
 * Bad or missing map data never fails the caller; it only yields UNKNOWN
 * geo and the deterministic fallback region.
 *
 * @module leader-routing/route
 */

import { chooseRegion, type GeoLabel, type Region } from '@leader-geo/geo-rules';
import { getGeoMap } from './geo-map-store.js';
import { lookupLeaderGeo } from './lookup.js';

export const UNKNOWN_GEO: GeoLabel = 'UNKNOWN';

export interface RouteResult {
  readonly leaderGeo: GeoLabel;
  readonly closestRegion: Region;
}

export function route(identifier: string, geoMap: Uint8Array = getGeoMap()): RouteResult {
  const leaderGeo = lookupLeaderGeo(geoMap, identifier) ?? UNKNOWN_GEO;
  return {
    leaderGeo,
    closestRegion: chooseRegion(leaderGeo, identifier),
  };
}
