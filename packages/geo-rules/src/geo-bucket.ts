/**
 * Geo Bucket Types
 *
 * Coarse geographic classification of a network participant. The numeric
 * value of each bucket is its on-disk byte in the binary leader geo map.
 *
 * @module geo-rules/geo-bucket
 */

export enum GeoBucket {
  Unknown = 0,
  Eu = 1,
  Na = 2,
  Apac = 3,
  Me = 4,
}

/**
 * Upper-case labels used in override files, logs and routing output
 */
export type GeoLabel = 'UNKNOWN' | 'EU' | 'NA' | 'APAC' | 'ME';

const BUCKET_LABELS: Record<GeoBucket, GeoLabel> = {
  [GeoBucket.Unknown]: 'UNKNOWN',
  [GeoBucket.Eu]: 'EU',
  [GeoBucket.Na]: 'NA',
  [GeoBucket.Apac]: 'APAC',
  [GeoBucket.Me]: 'ME',
};

const LABEL_BUCKETS: Record<GeoLabel, GeoBucket> = {
  UNKNOWN: GeoBucket.Unknown,
  EU: GeoBucket.Eu,
  NA: GeoBucket.Na,
  APAC: GeoBucket.Apac,
  ME: GeoBucket.Me,
};

export const GEO_LABELS: readonly GeoLabel[] = ['UNKNOWN', 'EU', 'NA', 'APAC', 'ME'];

export function bucketLabel(bucket: GeoBucket): GeoLabel {
  return BUCKET_LABELS[bucket];
}

/**
 * Map a raw record byte back to a bucket.
 *
 * @returns The bucket, or null for any byte outside 0-4
 */
export function bucketFromByte(value: number): GeoBucket | null {
  switch (value) {
    case 0:
      return GeoBucket.Unknown;
    case 1:
      return GeoBucket.Eu;
    case 2:
      return GeoBucket.Na;
    case 3:
      return GeoBucket.Apac;
    case 4:
      return GeoBucket.Me;
    default:
      return null;
  }
}

export function isGeoLabel(value: string): value is GeoLabel {
  return Object.prototype.hasOwnProperty.call(LABEL_BUCKETS, value);
}

export function bucketForLabel(label: GeoLabel): GeoBucket {
  return LABEL_BUCKETS[label];
}
