/**
 * @leader-geo/geo-rules
 *
 * Shared classification rules for the leader geo map: buckets, regions and
 * public key handling.
 *
 * @module geo-rules
 */

export {
  GeoBucket,
  GEO_LABELS,
  bucketLabel,
  bucketFromByte,
  bucketForLabel,
  isGeoLabel,
} from './geo-bucket.js';
export type { GeoLabel } from './geo-bucket.js';

export {
  EU_COUNTRIES,
  ME_COUNTRIES,
  NA_COUNTRIES,
  APAC_COUNTRIES,
  bucketFromCountryIso,
  bucketFromLabel,
  bucketFromGeoInput,
} from './classifier.js';

export {
  Region,
  FALLBACK_REGIONS,
  regionFromBucket,
  regionFromGeo,
  fnv1a64,
  fallbackRegion,
  chooseRegion,
} from './region.js';

export {
  KEY_SIZE,
  RECORD_SIZE,
  decodePublicKey,
  encodePublicKey,
  comparePublicKeys,
  publicKeyToHex,
} from './public-key.js';

export { Logger, logger, createLogger } from './utils/logger.js';
export type { LogLevel, LogMetadata } from './utils/logger.js';
