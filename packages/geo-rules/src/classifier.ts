/**
 * Geo Classifier
 *
 * Pure functions mapping ISO 3166-1 alpha-2 country codes and bucket labels
 * to a GeoBucket. The country sets are fixed; anything outside them is
 * Unknown rather than guessed.
 *
 * @module geo-rules/classifier
 */

import { GeoBucket, bucketForLabel, isGeoLabel } from './geo-bucket.js';

// ============================================================================
// Country Sets
// ============================================================================

export const EU_COUNTRIES: ReadonlySet<string> = new Set([
  'DE', 'FR', 'NL', 'GB', 'CH', 'SE', 'NO', 'PL', 'ES', 'IT',
]);

export const ME_COUNTRIES: ReadonlySet<string> = new Set([
  'AE', 'SA', 'IL', 'TR', 'QA', 'BH', 'OM', 'KW',
]);

export const NA_COUNTRIES: ReadonlySet<string> = new Set(['US', 'CA', 'MX']);

export const APAC_COUNTRIES: ReadonlySet<string> = new Set([
  'JP', 'KR', 'SG', 'HK', 'TW', 'IN', 'AU', 'NZ',
]);

// ============================================================================
// Classification
// ============================================================================

/**
 * Classify a country code (case and surrounding whitespace ignored)
 *
 * @example
 * ```typescript
 * bucketFromCountryIso(' de '); // GeoBucket.Eu
 * bucketFromCountryIso('BR');   // GeoBucket.Unknown
 * ```
 */
export function bucketFromCountryIso(code: string): GeoBucket {
  const normalized = code.trim().toUpperCase();

  if (EU_COUNTRIES.has(normalized)) return GeoBucket.Eu;
  if (ME_COUNTRIES.has(normalized)) return GeoBucket.Me;
  if (NA_COUNTRIES.has(normalized)) return GeoBucket.Na;
  if (APAC_COUNTRIES.has(normalized)) return GeoBucket.Apac;

  return GeoBucket.Unknown;
}

/**
 * Match a bucket label such as `eu`, `@NA` or `unknown`.
 *
 * One leading `@` is stripped after trimming.
 */
export function bucketFromLabel(text: string): GeoBucket | null {
  let normalized = text.trim();
  if (normalized.startsWith('@')) {
    normalized = normalized.slice(1);
  }
  normalized = normalized.toUpperCase();

  return isGeoLabel(normalized) ? bucketForLabel(normalized) : null;
}

/**
 * Classify free-form geo input: a bucket label first, then a country code
 */
export function bucketFromGeoInput(text: string): GeoBucket {
  return bucketFromLabel(text) ?? bucketFromCountryIso(text.toUpperCase());
}
