/**
 * GeoIP Resolver
 *
 * Address → ISO country code, backed by a MaxMind GeoLite2/GeoIP2 database.
 * Lookups are synchronous once the database is open.
 *
 * @module geoip/geoip-resolver
 */

import maxmind, { type CountryResponse, type Reader } from 'maxmind';
import { createLogger } from '@leader-geo/geo-rules';
import { BackendError, errorMessage } from '../core/errors.js';

const log = createLogger('geoip');

/**
 * Country lookup used by the map builder
 */
export interface GeoIpResolver {
  /**
   * @returns The ISO country code for the address, or null when the
   * database has no country for it
   * @throws When the backend itself fails
   */
  countryCode(address: string): string | null;
}

export class MaxMindGeoIpResolver implements GeoIpResolver {
  constructor(
    private readonly reader: Reader<CountryResponse>,
    readonly dbPath: string
  ) {}

  countryCode(address: string): string | null {
    const result = this.reader.get(address);
    return result?.country?.iso_code ?? null;
  }
}

/**
 * Open a MaxMind database (City or Country edition)
 *
 * @throws {BackendError} If the file is missing or is not a MaxMind database
 */
export async function openMaxMindResolver(dbPath: string): Promise<MaxMindGeoIpResolver> {
  try {
    const reader = await maxmind.open<CountryResponse>(dbPath, { watchForUpdates: false });
    log.debug('Opened geoip database', { dbPath });
    return new MaxMindGeoIpResolver(reader, dbPath);
  } catch (error) {
    throw new BackendError(
      `failed to open geoip database ${dbPath}: ${errorMessage(error)}`,
      'geoip',
      'open',
      { dbPath },
      error
    );
  }
}
