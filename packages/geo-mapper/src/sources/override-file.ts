/**
 * Override File Parser
 *
 * Manual geo assignments, one per line:
 *
 *   # comment
 *   <base58 pubkey>,<ip address | bucket label>
 *
 * Labels are EU, NA, APAC, ME or UNKNOWN with an optional leading `@`, in
 * any case. Blank lines and `#` comments are ignored. Rows that cannot be
 * used are skipped and reported with their line number.
 */

import { isIP } from 'node:net';
import { bucketFromLabel, decodePublicKey } from '@leader-geo/geo-rules';
import { InputError } from '../core/errors.js';
import type { GeoRow, GeoSource } from '../core/map-builder.js';
import type { RowCollection } from '../rpc/cluster-rows.js';

/**
 * Parse one non-comment line
 *
 * @throws {InputError} If the line is not `<key>,<geo-source>`
 */
export function parseOverrideLine(line: string, origin: string): GeoRow {
  const fields = line.split(',');
  if (fields.length !== 2) {
    throw new InputError(`expected <pubkey>,<ip|label>, got ${fields.length} field(s)`, origin);
  }

  const [keyText = '', sourceText = ''] = fields.map((field) => field.trim());

  const publicKey = decodePublicKey(keyText);
  if (!publicKey) {
    throw new InputError(`invalid pubkey ${JSON.stringify(keyText)}`, origin);
  }

  return { publicKey, source: parseGeoSource(sourceText, origin), origin };
}

function parseGeoSource(text: string, origin: string): GeoSource {
  if (isIP(text) !== 0) {
    return { kind: 'address', address: text };
  }

  const bucket = bucketFromLabel(text);
  if (bucket === null) {
    throw new InputError(`expected an IP address or geo label, got ${JSON.stringify(text)}`, origin);
  }

  return { kind: 'bucket', bucket };
}

/**
 * Parse a whole override file
 *
 * @param name - File name used in row origins, e.g. `overrides.csv`
 */
export function parseOverrideFile(text: string, name: string): RowCollection {
  const result: RowCollection = { rows: [], skipped: [] };

  text.split(/\r?\n/).forEach((raw, index) => {
    const line = raw.trim();
    if (line.length === 0 || line.startsWith('#')) {
      return;
    }

    const origin = `${name}:${index + 1}`;
    try {
      result.rows.push(parseOverrideLine(line, origin));
    } catch (error) {
      if (!(error instanceof InputError)) {
        throw error;
      }
      result.skipped.push({ origin, reason: error.message });
    }
  });

  return result;
}
