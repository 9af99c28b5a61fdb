/**
 * Inspect Command
 *
 * Verify a map file (record alignment, key order, bucket bytes) and print
 * the number of records per bucket. Exits 2 when the map is not valid.
 *
 * USAGE:
 *   geo-mapper inspect <map>
 *
 * @module cli/commands/inspect
 */

import { GEO_LABELS } from '@leader-geo/geo-rules';
import { isValidMap, readBinaryMap, verifyBinaryMap, type MapVerification } from '../../core/binary-map.js';
import { EXIT_CODES, reportFailure, type CommandContext, type ExitCode } from '../lib/context.js';
import { formatJson, formatTable, printOutput } from '../lib/output.js';

export async function runInspectCommand(mapPath: string, context: CommandContext): Promise<ExitCode> {
  const { config, logger } = context;
  logger.commandStart('inspect', { map: mapPath });

  try {
    const verification = verifyBinaryMap(await readBinaryMap(mapPath));
    const valid = isValidMap(verification);

    printOutput(
      config.json ? formatJson({ map: mapPath, valid, ...verification }) : formatReport(verification)
    );

    if (!valid) {
      logger.commandEnd(false, { map: mapPath, reason: problems(verification).join(', ') });
      return EXIT_CODES.ERRORS;
    }

    logger.commandEnd(true, { records: verification.records });
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportFailure(context, error);
  }
}

export function problems(verification: MapVerification): string[] {
  const found: string[] = [];
  if (!verification.wellFormed) found.push('length is not a multiple of the record size');
  if (!verification.sorted) found.push('keys are not strictly ascending');
  if (verification.illegalBuckets > 0) found.push(`${verification.illegalBuckets} illegal bucket byte(s)`);
  return found;
}

function formatReport(verification: MapVerification): string {
  const header = [
    `bytes:   ${verification.byteLength}`,
    `records: ${verification.records}`,
    `status:  ${isValidMap(verification) ? 'ok' : problems(verification).join('; ')}`,
  ];

  const rows = GEO_LABELS.map((label) => ({
    bucket: label,
    count: verification.bucketCounts[label],
  }));

  return [
    ...header,
    '',
    formatTable(rows, [
      { key: 'bucket', header: 'Bucket' },
      { key: 'count', header: 'Records', align: 'right' },
    ]),
  ].join('\n');
}
