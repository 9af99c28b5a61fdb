/**
 * Lookup Command
 *
 * Route a single identifier against a map file.
 *
 * USAGE:
 *   geo-mapper lookup <map> <identifier>
 *
 * @module cli/commands/lookup
 */

import { route } from '@leader-geo/leader-routing';
import { readBinaryMap } from '../../core/binary-map.js';
import { EXIT_CODES, reportFailure, type CommandContext, type ExitCode } from '../lib/context.js';
import { formatJson, printOutput } from '../lib/output.js';

export async function runLookupCommand(
  mapPath: string,
  identifier: string,
  context: CommandContext
): Promise<ExitCode> {
  const { config, logger } = context;
  logger.commandStart('lookup', { map: mapPath, identifier });

  try {
    const result = route(identifier, await readBinaryMap(mapPath));

    printOutput(
      config.json
        ? formatJson({ identifier, ...result })
        : `${identifier} ${result.leaderGeo} ${result.closestRegion}`
    );

    logger.commandEnd(true);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportFailure(context, error);
  }
}
