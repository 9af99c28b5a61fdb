/**
 * Route Command
 *
 * Run the leader routing procedure once against the live cluster: fetch
 * the current slot and its leader, then route the leader with the loaded
 * map. Without a map every leader is routed by identifier hash.
 *
 * USAGE:
 *   geo-mapper route [--map <path>] [--rpc-url <url>]
 *
 * @module cli/commands/route
 */

import {
  LeaderRoutingProcedure,
  ProcedureError,
  loadGeoMap,
  type LeaderRpc,
} from '@leader-geo/leader-routing';
import { SolanaRpcClient } from '../../rpc/rpc-client.js';
import type { GeoMapperConfig } from '../lib/config.js';
import { EXIT_CODES, reportFailure, type CommandContext, type ExitCode } from '../lib/context.js';
import { formatJson, printOutput } from '../lib/output.js';

export interface RouteCommandOptions {
  /** Map to route with; defaults to the configured output path */
  readonly map?: string;
}

export type RouteRpcFactory = (config: GeoMapperConfig) => LeaderRpc;

export const defaultRouteRpc: RouteRpcFactory = (config) =>
  new SolanaRpcClient({ url: config.rpcUrl, timeoutMs: config.timeoutMs });

export async function runRouteCommand(
  options: RouteCommandOptions,
  context: CommandContext,
  createRpc: RouteRpcFactory = defaultRouteRpc
): Promise<ExitCode> {
  const { config, logger } = context;
  const mapPath = options.map ?? config.output;
  logger.commandStart('route', { map: mapPath, rpcUrl: config.rpcUrl });

  try {
    if (mapPath) {
      const blob = await loadGeoMap(mapPath);
      logger.debug('Loaded leader geo map', { map: mapPath, bytes: blob.length });
    } else {
      logger.warn('No map configured; routing by identifier hash');
    }

    const output = await new LeaderRoutingProcedure(createRpc(config)).run();

    printOutput(
      config.json
        ? formatJson(output)
        : `slot ${output.slot} leader ${output.leader} ${output.leaderGeo} ${output.closestRegion}`
    );

    logger.commandEnd(true);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    if (error instanceof ProcedureError) {
      printOutput(formatJson(error.toJSON()));
    }
    return reportFailure(context, error);
  }
}
