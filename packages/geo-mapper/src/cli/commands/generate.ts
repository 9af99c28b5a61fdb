/**
 * Generate Command
 *
 * Build the binary leader geo map from the cluster's advertised addresses
 * and an optional override file.
 *
 * USAGE:
 *   geo-mapper generate --output <path> [options]
 *
 * OPTIONS:
 *   --rpc-url <url>       JSON-RPC endpoint
 *   --db <path>           MaxMind database
 *   --overrides <file>    Override file (<pubkey>,<ip|label> per line)
 *   --leaders-only        Only identities in the current leader schedule
 *   --no-metadata         Skip the .meta.json sidecar
 *
 * EXAMPLES:
 *   geo-mapper generate --output data/leader_geo_map.bin
 *   geo-mapper generate --output data/leader_geo_map.bin --overrides overrides.csv --leaders-only
 *
 * @module cli/commands/generate
 */

import { ConfigError } from '../../core/errors.js';
import { openMaxMindResolver } from '../../geoip/geoip-resolver.js';
import { runGeneration, type GenerationDeps, type GenerationResult } from '../../generate.js';
import { SolanaRpcClient } from '../../rpc/rpc-client.js';
import type { GeoMapperConfig } from '../lib/config.js';
import { EXIT_CODES, reportFailure, type CommandContext, type ExitCode } from '../lib/context.js';
import { formatBytes } from '../lib/logger.js';
import { formatJson, formatTable, printOutput } from '../lib/output.js';

export interface GenerateCommandOptions {
  readonly leadersOnly: boolean;
}

export type GenerateDepsFactory = (config: GeoMapperConfig) => GenerationDeps;

export const defaultGenerateDeps: GenerateDepsFactory = (config) => ({
  rpc: new SolanaRpcClient({ url: config.rpcUrl, timeoutMs: config.timeoutMs }),
  openResolver: openMaxMindResolver,
});

export async function runGenerateCommand(
  options: GenerateCommandOptions,
  context: CommandContext,
  createDeps: GenerateDepsFactory = defaultGenerateDeps
): Promise<ExitCode> {
  const { config, logger } = context;
  logger.commandStart('generate', { rpcUrl: config.rpcUrl, dbPath: config.dbPath });

  try {
    if (!config.output) {
      throw new ConfigError('--output is required', 'output');
    }

    const result = await runGeneration(
      {
        rpcUrl: config.rpcUrl,
        dbPath: config.dbPath,
        output: config.output,
        overridesPath: config.overrides ?? undefined,
        leadersOnly: options.leadersOnly,
        metadata: config.metadata,
      },
      createDeps(config)
    );

    printOutput(config.json ? formatJson(summarize(result)) : formatSummary(result));
    logger.commandEnd(true, { output: result.outputPath });
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportFailure(context, error);
  }
}

function summarize(result: GenerationResult): Record<string, unknown> {
  return {
    output: result.outputPath,
    metadata: result.metadataPath,
    totalLeaders: result.stats.totalEntries,
    mappedLeaders: result.stats.mappedEntries,
    unknownLeaders: result.stats.unknownEntries,
    unknownRatePct: result.stats.unknownRatePct,
    mapSizeBytes: result.stats.outputBytes,
    rowsProcessed: result.rowsProcessed,
    rowsSkipped: result.skipped.length,
  };
}

function formatSummary(result: GenerationResult): string {
  const rows = [
    { field: 'output', value: result.outputPath },
    { field: 'metadata', value: result.metadataPath ?? '-' },
    { field: 'total leaders', value: result.stats.totalEntries },
    { field: 'mapped leaders', value: result.stats.mappedEntries },
    { field: 'unknown leaders', value: result.stats.unknownEntries },
    { field: 'unknown rate', value: `${result.stats.unknownRatePct.toFixed(2)}%` },
    { field: 'map size', value: formatBytes(result.stats.outputBytes) },
    { field: 'rows skipped', value: result.skipped.length },
  ];

  return formatTable(rows, [
    { key: 'field', header: 'Field' },
    { key: 'value', header: 'Value', align: 'right' },
  ]);
}
