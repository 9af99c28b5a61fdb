/**
 * Leader Geo Map Generation
 *
 * PIPELINE:
 * 1. Fetch cluster nodes and turn them into address rows
 * 2. Optionally keep only identities in the current leader schedule
 * 3. Append override rows (they follow the same merge policy)
 * 4. Resolve addresses through the geoip database and build the map
 * 5. Write the map atomically, then its metadata sidecar
 *
 * Row-level problems are skipped and counted. Any backend failure aborts
 * the run before the map is written.
 *
 * @module generate
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { createLogger } from '@leader-geo/geo-rules';
import {
  scheduledLeaders,
  type ContactInfo,
  type LeaderSchedule,
} from '@leader-geo/leader-routing';
import { writeBinaryMap } from './core/binary-map.js';
import { buildGeoMap, type GenerationStats, type GeoRow } from './core/map-builder.js';
import type { GeoIpResolver } from './geoip/geoip-resolver.js';
import { writeMapMetadata } from './metadata.js';
import { filterNodesByIdentity, rowsFromClusterNodes, type SkippedRow } from './rpc/cluster-rows.js';
import { parseOverrideFile } from './sources/override-file.js';

const log = createLogger('generate');

// ============================================================================
// Types
// ============================================================================

/**
 * RPC calls generation depends on
 */
export interface GenerationRpc {
  getClusterNodes(): Promise<readonly ContactInfo[]>;
  getSlot(): Promise<number>;
  getLeaderSchedule(): Promise<LeaderSchedule | null>;
}

export interface GenerationOptions {
  readonly rpcUrl: string;
  readonly dbPath: string;
  readonly output: string;
  readonly overridesPath?: string;
  /** Keep only identities that appear in the current leader schedule */
  readonly leadersOnly: boolean;
  /** Write `<map>.meta.json` beside the map */
  readonly metadata: boolean;
}

export interface GenerationDeps {
  readonly rpc: GenerationRpc;
  readonly openResolver: (dbPath: string) => Promise<GeoIpResolver>;
}

export interface GenerationResult {
  readonly outputPath: string;
  readonly metadataPath: string | null;
  readonly stats: GenerationStats;
  readonly rowsProcessed: number;
  readonly skipped: readonly SkippedRow[];
}

// ============================================================================
// Pipeline
// ============================================================================

async function collectClusterRows(
  rpc: GenerationRpc,
  leadersOnly: boolean
): Promise<{ rows: GeoRow[]; skipped: SkippedRow[] }> {
  let nodes = await rpc.getClusterNodes();
  log.info('Fetched cluster nodes', { count: nodes.length });

  if (leadersOnly) {
    const schedule = await rpc.getLeaderSchedule();
    const leaders = new Set(schedule ? scheduledLeaders(schedule) : []);
    nodes = filterNodesByIdentity(nodes, leaders);
    log.info('Restricted to scheduled leaders', { leaders: leaders.size, nodes: nodes.length });
  }

  return rowsFromClusterNodes(nodes);
}

async function collectOverrideRows(
  path: string
): Promise<{ rows: GeoRow[]; skipped: SkippedRow[] }> {
  const text = await readFile(path, 'utf-8');
  const overrides = parseOverrideFile(text, basename(path));
  log.info('Parsed override file', {
    path,
    rows: overrides.rows.length,
    skipped: overrides.skipped.length,
  });
  return overrides;
}

/**
 * Generate the map and, unless disabled, its metadata sidecar
 *
 * @throws {BackendError} If the RPC endpoint or geoip database fails
 * @throws Error if the override file cannot be read or an output cannot be written
 */
export async function runGeneration(
  options: GenerationOptions,
  deps: GenerationDeps
): Promise<GenerationResult> {
  const cluster = await collectClusterRows(deps.rpc, options.leadersOnly);
  const rows: GeoRow[] = [...cluster.rows];
  const skipped: SkippedRow[] = [...cluster.skipped];

  if (options.overridesPath) {
    const overrides = await collectOverrideRows(options.overridesPath);
    rows.push(...overrides.rows);
    skipped.push(...overrides.skipped);
  }

  for (const row of skipped) {
    log.warn('Skipped row', { origin: row.origin, reason: row.reason });
  }

  const resolver = await deps.openResolver(options.dbPath);
  const build = buildGeoMap(rows, resolver);

  await writeBinaryMap(options.output, build.entries);

  let metadataPath: string | null = null;
  if (options.metadata) {
    const rpcSlot = await deps.rpc.getSlot();
    const written = await writeMapMetadata({
      rpcUrl: options.rpcUrl,
      rpcSlot,
      dbPath: options.dbPath,
      mapPath: options.output,
      stats: build.stats,
    });
    metadataPath = written.path;
  }

  log.info('Leader geo map generated', {
    output: options.output,
    metadata: metadataPath,
    totalLeaders: build.stats.totalEntries,
    mappedLeaders: build.stats.mappedEntries,
    unknownLeaders: build.stats.unknownEntries,
    unknownRatePct: Number(build.stats.unknownRatePct.toFixed(2)),
    bytes: build.stats.outputBytes,
    rowsSkipped: skipped.length + build.rowsSkipped,
  });

  return {
    outputPath: options.output,
    metadataPath,
    stats: build.stats,
    rowsProcessed: build.rowsProcessed,
    skipped,
  };
}
