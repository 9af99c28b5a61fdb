/**
 * Leader Routing Procedure
 *
 * Resolves the current slot leader over RPC and routes it to the closest
 * region. The RPC client is injected; any host framework wraps `run()` in
 * its own request/response envelope.
 *
 * @module leader-routing/procedure
 */

import { createLogger, type GeoLabel, type Region } from '@leader-geo/geo-rules';
import { preferredAddress, type ContactInfo } from './contact-info.js';
import { ProcedureError, type ProcedureStage } from './errors.js';
import { getGeoMap } from './geo-map-store.js';
import { route } from './route.js';

const log = createLogger('procedure');

/**
 * RPC calls the procedure depends on
 */
export interface LeaderRpc {
  getSlot(): Promise<number>;
  getSlotLeaders(startSlot: number, limit: number): Promise<readonly string[]>;
  getClusterNodes(): Promise<readonly ContactInfo[]>;
}

export interface LeaderRoutingOutput {
  readonly slot: number;
  readonly leader: string;
  readonly leaderGeo: GeoLabel;
  readonly closestRegion: Region;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function atStage<T>(stage: ProcedureStage, details: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (error) {
    throw new ProcedureError(stage, `${details}: ${errorMessage(error)}`, error);
  }
}

export class LeaderRoutingProcedure {
  constructor(
    private readonly rpc: LeaderRpc,
    private readonly geoMap: () => Uint8Array = getGeoMap
  ) {}

  /**
   * Route the current slot leader
   *
   * @throws {ProcedureError} When the slot or its leader cannot be fetched
   */
  async run(): Promise<LeaderRoutingOutput> {
    const slot = await atStage('get_slot', 'failed to fetch current slot', () =>
      this.rpc.getSlot()
    );

    const leaders = await atStage(
      'get_slot_leaders',
      `failed to fetch current slot leader for slot ${slot}`,
      () => this.rpc.getSlotLeaders(slot, 1)
    );

    const leader = leaders[0];
    if (leader === undefined) {
      throw new ProcedureError('resolve_leader', `no leader returned for slot ${slot}`);
    }

    const { leaderGeo, closestRegion } = route(leader, this.geoMap());

    log.info('Routed slot leader', { slot, leader, leaderGeo, closestRegion });

    return { slot, leader, leaderGeo, closestRegion };
  }

  /**
   * IP address the current slot leader advertises, or null when there is
   * no leader or the leader is not among the cluster nodes
   *
   * @throws {ProcedureError} When an RPC call fails
   */
  async currentLeaderAddress(): Promise<string | null> {
    const slot = await atStage(
      'get_slot',
      'failed to fetch current slot for leader address lookup',
      () => this.rpc.getSlot()
    );

    const leaders = await atStage(
      'get_slot_leaders',
      `failed to fetch slot leader for slot ${slot}`,
      () => this.rpc.getSlotLeaders(slot, 1)
    );

    const leader = leaders[0];
    if (leader === undefined) {
      return null;
    }

    const nodes = await atStage(
      'get_cluster_nodes',
      'failed to fetch cluster nodes for leader address lookup',
      () => this.rpc.getClusterNodes()
    );

    const node = nodes.find((candidate) => candidate.pubkey === leader);
    return node ? preferredAddress(node) : null;
  }
}
