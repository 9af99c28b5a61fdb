/**
 * JSON-RPC Client for the Cluster RPC Endpoint
 *
 * Thin JSON-RPC 2.0 client over native fetch:
 * - Per-request timeout via AbortController
 * - Response envelopes and results validated with zod
 * - Every failure surfaces as an RpcError naming the method
 *
 * No retries: a failed call is a backend failure and the caller decides.
 *
 * USAGE:
 * ```typescript
 * const rpc = new SolanaRpcClient({ url: 'https://api.mainnet-beta.solana.com' });
 * const slot = await rpc.getSlot();
 * const [leader] = await rpc.getSlotLeaders(slot, 1);
 * ```
 */

import { z } from 'zod';
import { createLogger } from '@leader-geo/geo-rules';
import type { ContactInfo, LeaderRpc, LeaderSchedule } from '@leader-geo/leader-routing';
import { BackendError, errorMessage } from '../core/errors.js';

const log = createLogger('rpc');

// ============================================================================
// Configuration
// ============================================================================

export const DEFAULT_RPC_URL = 'https://api.mainnet-beta.solana.com';

export interface RpcClientConfig {
  readonly url: string;

  /** Request timeout in milliseconds (default: 30000) */
  readonly timeoutMs: number;

  /** User-Agent header (default: 'leader-geo-mapper/0.1') */
  readonly userAgent: string;
}

// ============================================================================
// Errors
// ============================================================================

/**
 * RPC call failure: transport, HTTP status, JSON-RPC error member or a
 * result that does not match the expected shape
 */
export class RpcError extends BackendError {
  constructor(
    message: string,
    public readonly method: string,
    public readonly url: string,
    cause?: unknown
  ) {
    super(message, 'rpc', method, { url }, cause);
    this.name = 'RpcError';
  }
}

// ============================================================================
// Schemas
// ============================================================================

const EnvelopeSchema = z
  .object({
    result: z.unknown().optional(),
    error: z.unknown().optional(),
  })
  .passthrough();

const SocketSchema = z.string().nullish();

/**
 * Contact info as returned by getClusterNodes. The endpoint uses camelCase;
 * snake_case spellings are accepted as well.
 */
const ClusterNodeSchema = z
  .object({
    pubkey: z.string(),
    gossip: SocketSchema,
    tpu: SocketSchema,
    tpuQuic: SocketSchema,
    tpu_quic: SocketSchema,
    rpc: SocketSchema,
  })
  .passthrough();

const SlotSchema = z.number().int().nonnegative();

const SlotLeadersSchema = z.array(z.string());

const LeaderScheduleSchema = z.record(z.array(z.number().int().nonnegative())).nullable();

type ClusterNode = z.infer<typeof ClusterNodeSchema>;

function toContactInfo(node: ClusterNode): ContactInfo {
  return {
    pubkey: node.pubkey,
    tpuQuic: node.tpuQuic ?? node.tpu_quic ?? null,
    tpu: node.tpu ?? null,
    gossip: node.gossip ?? null,
    rpc: node.rpc ?? null,
  };
}

// ============================================================================
// Client
// ============================================================================

export class SolanaRpcClient implements LeaderRpc {
  private readonly config: RpcClientConfig;
  private nextId = 1;

  constructor(config?: Partial<RpcClientConfig>) {
    this.config = {
      url: DEFAULT_RPC_URL,
      timeoutMs: 30000,
      userAgent: 'leader-geo-mapper/0.1',
      ...config,
    };
  }

  get url(): string {
    return this.config.url;
  }

  /**
   * Cluster nodes with a string pubkey. Entries without one are dropped.
   */
  async getClusterNodes(): Promise<ContactInfo[]> {
    const result = await this.call('getClusterNodes', [], z.array(z.unknown()));

    const nodes: ContactInfo[] = [];
    result.forEach((entry, index) => {
      const parsed = ClusterNodeSchema.safeParse(entry);
      if (parsed.success) {
        nodes.push(toContactInfo(parsed.data));
      } else {
        log.debug('Dropping cluster node without a usable pubkey', { index });
      }
    });

    return nodes;
  }

  async getSlot(): Promise<number> {
    return this.call('getSlot', [], SlotSchema);
  }

  async getSlotLeaders(startSlot: number, limit: number): Promise<string[]> {
    return this.call('getSlotLeaders', [startSlot, limit], SlotLeadersSchema);
  }

  /**
   * Leader schedule of the current epoch, or null when the endpoint has none
   */
  async getLeaderSchedule(): Promise<LeaderSchedule | null> {
    return this.call('getLeaderSchedule', [], LeaderScheduleSchema);
  }

  /**
   * Perform one JSON-RPC call and validate its result
   *
   * @throws {RpcError} For any transport, protocol or schema failure
   */
  async call<T>(method: string, params: readonly unknown[], schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const body = JSON.stringify({ jsonrpc: '2.0', id: this.nextId++, method, params });
    const text = await this.post(method, body);

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (error) {
      throw new RpcError(
        `RPC ${method} returned invalid JSON: ${errorMessage(error)}`,
        method,
        this.config.url,
        error
      );
    }

    const envelope = EnvelopeSchema.safeParse(payload);
    if (!envelope.success) {
      throw new RpcError(`RPC ${method} response is not a JSON-RPC object`, method, this.config.url);
    }

    if (envelope.data.error !== undefined) {
      throw new RpcError(
        `RPC ${method} error: ${JSON.stringify(envelope.data.error)}`,
        method,
        this.config.url
      );
    }

    const result = schema.safeParse(envelope.data.result);
    if (!result.success) {
      throw new RpcError(
        `RPC ${method} response missing or invalid result: ${result.error.issues[0]?.message ?? 'invalid'}`,
        method,
        this.config.url,
        result.error
      );
    }

    return result.data;
  }

  /**
   * POST the request with a timeout and return the response body
   */
  private async post(method: string, body: string): Promise<string> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const response = await fetch(this.config.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'User-Agent': this.config.userAgent,
        },
        body,
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new RpcError(
          `RPC ${method} failed with HTTP ${response.status}: ${response.statusText}`,
          method,
          this.config.url
        );
      }

      return await response.text();
    } catch (error) {
      if (error instanceof RpcError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new RpcError(
          `RPC ${method} timed out after ${this.config.timeoutMs}ms`,
          method,
          this.config.url,
          error
        );
      }
      throw new RpcError(
        `RPC ${method} network error: ${errorMessage(error)}`,
        method,
        this.config.url,
        error
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
