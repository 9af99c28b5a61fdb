/**
 * Leader Routing Error Types
 */

export const ERROR_CODE_INTERNAL = 500;

/**
 * Stage of the routing procedure that failed
 */
export type ProcedureStage =
  | 'get_slot'
  | 'get_slot_leaders'
  | 'resolve_leader'
  | 'get_cluster_nodes';

/**
 * Error raised by the leader routing procedure when an RPC call fails.
 *
 * Carries a numeric code and the failing stage so a host adapter can
 * marshal it into its own error envelope.
 */
export class ProcedureError extends Error {
  readonly code: number;

  constructor(
    public readonly stage: ProcedureStage,
    public readonly details: string,
    public readonly cause?: unknown
  ) {
    super(`leader routing procedure failed at ${stage}: ${details}`);
    this.name = 'ProcedureError';
    this.code = ERROR_CODE_INTERNAL;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ProcedureError);
    }
  }

  toJSON(): { code: number; message: string; data: { stage: ProcedureStage; details: string } } {
    return {
      code: this.code,
      message: 'leader routing procedure failed',
      data: { stage: this.stage, details: this.details },
    };
  }
}
