/**
 * Geo Mapper Error Types
 *
 * Input problems (a row that cannot be used) are skipped and reported;
 * backend failures (geoip database, RPC endpoint) abort the whole
 * generation run; codec errors guard the on-disk record format.
 */

/**
 * A single input row that cannot be used.
 *
 * Raised by row parsers and caught by the collection step, which skips
 * the row and records the reason.
 */
export class InputError extends Error {
  /**
   * @param origin - Where the row came from, e.g. `overrides.csv:12` or `getClusterNodes[4]`
   */
  constructor(
    message: string,
    public readonly origin: string
  ) {
    super(message);
    this.name = 'InputError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InputError);
    }
  }
}

/**
 * Backend that failed during generation
 */
export type BackendKind = 'rpc' | 'geoip';

/**
 * Failure of an external backend. Fatal to the generation run; never retried.
 *
 * RECOVERY:
 * - For `rpc`, check the endpoint URL and rerun
 * - For `geoip`, check the database path and that the file is a MaxMind database
 */
export class BackendError extends Error {
  constructor(
    message: string,
    public readonly backend: BackendKind,
    public readonly operation: string,
    public readonly context: Readonly<Record<string, unknown>> = {},
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'BackendError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BackendError);
    }
  }
}

/**
 * Entries that cannot be encoded as a valid map (unsorted, duplicate or
 * wrong-length keys)
 */
export class CodecError extends Error {
  constructor(
    message: string,
    public readonly recordIndex: number
  ) {
    super(message);
    this.name = 'CodecError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CodecError);
    }
  }
}

/**
 * Invalid configuration file, environment variable or flag
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly source: string
  ) {
    super(message);
    this.name = 'ConfigError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigError);
    }
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
