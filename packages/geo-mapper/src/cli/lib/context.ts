/**
 * Shared command context and exit codes
 *
 * @module cli/lib/context
 */

import { BackendError, ConfigError, errorMessage } from '../../core/errors.js';
import type { GeoMapperConfig } from './config.js';
import type { CLILogger } from './logger.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 2,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface CommandContext {
  readonly config: GeoMapperConfig;
  readonly logger: CLILogger;
}

export function exitCodeFor(error: unknown): ExitCode {
  return error instanceof ConfigError ? EXIT_CODES.CONFIG_ERROR : EXIT_CODES.ERRORS;
}

/**
 * Log a command failure with whatever context the error carries
 */
export function reportFailure(context: CommandContext, error: unknown): ExitCode {
  if (error instanceof BackendError) {
    context.logger.error(error.message, {
      backend: error.backend,
      operation: error.operation,
      ...error.context,
    });
  } else if (error instanceof ConfigError) {
    context.logger.error(`Configuration error: ${error.message}`, { source: error.source });
  } else {
    context.logger.error(errorMessage(error));
  }

  context.logger.commandEnd(false);
  return exitCodeFor(error);
}
