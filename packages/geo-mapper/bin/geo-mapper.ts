#!/usr/bin/env tsx
/**
 * Geo Mapper CLI Entry Point
 *
 * Generates, inspects and queries the binary leader geo map.
 *
 * @module geo-mapper-cli
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { errorMessage } from '../src/core/errors.js';
import { loadConfig } from '../src/cli/lib/config.js';
import { EXIT_CODES, exitCodeFor, type CommandContext } from '../src/cli/lib/context.js';
import { createCLILogger } from '../src/cli/lib/logger.js';
import { printError } from '../src/cli/lib/output.js';
import {
  runGenerateCommand,
  runInspectCommand,
  runLookupCommand,
  runRouteCommand,
} from '../src/cli/commands/index.js';

// ============================================================================
// Global State
// ============================================================================

const CliOptionsSchema = z
  .object({
    verbose: z.boolean().optional(),
    json: z.boolean().optional(),
    config: z.string().optional(),
    timeout: z.number().optional(),
    rpcUrl: z.string().optional(),
    db: z.string().optional(),
    output: z.string().optional(),
    overrides: z.string().optional(),
    metadata: z.boolean().optional(),
    leadersOnly: z.boolean().optional(),
    map: z.string().optional(),
  })
  .passthrough();

type CliOptions = z.infer<typeof CliOptionsSchema>;

interface GlobalContext extends CommandContext {
  readonly options: CliOptions;
}

let globalContext: GlobalContext | null = null;

function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

// ============================================================================
// CLI Setup
// ============================================================================

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  try {
    const parsed = z
      .object({ version: z.string() })
      .safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function initializeContext(rawOptions: Record<string, unknown>): GlobalContext {
  const parsed = CliOptionsSchema.safeParse(rawOptions);
  if (!parsed.success) {
    throw new Error(`invalid options: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }
  const options = parsed.data;

  const config = loadConfig({
    configPath: options.config,
    overrides: {
      rpcUrl: options.rpcUrl,
      dbPath: options.db,
      output: options.output,
      overrides: options.overrides,
      // commander defaults --no-metadata to true; only a negation overrides
      metadata: options.metadata === false ? false : undefined,
      timeoutMs: options.timeout,
      verbose: options.verbose,
      json: options.json,
    },
  });

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  globalContext = { config, logger, options };
  return globalContext;
}

function finish(exitCode: number): void {
  if (exitCode !== EXIT_CODES.SUCCESS) {
    process.exitCode = exitCode;
  }
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('geo-mapper')
    .description('Build and query the binary leader geo map')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .leader-georc)')
    .option('--timeout <ms>', 'RPC request timeout in milliseconds', parsePositiveInt)
    .hook('preAction', (thisCommand, actionCommand) => {
      try {
        initializeContext({ ...thisCommand.opts(), ...actionCommand.opts() });
      } catch (error) {
        console.error(`Configuration error: ${errorMessage(error)}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  program
    .command('generate')
    .description('Generate the leader geo map from cluster nodes and overrides')
    .option('--output <path>', 'Map output path')
    .option('--rpc-url <url>', 'JSON-RPC endpoint')
    .option('--db <path>', 'MaxMind database (City or Country)')
    .option('--overrides <file>', 'Override file: <pubkey>,<ip|label> per line')
    .option('--leaders-only', 'Only identities in the current leader schedule')
    .option('--no-metadata', 'Do not write the .meta.json sidecar')
    .action(async () => {
      const context = getGlobalContext();
      finish(await runGenerateCommand({ leadersOnly: context.options.leadersOnly === true }, context));
    });

  program
    .command('inspect <map>')
    .description('Verify a map file and print record counts per bucket')
    .action(async (map: string) => {
      finish(await runInspectCommand(map, getGlobalContext()));
    });

  program
    .command('lookup <map> <identifier>')
    .description('Print the geo bucket and closest region for an identifier')
    .action(async (map: string, identifier: string) => {
      finish(await runLookupCommand(map, identifier, getGlobalContext()));
    });

  program
    .command('route')
    .description('Route the current slot leader once')
    .option('--map <path>', 'Map to route with (default: configured output)')
    .option('--rpc-url <url>', 'JSON-RPC endpoint')
    .action(async () => {
      const context = getGlobalContext();
      finish(await runRouteCommand({ map: context.options.map }, context));
    });

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (globalContext) {
      globalContext.logger.error('Command failed', { error: errorMessage(error) });
    } else {
      printError(errorMessage(error));
    }
    process.exit(exitCodeFor(error));
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
