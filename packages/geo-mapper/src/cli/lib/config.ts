/**
 * Geo Mapper CLI Configuration
 *
 * Loads configuration from .leader-georc (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (LEADER_GEO_*)
 * 3. Config file (.leader-georc or --config path)
 * 4. Default values
 *
 * Relative paths in a config file are resolved against the file's directory.
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../../core/errors.js';
import { DEFAULT_RPC_URL } from '../../rpc/rpc-client.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface GeoMapperConfig {
  /** JSON-RPC endpoint of the cluster */
  readonly rpcUrl: string;
  /** MaxMind database (City or Country edition) */
  readonly dbPath: string;
  /** Map output path; generate requires one */
  readonly output: string | null;
  /** Override file applied after RPC rows */
  readonly overrides: string | null;
  /** Write the `.meta.json` sidecar */
  readonly metadata: boolean;
  /** Per-request RPC timeout */
  readonly timeoutMs: number;

  // Runtime overrides (from CLI flags)
  readonly verbose: boolean;
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

const ConfigFileSchema = z
  .object({
    rpcUrl: z.string().url().optional(),
    dbPath: z.string().min(1).optional(),
    output: z.string().min(1).optional(),
    overrides: z.string().min(1).optional(),
    metadata: z.boolean().optional(),
    timeoutMs: z.number().int().positive().optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG = {
  rpcUrl: DEFAULT_RPC_URL,
  dbPath: './GeoLite2-City.mmdb',
  metadata: true,
  timeoutMs: 30000,
} as const;

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = [
  '.leader-georc',
  '.leader-georc.yaml',
  '.leader-georc.yml',
  '.leader-georc.json',
];

const ENV_PREFIX = 'LEADER_GEO_';

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Find a config file in `startDir` or any parent directory
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }

    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Parse and validate config file content. YAML is a superset of JSON, so
 * one parser covers every file name.
 *
 * @throws {ConfigError} If the file is unreadable, not YAML or has unknown or mistyped keys
 */
export function parseConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`cannot read config file: ${errorMessage(error)}`, filePath);
  }

  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`invalid config file: ${issues}`, filePath);
  }

  return parsed.data;
}

type Env = Readonly<Record<string, string | undefined>>;

function getEnvVar(env: Env, name: string): string | undefined {
  const value = env[`${ENV_PREFIX}${name}`];
  return value === undefined || value === '' ? undefined : value;
}

function getEnvBool(env: Env, name: string): boolean | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvNumber(env: Env, name: string): number | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;

  const num = Number(value);
  if (!Number.isInteger(num) || num <= 0) {
    throw new ConfigError(`expected a positive integer, got ${JSON.stringify(value)}`, `${ENV_PREFIX}${name}`);
  }
  return num;
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory the file search starts from (default: process.cwd()) */
  cwd?: string;
  /** Environment (default: process.env) */
  env?: Env;
  /** CLI flag overrides */
  overrides?: {
    rpcUrl?: string;
    dbPath?: string;
    output?: string;
    overrides?: string;
    metadata?: boolean;
    timeoutMs?: number;
    verbose?: boolean;
    json?: boolean;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws {ConfigError} If an explicit config file is missing or any layer is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): GeoMapperConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const flags = options.overrides ?? {};

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  const explicitPath = options.configPath ?? getEnvVar(env, 'CONFIG');
  if (explicitPath) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`config file not found: ${configPath}`, configPath);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(cwd);
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const fileDir = configPath ? dirname(configPath) : cwd;
  const fromFile = (value: string | undefined): string | undefined =>
    value === undefined ? undefined : resolve(fileDir, value);

  const config: GeoMapperConfig = {
    rpcUrl:
      flags.rpcUrl ?? getEnvVar(env, 'RPC_URL') ?? fileConfig.rpcUrl ?? DEFAULT_CONFIG.rpcUrl,
    dbPath:
      flags.dbPath ??
      getEnvVar(env, 'DB_PATH') ??
      fromFile(fileConfig.dbPath) ??
      DEFAULT_CONFIG.dbPath,
    output: flags.output ?? getEnvVar(env, 'OUTPUT') ?? fromFile(fileConfig.output) ?? null,
    overrides:
      flags.overrides ?? getEnvVar(env, 'OVERRIDES') ?? fromFile(fileConfig.overrides) ?? null,
    metadata:
      flags.metadata ?? getEnvBool(env, 'METADATA') ?? fileConfig.metadata ?? DEFAULT_CONFIG.metadata,
    timeoutMs:
      flags.timeoutMs ??
      getEnvNumber(env, 'TIMEOUT_MS') ??
      fileConfig.timeoutMs ??
      DEFAULT_CONFIG.timeoutMs,
    verbose: flags.verbose ?? getEnvBool(env, 'VERBOSE') ?? false,
    json: flags.json ?? getEnvBool(env, 'JSON') ?? false,
    configPath,
  };

  validateConfig(config);
  return config;
}

/**
 * @throws {ConfigError} If a merged value is out of range
 */
export function validateConfig(config: GeoMapperConfig): void {
  if (!Number.isInteger(config.timeoutMs) || config.timeoutMs <= 0) {
    throw new ConfigError('timeoutMs must be a positive integer', 'timeoutMs');
  }

  try {
    new URL(config.rpcUrl);
  } catch {
    throw new ConfigError(`rpcUrl is not a valid URL: ${config.rpcUrl}`, 'rpcUrl');
  }
}
