/**
 * Runtime Configuration Loader
 *
 * Loading order (later overrides earlier):
 * 1. Default values from schema
 * 2. YAML file (explicit path or FILTERKIT_CONFIG)
 * 3. Environment variables
 * 4. Programmatic overrides
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import {
  RuntimeConfigSchema,
  PartialRuntimeConfigSchema,
  LogLevelSchema,
  type RuntimeConfig,
  type PartialRuntimeConfig,
} from '@filterkit/shared';

export const CONFIG_PATH_ENV = 'FILTERKIT_CONFIG';
export const LOG_LEVEL_ENV = 'FILTERKIT_LOG_LEVEL';
export const LOG_FORMAT_ENV = 'FILTERKIT_LOG_FORMAT';

function expandPath(path: string): string {
  if (path.startsWith('~/')) {
    return resolve(homedir(), path.slice(2));
  }
  return resolve(path);
}

function loadConfigFile(path: string): PartialRuntimeConfig {
  const expandedPath = expandPath(path);

  if (!existsSync(expandedPath)) {
    throw new Error(`Config file not found: ${expandedPath}`);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(expandedPath, 'utf-8'));
  } catch (error) {
    throw new Error(
      `Failed to load config from ${expandedPath}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { cause: error }
    );
  }

  // An empty file parses to null
  const result = PartialRuntimeConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new Error(`Invalid configuration in ${expandedPath}: ${result.error.message}`);
  }
  return result.data;
}

/**
 * Only recognised values are taken from the environment; anything else is
 * left to the schema defaults.
 */
function loadEnvConfig(env: NodeJS.ProcessEnv): PartialRuntimeConfig {
  const logging: NonNullable<PartialRuntimeConfig['logging']> = {};

  const level = LogLevelSchema.safeParse(env[LOG_LEVEL_ENV]);
  if (level.success) {
    logging.level = level.data;
  }

  const format = env[LOG_FORMAT_ENV];
  if (format === 'json' || format === 'pretty') {
    logging.output = [{ type: 'stdout', format }];
  }

  return Object.keys(logging).length > 0 ? { logging } : {};
}

function mergeConfigs(base: PartialRuntimeConfig, override: PartialRuntimeConfig): PartialRuntimeConfig {
  if (!override.logging) return base;
  const { level, output } = override.logging;
  return {
    ...base,
    logging: {
      ...base.logging,
      ...(level !== undefined ? { level } : {}),
      ...(output !== undefined ? { output } : {}),
    },
  };
}

export interface LoadRuntimeConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Override config values */
  overrides?: PartialRuntimeConfig;
  /** Environment to read from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Skip environment variable loading */
  skipEnv?: boolean;
}

export function loadRuntimeConfig(options: LoadRuntimeConfigOptions = {}): RuntimeConfig {
  const env = options.env ?? process.env;

  const configPath = options.configPath ?? (options.skipEnv ? undefined : env[CONFIG_PATH_ENV]);
  const fileConfig = configPath ? loadConfigFile(configPath) : {};

  const envConfig = options.skipEnv ? {} : loadEnvConfig(env);

  let merged = mergeConfigs(fileConfig, envConfig);
  if (options.overrides) {
    merged = mergeConfigs(merged, options.overrides);
  }

  const result = RuntimeConfigSchema.safeParse(merged);
  if (!result.success) {
    const errors = result.error.errors.map((e) => `  ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Invalid configuration:\n${errors}`);
  }

  return result.data;
}
