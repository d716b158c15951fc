/**
 * Shared Types - Main Export
 *
 * Re-exports all shared types for convenient importing
 */

// JSON values
export {
  JsonValueSchema,
  JsonObjectSchema,
  isJsonObject,
  type JsonPrimitive,
  type JsonValue,
  type JsonObject,
} from './json.js';

// Lifecycle types
export {
  Action,
  StartStatus,
  type Direction,
  type RequestMetadata,
} from './lifecycle.js';

// Rule configuration
export {
  RULES_KEY,
  MATCH_ROUTE_KEY,
  MATCH_DOMAIN_KEY,
  MATCH_SERVICE_KEY,
  RULE_MATCH_KEYS,
  RuleMatchKeysSchema,
  HostMatchType,
  type RuleMatchKeys,
  type HostMatch,
  type ServiceMatch,
} from './rules.js';

// Runtime configuration
export {
  LogLevelSchema,
  LogOutputSchema,
  LoggingConfigSchema,
  RuntimeConfigSchema,
  PartialRuntimeConfigSchema,
  type LogLevel,
  type LogOutput,
  type LoggingConfig,
  type RuntimeConfig,
  type PartialRuntimeConfig,
} from './config.js';
