/**
 * @filterkit/core
 *
 * Lifecycle runtime for gateway filter extensions: per-exchange hook
 * dispatch, periodic tick actions and user attribute export.
 */

// Extension registration and runtime
export {
  defineExtension,
  ExtensionDefinition,
  HOOK_NAMES,
} from './extension/define.js';
export { PluginContext } from './extension/plugin-context.js';
export { ExchangeContext, type ExchangePlugin } from './extension/exchange-context.js';
export { ExtensionRuntime } from './extension/runtime.js';
export type {
  EmptyConfig,
  ParseContext,
  ParseConfigFunc,
  ParseOverrideConfigFunc,
  HttpExchange,
  HeadersHook,
  BodyHook,
  StreamingBodyHook,
  StreamDoneHook,
  ExtensionHooks,
  ExtensionOptions,
  ConfiglessExtensionOptions,
} from './extension/types.js';

// Tick scheduling
export {
  TICK_GRANULARITY_MS,
  TickRegistry,
  TickScheduler,
  type TickAction,
  type TickEntry,
} from './tick/scheduler.js';

// Rule matching
export {
  RuleMatcher,
  parseHostMatch,
  parseServiceMatch,
  stripPort,
} from './matcher/rule-matcher.js';
export type {
  RuleSet,
  RuleSetBuilder,
  GlobalConfigParser,
  RuleConfigParser,
} from './matcher/types.js';

// User attributes
export {
  AttributePropagator,
  type LogExportResult,
  type TraceExportResult,
} from './attributes/propagator.js';
export {
  escapeLogValue,
  unescapeLogValue,
  decodeLogObject,
  encodeLogObject,
  stringifyAttribute,
} from './attributes/encoding.js';

// Host boundary
export type { ExchangeHost, PluginHost, PropertyPath } from './host/types.js';
export {
  Property,
  CUSTOM_LOG_KEY,
  AI_LOG_KEY,
  TRACE_SPAN_TAG_PREFIX,
  encodeText,
  decodeText,
} from './host/properties.js';
export { readRequestMetadata, isBinaryBody } from './host/request.js';
export {
  MemoryHost,
  MemoryExchangeHost,
  type MemoryHostCall,
  type MemoryHostOptions,
} from './host/memory-host.js';

// Logging
export {
  createLogger,
  createExtensionLogger,
  createNoopLogger,
  type ExtensionLogger,
  type LogContext,
  type LogLevel,
  type CreateLoggerOptions,
} from './logging/logger.js';

// Configuration
export {
  loadRuntimeConfig,
  CONFIG_PATH_ENV,
  LOG_LEVEL_ENV,
  LOG_FORMAT_ENV,
  type LoadRuntimeConfigOptions,
} from './config/loader.js';

// Errors
export {
  FilterKitError,
  ExtensionRegistrationError,
  PluginStartError,
  HostCallError,
  AttributeExportError,
  isNotFound,
  toErrorMessage,
  type PluginStartErrorCode,
  type HostCallErrorCode,
  type AttributeExportErrorCode,
} from './utils/errors.js';

export { Action, StartStatus } from '@filterkit/shared';
export type { JsonValue, JsonObject, RequestMetadata, Direction } from '@filterkit/shared';
