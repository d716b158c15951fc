/**
 * Extension Hook Types
 *
 * An extension is a record of optional hooks. Which hooks are present
 * decides how the runtime treats each exchange: a body hook makes the
 * runtime read that direction's body, a streaming hook makes it deliver the
 * body chunk by chunk.
 */

import type { Action, JsonObject, JsonValue } from '@filterkit/shared';
import type { ExtensionLogger } from '../logging/logger.js';
import type { RuleSetBuilder } from '../matcher/types.js';
import type { TickRegistry } from '../tick/scheduler.js';
import type { LogExportResult, TraceExportResult } from '../attributes/propagator.js';

/** Configuration type of extensions that take no configuration. */
export type EmptyConfig = Record<string, never>;

export interface ParseContext {
  logger: ExtensionLogger;
  /** Register periodic actions; only honoured while the configuration is parsed at start */
  ticks: TickRegistry;
}

/** Build the extension's configuration; throw to reject it. */
export type ParseConfigFunc<C> = (json: JsonObject, ctx: ParseContext) => C;

/** Build a per-rule configuration on top of the global one (if any). */
export type ParseOverrideConfigFunc<C> = (
  json: JsonObject,
  global: Readonly<C> | undefined,
  ctx: ParseContext
) => C;

/**
 * The per-exchange API available to hooks.
 */
export interface HttpExchange {
  readonly id: number;

  scheme(): string;
  host(): string;
  path(): string;
  method(): string;
  getRequestHeader(name: string): string | undefined;
  getResponseHeader(name: string): string | undefined;

  setContext(key: string, value: JsonValue): void;
  getContext(key: string): JsonValue | undefined;
  getBoolContext(key: string, defaultValue: boolean): boolean;
  getStringContext(key: string, defaultValue: string): string;

  setUserAttribute(key: string, value: JsonValue): void;
  getUserAttribute(key: string): JsonValue | undefined;
  /** Merge user attributes into the `custom_log` property */
  writeUserAttributeToLog(): LogExportResult;
  /** Merge user attributes into the given log property */
  writeUserAttributeToLogWithKey(key: string): LogExportResult;
  /** Write each user attribute as a trace span tag */
  writeUserAttributeToTrace(): TraceExportResult;

  /** Skip the request body even though a request body hook is registered */
  dontReadRequestBody(): void;
  dontReadResponseBody(): void;
  /** Deliver the request body whole even though a streaming hook is registered */
  bufferRequestBody(): void;
  bufferResponseBody(): void;
  /** Replace the request body visible in the current signal; returns false on failure */
  replaceRequestBody(body: Uint8Array): boolean;
  replaceResponseBody(body: Uint8Array): boolean;

  /**
   * Header edits in onRequestHeaders make the gateway re-select the route.
   * Call this before editing headers to keep the current route.
   */
  disableReroute(): void;
  /** Affects gateway memory use; applies to this request only */
  setRequestBodyBufferLimit(bytes: number): void;
  setResponseBodyBufferLimit(bytes: number): void;
}

export type HeadersHook<C> = (exchange: HttpExchange, config: C, logger: ExtensionLogger) => Action;

export type BodyHook<C> = (
  exchange: HttpExchange,
  config: C,
  body: Uint8Array,
  logger: ExtensionLogger
) => Action;

/** Returns the bytes to forward in place of `chunk`. */
export type StreamingBodyHook<C> = (
  exchange: HttpExchange,
  config: C,
  chunk: Uint8Array,
  isLastChunk: boolean,
  logger: ExtensionLogger
) => Uint8Array;

export type StreamDoneHook<C> = (exchange: HttpExchange, config: C, logger: ExtensionLogger) => void;

export interface ExtensionHooks<C> {
  onRequestHeaders?: HeadersHook<C>;
  onRequestBody?: BodyHook<C>;
  onStreamingRequestBody?: StreamingBodyHook<C>;
  onResponseHeaders?: HeadersHook<C>;
  onResponseBody?: BodyHook<C>;
  onStreamingResponseBody?: StreamingBodyHook<C>;
  onStreamDone?: StreamDoneHook<C>;
}

export interface ExtensionCommonOptions<C> extends ExtensionHooks<C> {
  /** Defaults to a pino logger stamped with the extension name */
  logger?: ExtensionLogger;
  /** Defaults to the `_rules_` matcher */
  ruleMatcher?: () => RuleSetBuilder<C>;
}

export interface ExtensionOptions<C> extends ExtensionCommonOptions<C> {
  parseConfig: ParseConfigFunc<C>;
  parseOverrideConfig?: ParseOverrideConfigFunc<C>;
}

export interface ConfiglessExtensionOptions extends ExtensionCommonOptions<EmptyConfig> {
  parseConfig?: undefined;
  parseOverrideConfig?: undefined;
}
