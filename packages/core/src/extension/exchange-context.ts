/**
 * ExchangeContext: state of one request/response exchange.
 *
 * Configuration is resolved once, on request headers. An exchange that
 * matches no rule stays unmatched: every later signal passes through and no
 * hook runs. Body signals are either handed to a streaming hook chunk by
 * chunk, or paused until end of stream and handed to a body hook whole.
 */

import {
  Action,
  type Direction,
  type JsonValue,
  type RequestMetadata,
} from '@filterkit/shared';
import type { ExtensionLogger } from '../logging/logger.js';
import type { ExchangeHost } from '../host/types.js';
import {
  CUSTOM_LOG_KEY,
  Property,
  REQUEST_ID_HEADER,
  encodeText,
} from '../host/properties.js';
import { isBinaryBody, readRequestHeader, readRequestMetadata } from '../host/request.js';
import {
  AttributePropagator,
  type LogExportResult,
  type TraceExportResult,
} from '../attributes/propagator.js';
import { toErrorMessage } from '../utils/errors.js';
import type { BodyHook, ExtensionHooks, HttpExchange, StreamingBodyHook } from './types.js';

/** What an exchange needs from its extension instance. */
export interface ExchangePlugin<C> {
  readonly hooks: Readonly<ExtensionHooks<C>>;
  readonly logger: ExtensionLogger;
  resolve(metadata: RequestMetadata): C | null;
}

const MAX_BUFFER_LIMIT = 0xffffffff;

export class ExchangeContext<C> implements HttpExchange {
  readonly id: number;
  private readonly plugin: ExchangePlugin<C>;
  private readonly exchangeHost: ExchangeHost;
  private readonly logger: ExtensionLogger;
  private readonly attributes: AttributePropagator;
  private readonly userContext = new Map<string, JsonValue>();

  private config: C | null = null;
  private readonly needBody: Record<Direction, boolean>;
  private readonly streamingBody: Record<Direction, boolean>;
  private readonly bodySize: Record<Direction, number> = { request: 0, response: 0 };
  private streamDone = false;

  constructor(plugin: ExchangePlugin<C>, id: number, host: ExchangeHost) {
    this.id = id;
    this.plugin = plugin;
    this.exchangeHost = host;
    this.logger = plugin.logger.child({ exchangeId: id });
    this.attributes = new AttributePropagator(host, this.logger);

    const { hooks } = plugin;
    this.needBody = {
      request: hooks.onRequestBody !== undefined || hooks.onStreamingRequestBody !== undefined,
      response: hooks.onResponseBody !== undefined || hooks.onStreamingResponseBody !== undefined,
    };
    this.streamingBody = {
      request: hooks.onStreamingRequestBody !== undefined,
      response: hooks.onStreamingResponseBody !== undefined,
    };
  }

  get matched(): boolean {
    return this.config !== null;
  }

  // ─── Lifecycle signals ────────────────────────────────────────────────────

  onRequestHeaders(): Action {
    this.propagateRequestId();

    let config: C | null;
    try {
      config = this.plugin.resolve(readRequestMetadata(this.exchangeHost, this.logger));
    } catch (err) {
      this.logger.error('get match config failed', { error: toErrorMessage(err) });
      return Action.CONTINUE;
    }
    if (config === null) {
      return Action.CONTINUE;
    }
    this.config = config;

    // Binary payloads are never handed to body hooks
    if (isBinaryBody(this.exchangeHost, 'request', this.logger)) {
      this.needBody.request = false;
    }

    const hook = this.plugin.hooks.onRequestHeaders;
    return hook ? hook(this, config, this.logger) : Action.CONTINUE;
  }

  onResponseHeaders(): Action {
    const config = this.config;
    if (config === null) {
      return Action.CONTINUE;
    }

    if (isBinaryBody(this.exchangeHost, 'response', this.logger)) {
      this.needBody.response = false;
    }

    const hook = this.plugin.hooks.onResponseHeaders;
    return hook ? hook(this, config, this.logger) : Action.CONTINUE;
  }

  onRequestBody(bodySize: number, endOfStream: boolean): Action {
    return this.onBody('request', bodySize, endOfStream);
  }

  onResponseBody(bodySize: number, endOfStream: boolean): Action {
    return this.onBody('response', bodySize, endOfStream);
  }

  onStreamDone(): void {
    if (this.streamDone) return;
    this.streamDone = true;

    const config = this.config;
    const hook = this.plugin.hooks.onStreamDone;
    if (config === null || !hook) return;
    hook(this, config, this.logger);
  }

  private onBody(direction: Direction, bodySize: number, endOfStream: boolean): Action {
    const config = this.config;
    if (config === null || !this.needBody[direction]) {
      return Action.CONTINUE;
    }

    const { whole, streaming } = this.bodyHooks(direction);

    if (streaming && this.streamingBody[direction]) {
      let chunk: Uint8Array;
      try {
        chunk = this.readBody(direction, 0, bodySize);
      } catch (err) {
        this.logger.warn(`get ${direction} body chunk failed`, { error: toErrorMessage(err) });
        return Action.CONTINUE;
      }
      const modified = streaming(this, config, chunk, endOfStream, this.logger);
      try {
        this.writeBody(direction, modified);
      } catch (err) {
        this.logger.warn(`replace ${direction} body chunk failed`, { error: toErrorMessage(err) });
      }
      return Action.CONTINUE;
    }

    if (whole) {
      this.bodySize[direction] += bodySize;
      if (!endOfStream) {
        return Action.PAUSE;
      }
      let body: Uint8Array;
      try {
        body = this.readBody(direction, 0, this.bodySize[direction]);
      } catch (err) {
        this.logger.warn(`get ${direction} body failed`, { error: toErrorMessage(err) });
        return Action.CONTINUE;
      }
      return whole(this, config, body, this.logger);
    }

    return Action.CONTINUE;
  }

  private bodyHooks(direction: Direction): { whole?: BodyHook<C>; streaming?: StreamingBodyHook<C> } {
    const { hooks } = this.plugin;
    return direction === 'request'
      ? { whole: hooks.onRequestBody, streaming: hooks.onStreamingRequestBody }
      : { whole: hooks.onResponseBody, streaming: hooks.onStreamingResponseBody };
  }

  private readBody(direction: Direction, start: number, size: number): Uint8Array {
    return direction === 'request'
      ? this.exchangeHost.getRequestBody(start, size)
      : this.exchangeHost.getResponseBody(start, size);
  }

  private writeBody(direction: Direction, body: Uint8Array): void {
    if (direction === 'request') {
      this.exchangeHost.replaceRequestBody(body);
    } else {
      this.exchangeHost.replaceResponseBody(body);
    }
  }

  private propagateRequestId(): void {
    const requestId = readRequestHeader(this.exchangeHost, REQUEST_ID_HEADER, this.logger);
    if (requestId === '') return;
    this.setPropertyQuietly(Property.REQUEST_ID, requestId);
  }

  private setPropertyQuietly(property: string, value: string): void {
    try {
      this.exchangeHost.setProperty([property], encodeText(value));
    } catch (err) {
      this.logger.warn(`failed to set property ${property}`, { value, error: toErrorMessage(err) });
    }
  }

  // ─── HttpExchange ─────────────────────────────────────────────────────────

  scheme(): string {
    return readRequestHeader(this.exchangeHost, ':scheme', this.logger);
  }

  host(): string {
    return readRequestHeader(this.exchangeHost, ':authority', this.logger);
  }

  path(): string {
    return readRequestHeader(this.exchangeHost, ':path', this.logger);
  }

  method(): string {
    return readRequestHeader(this.exchangeHost, ':method', this.logger);
  }

  getRequestHeader(name: string): string | undefined {
    try {
      return this.exchangeHost.getRequestHeader(name);
    } catch (err) {
      this.logger.debug(`Failed to read request header ${name}`, { error: toErrorMessage(err) });
      return undefined;
    }
  }

  getResponseHeader(name: string): string | undefined {
    try {
      return this.exchangeHost.getResponseHeader(name);
    } catch (err) {
      this.logger.debug(`Failed to read response header ${name}`, { error: toErrorMessage(err) });
      return undefined;
    }
  }

  setContext(key: string, value: JsonValue): void {
    this.userContext.set(key, value);
  }

  getContext(key: string): JsonValue | undefined {
    return this.userContext.get(key);
  }

  getBoolContext(key: string, defaultValue: boolean): boolean {
    const value = this.userContext.get(key);
    return typeof value === 'boolean' ? value : defaultValue;
  }

  getStringContext(key: string, defaultValue: string): string {
    const value = this.userContext.get(key);
    return typeof value === 'string' ? value : defaultValue;
  }

  setUserAttribute(key: string, value: JsonValue): void {
    this.attributes.set(key, value);
  }

  getUserAttribute(key: string): JsonValue | undefined {
    return this.attributes.get(key);
  }

  writeUserAttributeToLog(): LogExportResult {
    return this.attributes.writeToLog(CUSTOM_LOG_KEY);
  }

  writeUserAttributeToLogWithKey(key: string): LogExportResult {
    return this.attributes.writeToLog(key);
  }

  writeUserAttributeToTrace(): TraceExportResult {
    return this.attributes.writeToTrace();
  }

  dontReadRequestBody(): void {
    this.needBody.request = false;
  }

  dontReadResponseBody(): void {
    this.needBody.response = false;
  }

  bufferRequestBody(): void {
    this.streamingBody.request = false;
  }

  bufferResponseBody(): void {
    this.streamingBody.response = false;
  }

  replaceRequestBody(body: Uint8Array): boolean {
    return this.tryReplaceBody('request', body);
  }

  replaceResponseBody(body: Uint8Array): boolean {
    return this.tryReplaceBody('response', body);
  }

  disableReroute(): void {
    this.setPropertyQuietly(Property.CLEAR_ROUTE_CACHE, 'off');
  }

  setRequestBodyBufferLimit(bytes: number): void {
    this.setBufferLimit(Property.DECODER_BUFFER_LIMIT, bytes);
  }

  setResponseBodyBufferLimit(bytes: number): void {
    this.setBufferLimit(Property.ENCODER_BUFFER_LIMIT, bytes);
  }

  private tryReplaceBody(direction: Direction, body: Uint8Array): boolean {
    try {
      this.writeBody(direction, body);
      return true;
    } catch (err) {
      this.logger.warn(`replace ${direction} body failed`, { error: toErrorMessage(err) });
      return false;
    }
  }

  private setBufferLimit(property: Property, bytes: number): void {
    if (!Number.isInteger(bytes) || bytes < 0 || bytes > MAX_BUFFER_LIMIT) {
      this.logger.warn('Ignoring invalid body buffer limit', { property, bytes });
      return;
    }
    this.logger.info(`${property}: ${bytes}`);
    this.setPropertyQuietly(property, String(bytes));
  }
}
