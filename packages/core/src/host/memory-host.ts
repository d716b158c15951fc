/**
 * MemoryHost: in-process stand-in for the gateway host.
 *
 * Models the gateway's body buffering: a chunk replaces the visible body
 * buffer unless the previous signal for that direction paused, in which case
 * it is appended. A `continue` releases the buffer downstream, where it is
 * recorded in `forwarded`. Any call can be made to fail with `failOn`.
 */

import { Action, type Direction, type JsonObject } from '@filterkit/shared';
import { HostCallError, type HostCallErrorCode } from '../utils/errors.js';
import type { ExchangeHost, PluginHost, PropertyPath } from './types.js';
import { decodeText, encodeText } from './properties.js';

export type MemoryHostCall =
  | 'getPluginConfiguration'
  | 'setTickPeriod'
  | keyof ExchangeHost;

type FailureTable = Map<MemoryHostCall, HostCallErrorCode>;

function check(failures: FailureTable, call: MemoryHostCall): void {
  const code = failures.get(call);
  if (code !== undefined) {
    throw new HostCallError(call, code);
  }
}

export class MemoryExchangeHost implements ExchangeHost {
  readonly contextId: number;
  readonly requestHeaders = new Map<string, string>();
  readonly responseHeaders = new Map<string, string>();
  readonly properties = new Map<string, Uint8Array>();
  /** Chunks released past the filter, per direction, in order */
  readonly forwarded: Record<Direction, Uint8Array[]> = { request: [], response: [] };

  private readonly failures: FailureTable;
  private readonly buffers: Record<Direction, Uint8Array> = {
    request: new Uint8Array(0),
    response: new Uint8Array(0),
  };
  private readonly buffering: Record<Direction, boolean> = { request: false, response: false };

  constructor(contextId: number, failures: FailureTable) {
    this.contextId = contextId;
    this.failures = failures;
  }

  getRequestHeader(name: string): string | undefined {
    check(this.failures, 'getRequestHeader');
    return this.requestHeaders.get(name.toLowerCase());
  }

  getResponseHeader(name: string): string | undefined {
    check(this.failures, 'getResponseHeader');
    return this.responseHeaders.get(name.toLowerCase());
  }

  getRequestBody(start: number, size: number): Uint8Array {
    check(this.failures, 'getRequestBody');
    return this.buffers.request.slice(start, start + size);
  }

  getResponseBody(start: number, size: number): Uint8Array {
    check(this.failures, 'getResponseBody');
    return this.buffers.response.slice(start, start + size);
  }

  replaceRequestBody(body: Uint8Array): void {
    check(this.failures, 'replaceRequestBody');
    this.buffers.request = body.slice();
  }

  replaceResponseBody(body: Uint8Array): void {
    check(this.failures, 'replaceResponseBody');
    this.buffers.response = body.slice();
  }

  getProperty(path: PropertyPath): Uint8Array | undefined {
    check(this.failures, 'getProperty');
    return this.properties.get(path.join('.'));
  }

  setProperty(path: PropertyPath, value: Uint8Array): void {
    check(this.failures, 'setProperty');
    this.properties.set(path.join('.'), value.slice());
  }

  // ─── Test and harness helpers ─────────────────────────────────────────────

  setHeaders(direction: Direction, headers: Record<string, string>): void {
    const target = direction === 'request' ? this.requestHeaders : this.responseHeaders;
    for (const [name, value] of Object.entries(headers)) {
      target.set(name.toLowerCase(), value);
    }
  }

  propertyText(name: string): string | undefined {
    const value = this.properties.get(name);
    return value === undefined ? undefined : decodeText(value);
  }

  setPropertyText(name: string, value: string): void {
    this.properties.set(name, encodeText(value));
  }

  /**
   * Make a new chunk visible for the next body signal and return its size.
   */
  receiveBody(direction: Direction, chunk: Uint8Array): number {
    this.buffers[direction] = this.buffering[direction]
      ? Buffer.concat([this.buffers[direction], chunk])
      : chunk.slice();
    return chunk.length;
  }

  /**
   * Apply the action returned for a body signal.
   */
  settleBody(direction: Direction, action: Action): void {
    if (action === Action.PAUSE) {
      this.buffering[direction] = true;
      return;
    }
    this.buffering[direction] = false;
    if (this.buffers[direction].length > 0) {
      this.forwarded[direction].push(this.buffers[direction]);
    }
    this.buffers[direction] = new Uint8Array(0);
  }

  forwardedBody(direction: Direction): Uint8Array {
    return Buffer.concat(this.forwarded[direction]);
  }
}

export interface MemoryHostOptions {
  /** Extension configuration: raw text, or an object serialized as JSON */
  configuration?: string | JsonObject;
  /** Initial clock value in milliseconds */
  now?: number;
}

export class MemoryHost implements PluginHost {
  tickPeriodMs: number | null = null;

  private configuration: Uint8Array | undefined;
  private clock: number;
  private readonly exchanges = new Map<number, MemoryExchangeHost>();
  private readonly failures: FailureTable = new Map();

  constructor(options: MemoryHostOptions = {}) {
    this.setConfiguration(options.configuration);
    this.clock = options.now ?? 0;
  }

  setConfiguration(configuration: string | JsonObject | undefined): void {
    if (configuration === undefined) {
      this.configuration = undefined;
      return;
    }
    this.configuration = encodeText(
      typeof configuration === 'string' ? configuration : JSON.stringify(configuration)
    );
  }

  getPluginConfiguration(): Uint8Array | undefined {
    check(this.failures, 'getPluginConfiguration');
    return this.configuration;
  }

  setTickPeriod(periodMs: number): void {
    check(this.failures, 'setTickPeriod');
    this.tickPeriodMs = periodMs;
  }

  now(): number {
    return this.clock;
  }

  advance(ms: number): number {
    this.clock += ms;
    return this.clock;
  }

  exchange(contextId: number): MemoryExchangeHost {
    let exchange = this.exchanges.get(contextId);
    if (!exchange) {
      exchange = new MemoryExchangeHost(contextId, this.failures);
      this.exchanges.set(contextId, exchange);
    }
    return exchange;
  }

  failOn(call: MemoryHostCall, code: HostCallErrorCode = 'INTERNAL'): void {
    this.failures.set(call, code);
  }

  clearFailure(call: MemoryHostCall): void {
    this.failures.delete(call);
  }
}
