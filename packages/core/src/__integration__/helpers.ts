/**
 * Integration Test Helpers
 *
 * Drives an ExtensionRuntime through whole exchanges against the in-memory
 * host, applying every returned action the way the gateway would.
 */

import { Action, type Direction, type JsonObject } from '@filterkit/shared';
import type { ExtensionRuntime } from '../extension/runtime.js';
import { MemoryHost, type MemoryExchangeHost } from '../host/memory-host.js';
import { decodeText, encodeText } from '../host/properties.js';
import type { ExtensionLogger } from '../logging/logger.js';

// ── Noop Logger ────────────────────────────────────────────────────

export function noopLogger(): ExtensionLogger {
  const noop = () => {};
  return {
    trace: noop,
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    fatal: noop,
    child: () => noopLogger(),
    level: 'trace',
  };
}

// ── Exchanges ──────────────────────────────────────────────────────

export interface ExchangeScript {
  requestHeaders?: Record<string, string>;
  /** Route and cluster properties the gateway would expose */
  properties?: Record<string, string>;
  requestBody?: string[];
  responseHeaders?: Record<string, string>;
  responseBody?: string[];
  /** End with a reset instead of stream-done */
  reset?: boolean;
}

export interface ExchangeOutcome {
  requestHeaders: Action;
  requestBody: Action[];
  responseHeaders: Action;
  responseBody: Action[];
  /** Bytes released past the filter */
  forwardedRequest: string;
  forwardedResponse: string;
  host: MemoryExchangeHost;
}

export function createHost(configuration?: string | JsonObject): MemoryHost {
  return new MemoryHost({ configuration, now: 0 });
}

function sendBody<C>(
  runtime: ExtensionRuntime<C>,
  exchange: MemoryExchangeHost,
  contextId: number,
  direction: Direction,
  chunks: readonly string[]
): Action[] {
  return chunks.map((chunk, index) => {
    const size = exchange.receiveBody(direction, encodeText(chunk));
    const endOfStream = index === chunks.length - 1;
    const action =
      direction === 'request'
        ? runtime.onRequestBody(contextId, size, endOfStream)
        : runtime.onResponseBody(contextId, size, endOfStream);
    exchange.settleBody(direction, action);
    return action;
  });
}

export function runExchange<C>(
  runtime: ExtensionRuntime<C>,
  host: MemoryHost,
  contextId: number,
  script: ExchangeScript
): ExchangeOutcome {
  const exchange = host.exchange(contextId);
  exchange.setHeaders('request', { ':scheme': 'https', ':method': 'GET', ':path': '/', ...script.requestHeaders });
  for (const [name, value] of Object.entries(script.properties ?? {})) {
    exchange.setPropertyText(name, value);
  }

  const requestBody = script.requestBody ?? [];
  const requestHeaders = runtime.onRequestHeaders(contextId, exchange.requestHeaders.size, requestBody.length === 0);
  const requestActions = sendBody(runtime, exchange, contextId, 'request', requestBody);

  exchange.setHeaders('response', { ':status': '200', ...script.responseHeaders });
  const responseBody = script.responseBody ?? [];
  const responseHeaders = runtime.onResponseHeaders(
    contextId,
    exchange.responseHeaders.size,
    responseBody.length === 0
  );
  const responseActions = sendBody(runtime, exchange, contextId, 'response', responseBody);

  if (script.reset) {
    runtime.onExchangeReset(contextId);
  } else {
    runtime.onStreamDone(contextId);
  }

  return {
    requestHeaders,
    requestBody: requestActions,
    responseHeaders,
    responseBody: responseActions,
    forwardedRequest: decodeText(exchange.forwardedBody('request')),
    forwardedResponse: decodeText(exchange.forwardedBody('response')),
    host: exchange,
  };
}
