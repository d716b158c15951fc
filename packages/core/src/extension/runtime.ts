/**
 * ExtensionRuntime: entry point for the gateway host.
 *
 * Routes lifecycle signals to the extension instance and to one
 * ExchangeContext per context id. A context is created by the first signal
 * for its id and discarded after stream-done or an abrupt reset. Signals
 * for new ids pass through untouched until a start succeeds.
 */

import { Action, type StartStatus } from '@filterkit/shared';
import type { PluginHost } from '../host/types.js';
import type { ExtensionDefinition } from './define.js';
import type { ExchangeContext } from './exchange-context.js';
import { PluginContext } from './plugin-context.js';

export class ExtensionRuntime<C> {
  readonly plugin: PluginContext<C>;
  private readonly exchanges = new Map<number, ExchangeContext<C>>();

  constructor(definition: ExtensionDefinition<C>, host: PluginHost) {
    this.plugin = new PluginContext(definition, host);
  }

  get liveExchanges(): number {
    return this.exchanges.size;
  }

  onPluginStart(): StartStatus {
    return this.plugin.start();
  }

  onTick(): void {
    this.plugin.onTick();
  }

  onRequestHeaders(contextId: number, _headerCount: number, _endOfStream: boolean): Action {
    return this.exchange(contextId)?.onRequestHeaders() ?? Action.CONTINUE;
  }

  onRequestBody(contextId: number, bodySize: number, endOfStream: boolean): Action {
    return this.exchange(contextId)?.onRequestBody(bodySize, endOfStream) ?? Action.CONTINUE;
  }

  onResponseHeaders(contextId: number, _headerCount: number, _endOfStream: boolean): Action {
    return this.exchange(contextId)?.onResponseHeaders() ?? Action.CONTINUE;
  }

  onResponseBody(contextId: number, bodySize: number, endOfStream: boolean): Action {
    return this.exchange(contextId)?.onResponseBody(bodySize, endOfStream) ?? Action.CONTINUE;
  }

  onStreamDone(contextId: number): void {
    const exchange = this.exchange(contextId);
    if (!exchange) return;
    try {
      exchange.onStreamDone();
    } finally {
      this.exchanges.delete(contextId);
    }
  }

  /** The host tore the exchange down without stream-done; no hook runs. */
  onExchangeReset(contextId: number): void {
    if (this.exchanges.delete(contextId)) {
      this.plugin.logger.debug('Exchange reset before stream done', { exchangeId: contextId });
    }
  }

  private exchange(contextId: number): ExchangeContext<C> | undefined {
    const existing = this.exchanges.get(contextId);
    if (existing) {
      return existing;
    }
    // Exchanges already in flight outlive a failed restart; new ones pass through
    if (!this.plugin.isStarted) {
      return undefined;
    }
    const exchange = this.plugin.newExchange(contextId);
    this.exchanges.set(contextId, exchange);
    return exchange;
  }
}
