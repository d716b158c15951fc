import { describe, it, expect, vi } from 'vitest';
import { Action, type RequestMetadata } from '@filterkit/shared';
import { ExchangeContext, type ExchangePlugin } from './exchange-context.js';
import type { ExtensionHooks, HttpExchange } from './types.js';
import { MemoryHost } from '../host/memory-host.js';
import { decodeText, encodeText } from '../host/properties.js';
import { makeLogger } from '../test-setup.js';

interface TagConfig {
  tag: string;
}

const CONFIG: TagConfig = { tag: 'matched' };

function setup(
  hooks: ExtensionHooks<TagConfig>,
  resolve: (metadata: RequestMetadata) => TagConfig | null = () => CONFIG
) {
  const logger = makeLogger();
  const host = new MemoryHost();
  const hostExchange = host.exchange(1);
  hostExchange.setHeaders('request', { ':path': '/a', ':authority': 'api.test', ':method': 'POST', ':scheme': 'https' });
  const plugin: ExchangePlugin<TagConfig> = { hooks, logger, resolve };
  const exchange = new ExchangeContext(plugin, 1, hostExchange);
  return { logger, host, hostExchange, exchange };
}

describe('ExchangeContext', () => {
  describe('onRequestHeaders', () => {
    it('resolves the configuration and calls the hook with it', () => {
      const onRequestHeaders = vi.fn().mockReturnValue(Action.PAUSE);
      const { exchange, logger } = setup({ onRequestHeaders });

      expect(exchange.onRequestHeaders()).toBe(Action.PAUSE);
      expect(exchange.matched).toBe(true);
      expect(onRequestHeaders).toHaveBeenCalledWith(exchange, CONFIG, logger);
    });

    it('hands request metadata to the resolver', () => {
      const resolve = vi.fn().mockReturnValue(null);
      const { exchange, hostExchange } = setup({}, resolve);
      hostExchange.setPropertyText('route_name', 'r1');

      exchange.onRequestHeaders();

      expect(resolve).toHaveBeenCalledWith({
        scheme: 'https',
        host: 'api.test',
        path: '/a',
        method: 'POST',
        routeName: 'r1',
        clusterName: '',
      });
    });

    it('leaves the exchange unmatched when no configuration applies', () => {
      const hooks = {
        onRequestHeaders: vi.fn(),
        onRequestBody: vi.fn(),
        onResponseHeaders: vi.fn(),
        onResponseBody: vi.fn(),
        onStreamDone: vi.fn(),
      };
      const { exchange } = setup(hooks, () => null);

      expect(exchange.onRequestHeaders()).toBe(Action.CONTINUE);
      expect(exchange.onRequestBody(10, true)).toBe(Action.CONTINUE);
      expect(exchange.onResponseHeaders()).toBe(Action.CONTINUE);
      expect(exchange.onResponseBody(10, true)).toBe(Action.CONTINUE);
      exchange.onStreamDone();

      expect(exchange.matched).toBe(false);
      for (const hook of Object.values(hooks)) {
        expect(hook).not.toHaveBeenCalled();
      }
    });

    it('continues unmatched when the resolver throws', () => {
      const onRequestHeaders = vi.fn();
      const { exchange, logger } = setup({ onRequestHeaders }, () => {
        throw new Error('lookup failed');
      });

      expect(exchange.onRequestHeaders()).toBe(Action.CONTINUE);
      expect(exchange.matched).toBe(false);
      expect(onRequestHeaders).not.toHaveBeenCalled();
      expect(logger.error).toHaveBeenCalledWith('get match config failed', { error: 'lookup failed' });
    });

    it('continues when there is no headers hook', () => {
      const { exchange } = setup({});
      expect(exchange.onRequestHeaders()).toBe(Action.CONTINUE);
    });

    it('copies x-request-id into the request id property', () => {
      const { exchange, hostExchange } = setup({});
      hostExchange.setHeaders('request', { 'x-request-id': 'req-42' });

      exchange.onRequestHeaders();

      expect(hostExchange.propertyText('x_request_id')).toBe('req-42');
    });

    it('copies the request id even for unmatched exchanges', () => {
      const { exchange, hostExchange } = setup({}, () => null);
      hostExchange.setHeaders('request', { 'x-request-id': 'req-43' });
      exchange.onRequestHeaders();
      expect(hostExchange.propertyText('x_request_id')).toBe('req-43');
    });

    it('does not set the request id property without the header', () => {
      const { exchange, hostExchange } = setup({});
      exchange.onRequestHeaders();
      expect(hostExchange.propertyText('x_request_id')).toBeUndefined();
    });
  });

  describe('whole body', () => {
    it('pauses until end of stream and delivers the accumulated body', () => {
      const bodies: string[] = [];
      const onRequestBody = vi.fn((_ex: HttpExchange, _config: TagConfig, body: Uint8Array) => {
        bodies.push(decodeText(body));
        return Action.CONTINUE;
      });
      const { exchange, hostExchange } = setup({ onRequestBody });
      exchange.onRequestHeaders();

      const first = exchange.onRequestBody(hostExchange.receiveBody('request', encodeText('{"a"')), false);
      expect(first).toBe(Action.PAUSE);
      hostExchange.settleBody('request', first);

      const last = exchange.onRequestBody(hostExchange.receiveBody('request', encodeText(':1}')), true);
      expect(last).toBe(Action.CONTINUE);
      expect(bodies).toEqual(['{"a":1}']);
      expect(onRequestBody).toHaveBeenCalledTimes(1);
    });

    it('returns the hook action at end of stream', () => {
      const { exchange, hostExchange } = setup({ onResponseBody: () => Action.PAUSE });
      exchange.onRequestHeaders();
      exchange.onResponseHeaders();
      expect(exchange.onResponseBody(hostExchange.receiveBody('response', encodeText('x')), true)).toBe(Action.PAUSE);
    });

    it('skips the body when the content is binary', () => {
      const onRequestBody = vi.fn();
      const { exchange, hostExchange } = setup({ onRequestBody });
      hostExchange.setHeaders('request', { 'content-type': 'application/octet-stream' });

      exchange.onRequestHeaders();

      expect(exchange.onRequestBody(4, true)).toBe(Action.CONTINUE);
      expect(onRequestBody).not.toHaveBeenCalled();
    });

    it('skips a compressed response body', () => {
      const onResponseBody = vi.fn();
      const { exchange, hostExchange } = setup({ onResponseBody });
      hostExchange.setHeaders('response', { 'content-encoding': 'gzip' });

      exchange.onRequestHeaders();
      exchange.onResponseHeaders();

      expect(exchange.onResponseBody(4, true)).toBe(Action.CONTINUE);
      expect(onResponseBody).not.toHaveBeenCalled();
    });

    it('honours dontReadRequestBody from the headers hook', () => {
      const onRequestBody = vi.fn();
      const { exchange } = setup({
        onRequestHeaders: (ex) => {
          ex.dontReadRequestBody();
          return Action.CONTINUE;
        },
        onRequestBody,
      });

      exchange.onRequestHeaders();

      expect(exchange.onRequestBody(4, false)).toBe(Action.CONTINUE);
      expect(onRequestBody).not.toHaveBeenCalled();
    });

    it('continues without calling the hook when the body cannot be read', () => {
      const onRequestBody = vi.fn();
      const { exchange, host, logger } = setup({ onRequestBody });
      exchange.onRequestHeaders();
      host.failOn('getRequestBody');

      expect(exchange.onRequestBody(3, true)).toBe(Action.CONTINUE);
      expect(onRequestBody).not.toHaveBeenCalled();
      expect(logger.warn).toHaveBeenCalledWith('get request body failed', {
        error: 'Host call getRequestBody failed: INTERNAL',
      });
    });
  });

  describe('streaming body', () => {
    it('hands each chunk to the hook and forwards what it returns', () => {
      const seen: [string, boolean][] = [];
      const { exchange, hostExchange } = setup({
        onStreamingResponseBody: (_ex, _config, chunk, isLastChunk) => {
          seen.push([decodeText(chunk), isLastChunk]);
          return encodeText(decodeText(chunk).toUpperCase());
        },
      });
      exchange.onRequestHeaders();
      exchange.onResponseHeaders();

      for (const [chunk, eos] of [['data: a\n', false], ['data: b\n', true]] as const) {
        const action = exchange.onResponseBody(hostExchange.receiveBody('response', encodeText(chunk)), eos);
        expect(action).toBe(Action.CONTINUE);
        hostExchange.settleBody('response', action);
      }

      expect(seen).toEqual([
        ['data: a\n', false],
        ['data: b\n', true],
      ]);
      expect(decodeText(hostExchange.forwardedBody('response'))).toBe('DATA: A\nDATA: B\n');
    });

    it('prefers the whole-body hook after bufferRequestBody', () => {
      const onStreamingRequestBody = vi.fn((_ex: HttpExchange, _config: TagConfig, chunk: Uint8Array) => chunk);
      const onRequestBody = vi.fn().mockReturnValue(Action.CONTINUE);
      const { exchange, hostExchange } = setup({
        onRequestHeaders: (ex) => {
          ex.bufferRequestBody();
          return Action.CONTINUE;
        },
        onStreamingRequestBody,
        onRequestBody,
      });
      exchange.onRequestHeaders();

      const first = exchange.onRequestBody(hostExchange.receiveBody('request', encodeText('ab')), false);
      hostExchange.settleBody('request', first);
      exchange.onRequestBody(hostExchange.receiveBody('request', encodeText('cd')), true);

      expect(first).toBe(Action.PAUSE);
      expect(onStreamingRequestBody).not.toHaveBeenCalled();
      expect(onRequestBody).toHaveBeenCalledTimes(1);
      expect(decodeText(onRequestBody.mock.calls[0][2])).toBe('abcd');
    });

    it('skips the hook when a chunk cannot be read', () => {
      const onStreamingRequestBody = vi.fn((_ex: HttpExchange, _config: TagConfig, chunk: Uint8Array) => chunk);
      const { exchange, host, logger } = setup({ onStreamingRequestBody });
      exchange.onRequestHeaders();
      host.failOn('getRequestBody');

      expect(exchange.onRequestBody(2, false)).toBe(Action.CONTINUE);
      expect(onStreamingRequestBody).not.toHaveBeenCalled();
      expect(logger.warn).toHaveBeenCalledWith('get request body chunk failed', {
        error: 'Host call getRequestBody failed: INTERNAL',
      });
    });

    it('logs a failed chunk replacement and continues', () => {
      const { exchange, host, hostExchange, logger } = setup({
        onStreamingRequestBody: () => encodeText('changed'),
      });
      exchange.onRequestHeaders();
      host.failOn('replaceRequestBody');

      expect(exchange.onRequestBody(hostExchange.receiveBody('request', encodeText('orig')), true)).toBe(
        Action.CONTINUE
      );
      expect(logger.warn).toHaveBeenCalledWith('replace request body chunk failed', {
        error: 'Host call replaceRequestBody failed: INTERNAL',
      });
    });
  });

  describe('hook logger', () => {
    it('hands hooks the child logger bound to the exchange id', () => {
      const onRequestHeaders = vi.fn().mockReturnValue(Action.CONTINUE);
      const onStreamDone = vi.fn();
      const logger = makeLogger();
      const exchangeLogger = makeLogger();
      logger.child.mockReturnValue(exchangeLogger);
      const host = new MemoryHost();
      const plugin: ExchangePlugin<TagConfig> = {
        hooks: { onRequestHeaders, onStreamDone },
        logger,
        resolve: () => CONFIG,
      };
      const exchange = new ExchangeContext(plugin, 7, host.exchange(7));

      exchange.onRequestHeaders();
      exchange.onStreamDone();

      expect(logger.child).toHaveBeenCalledWith({ exchangeId: 7 });
      expect(onRequestHeaders).toHaveBeenCalledWith(exchange, CONFIG, exchangeLogger);
      expect(onStreamDone).toHaveBeenCalledWith(exchange, CONFIG, exchangeLogger);
    });
  });

  describe('onStreamDone', () => {
    it('runs the hook once for a matched exchange', () => {
      const onStreamDone = vi.fn();
      const { exchange, logger } = setup({ onStreamDone });
      exchange.onRequestHeaders();

      exchange.onStreamDone();
      exchange.onStreamDone();

      expect(onStreamDone).toHaveBeenCalledTimes(1);
      expect(onStreamDone).toHaveBeenCalledWith(exchange, CONFIG, logger);
    });

    it('does not run before the configuration is resolved', () => {
      const onStreamDone = vi.fn();
      const { exchange } = setup({ onStreamDone });
      exchange.onStreamDone();
      expect(onStreamDone).not.toHaveBeenCalled();
    });
  });

  describe('HttpExchange API', () => {
    it('reads request pseudo-headers', () => {
      const { exchange } = setup({});
      expect([exchange.scheme(), exchange.host(), exchange.path(), exchange.method()]).toEqual([
        'https',
        'api.test',
        '/a',
        'POST',
      ]);
    });

    it('reads headers and returns undefined when the host call fails', () => {
      const { exchange, host, hostExchange } = setup({});
      hostExchange.setHeaders('response', { 'content-type': 'text/event-stream' });
      expect(exchange.getRequestHeader(':path')).toBe('/a');
      expect(exchange.getResponseHeader('content-type')).toBe('text/event-stream');

      host.failOn('getResponseHeader');
      expect(exchange.getResponseHeader('content-type')).toBeUndefined();
    });

    it('stores per-exchange context values', () => {
      const { exchange } = setup({});
      exchange.setContext('stream', true);
      exchange.setContext('model', 'small');
      exchange.setContext('count', 2);

      expect(exchange.getContext('count')).toBe(2);
      expect(exchange.getContext('missing')).toBeUndefined();
      expect(exchange.getBoolContext('stream', false)).toBe(true);
      expect(exchange.getBoolContext('model', false)).toBe(false);
      expect(exchange.getStringContext('model', '')).toBe('small');
      expect(exchange.getStringContext('count', 'none')).toBe('none');
    });

    it('exports user attributes to the log and trace properties', () => {
      const { exchange, hostExchange } = setup({});
      exchange.setUserAttribute('model', 'small');
      exchange.setUserAttribute('tokens', 5);

      expect(exchange.getUserAttribute('tokens')).toBe(5);
      expect(exchange.writeUserAttributeToLog()).toEqual({ ok: true });
      expect(exchange.writeUserAttributeToLogWithKey('ai_log')).toEqual({ ok: true });
      expect(exchange.writeUserAttributeToTrace()).toEqual({ written: ['model', 'tokens'], failed: [] });

      expect(hostExchange.propertyText('custom_log')).toBe(String.raw`{\"model\":\"small\",\"tokens\":5}`);
      expect(hostExchange.propertyText('ai_log')).toBe(String.raw`{\"model\":\"small\",\"tokens\":5}`);
      expect(hostExchange.propertyText('trace_span_tag.tokens')).toBe('5');
    });

    it('replaces bodies and reports host failures', () => {
      const { exchange, host, hostExchange } = setup({});
      expect(exchange.replaceResponseBody(encodeText('new'))).toBe(true);
      expect(decodeText(hostExchange.getResponseBody(0, 3))).toBe('new');

      host.failOn('replaceRequestBody');
      expect(exchange.replaceRequestBody(encodeText('x'))).toBe(false);
    });

    it('disables rerouting', () => {
      const { exchange, hostExchange } = setup({});
      exchange.disableReroute();
      expect(hostExchange.propertyText('clear_route_cache')).toBe('off');
    });

    it('sets body buffer limits', () => {
      const { exchange, hostExchange, logger } = setup({});
      exchange.setRequestBodyBufferLimit(1024);
      exchange.setResponseBodyBufferLimit(0);

      expect(hostExchange.propertyText('set_decoder_buffer_limit')).toBe('1024');
      expect(hostExchange.propertyText('set_encoder_buffer_limit')).toBe('0');
      expect(logger.info).toHaveBeenCalledWith('set_decoder_buffer_limit: 1024');
    });

    it('ignores invalid buffer limits', () => {
      const { exchange, hostExchange, logger } = setup({});
      exchange.setRequestBodyBufferLimit(-1);
      exchange.setResponseBodyBufferLimit(1.5);

      expect(hostExchange.propertyText('set_decoder_buffer_limit')).toBeUndefined();
      expect(hostExchange.propertyText('set_encoder_buffer_limit')).toBeUndefined();
      expect(logger.warn).toHaveBeenCalledWith('Ignoring invalid body buffer limit', {
        property: 'set_decoder_buffer_limit',
        bytes: -1,
      });
    });

    it('logs a failed property write without throwing', () => {
      const { exchange, host, logger } = setup({});
      host.failOn('setProperty');

      expect(() => exchange.disableReroute()).not.toThrow();
      expect(logger.warn).toHaveBeenCalledWith('failed to set property clear_route_cache', {
        value: 'off',
        error: 'Host call setProperty failed: INTERNAL',
      });
    });
  });
});
