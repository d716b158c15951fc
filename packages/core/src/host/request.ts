/**
 * Request metadata and body classification read through the host.
 *
 * Every read here is best effort: a failing host call yields an empty
 * value and a debug record, never an exception.
 */

import type { Direction, RequestMetadata } from '@filterkit/shared';
import type { ExtensionLogger } from '../logging/logger.js';
import { toErrorMessage } from '../utils/errors.js';
import type { ExchangeHost } from './types.js';
import { Property, decodeText } from './properties.js';

function readHeader(
  host: ExchangeHost,
  direction: Direction,
  name: string,
  logger: ExtensionLogger
): string {
  try {
    const value =
      direction === 'request' ? host.getRequestHeader(name) : host.getResponseHeader(name);
    return value ?? '';
  } catch (err) {
    logger.debug(`Failed to read ${direction} header ${name}`, { error: toErrorMessage(err) });
    return '';
  }
}

export function readRequestHeader(host: ExchangeHost, name: string, logger: ExtensionLogger): string {
  return readHeader(host, 'request', name, logger);
}

export function readStringProperty(
  host: ExchangeHost,
  property: string,
  logger: ExtensionLogger
): string {
  try {
    const value = host.getProperty([property]);
    return value ? decodeText(value) : '';
  } catch (err) {
    logger.debug(`Failed to read property ${property}`, { error: toErrorMessage(err) });
    return '';
  }
}

export function readRequestMetadata(host: ExchangeHost, logger: ExtensionLogger): RequestMetadata {
  return {
    scheme: readRequestHeader(host, ':scheme', logger),
    host: readRequestHeader(host, ':authority', logger),
    path: readRequestHeader(host, ':path', logger),
    method: readRequestHeader(host, ':method', logger),
    routeName: readStringProperty(host, Property.ROUTE_NAME, logger),
    clusterName: readStringProperty(host, Property.CLUSTER_NAME, logger),
  };
}

/**
 * Binary payloads (octet streams, gRPC frames, compressed bodies) are
 * never handed to body callbacks.
 */
export function isBinaryBody(
  host: ExchangeHost,
  direction: Direction,
  logger: ExtensionLogger
): boolean {
  const contentType = readHeader(host, direction, 'content-type', logger);
  if (contentType.includes('octet-stream') || contentType.includes('grpc')) {
    return true;
  }
  return readHeader(host, direction, 'content-encoding', logger) !== '';
}
