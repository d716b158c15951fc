/**
 * AttributePropagator: accumulates user attributes for one exchange and
 * exports them to the access-log property and to trace span tags.
 *
 * Export failures are logged and reported to the caller; the exchange
 * itself always proceeds.
 */

import type { JsonObject, JsonValue } from '@filterkit/shared';
import type { ExchangeHost } from '../host/types.js';
import type { ExtensionLogger } from '../logging/logger.js';
import { CUSTOM_LOG_KEY, TRACE_SPAN_TAG_PREFIX, decodeText, encodeText } from '../host/properties.js';
import { AttributeExportError, isNotFound, toErrorMessage } from '../utils/errors.js';
import { decodeLogObject, encodeLogObject, stringifyAttribute } from './encoding.js';

export type LogExportResult = { ok: true } | { ok: false; error: AttributeExportError };

export interface TraceExportResult {
  written: string[];
  failed: string[];
}

export class AttributePropagator {
  private readonly attributes = new Map<string, JsonValue>();
  private readonly host: ExchangeHost;
  private readonly logger: ExtensionLogger;

  constructor(host: ExchangeHost, logger: ExtensionLogger) {
    this.host = host;
    this.logger = logger;
  }

  set(key: string, value: JsonValue): void {
    this.attributes.set(key, value);
  }

  get(key: string): JsonValue | undefined {
    return this.attributes.get(key);
  }

  get size(): number {
    return this.attributes.size;
  }

  toObject(): JsonObject {
    return Object.fromEntries(this.attributes);
  }

  /**
   * Merge the attributes into the JSON object held by `key`. A prior value
   * that cannot be decoded is left untouched.
   */
  writeToLog(key: string = CUSTOM_LOG_KEY): LogExportResult {
    let prior: string;
    try {
      const raw = this.host.getProperty([key]);
      prior = raw ? decodeText(raw) : '';
    } catch (err) {
      if (!isNotFound(err)) {
        return this.logFailure(
          new AttributeExportError('PROPERTY_READ', key, `failed to read ${key}: ${toErrorMessage(err)}`, err)
        );
      }
      prior = '';
    }

    let priorObject: JsonObject;
    try {
      priorObject = prior === '' ? {} : decodeLogObject(prior);
    } catch (err) {
      return this.logFailure(
        new AttributeExportError('LOG_PARSE', key, `cannot merge into ${key}, prior value is: ${prior}`, err)
      );
    }

    // Object.fromEntries defines own properties, so names like __proto__ survive
    const merged: JsonObject = Object.fromEntries([...Object.entries(priorObject), ...this.attributes]);

    const encoded = encodeLogObject(merged);
    try {
      this.host.setProperty([key], encodeText(encoded));
    } catch (err) {
      return this.logFailure(
        new AttributeExportError('PROPERTY_WRITE', key, `failed to set ${key} to ${encoded}: ${toErrorMessage(err)}`, err)
      );
    }
    return { ok: true };
  }

  /**
   * Write each attribute as its own trace span tag. Keys whose value is
   * empty or whose write fails are skipped; the rest are still written.
   */
  writeToTrace(): TraceExportResult {
    const result: TraceExportResult = { written: [], failed: [] };

    for (const [name, value] of this.attributes) {
      const tag = TRACE_SPAN_TAG_PREFIX + name;
      const text = stringifyAttribute(value);
      try {
        if (text === '') {
          throw new AttributeExportError('TRACE_VALUE_EMPTY', tag, `value of ${tag} is empty`);
        }
        this.host.setProperty([tag], encodeText(text));
        result.written.push(name);
      } catch (err) {
        this.logger.warn('Failed to set trace attribute', { tag, value: text, error: toErrorMessage(err) });
        result.failed.push(name);
      }
    }

    return result;
  }

  private logFailure(error: AttributeExportError): LogExportResult {
    this.logger.warn(error.message, { property: error.property, code: error.code });
    return { ok: false, error };
  }
}
