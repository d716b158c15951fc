/**
 * Log property encoding.
 *
 * The access-log property carries its JSON object as the *contents* of a
 * JSON string literal: `{"a":"1"}` is stored as `{\"a\":\"1\"}`. Reading
 * unescapes once, writing escapes once.
 */

import { JsonObjectSchema, type JsonObject, type JsonValue } from '@filterkit/shared';

/** `{"a":"1"}` → `{\"a\":\"1\"}` */
export function escapeLogValue(text: string): string {
  return JSON.stringify(text).slice(1, -1);
}

/** `{\"a\":\"1\"}` → `{"a":"1"}`; throws when the input is not a valid escaped string */
export function unescapeLogValue(escaped: string): string {
  const parsed: unknown = JSON.parse(`"${escaped}"`);
  if (typeof parsed !== 'string') {
    throw new SyntaxError('escaped log value did not decode to a string');
  }
  return parsed;
}

/** Decode a stored log property into its JSON object. */
export function decodeLogObject(escaped: string): JsonObject {
  const parsed: unknown = JSON.parse(unescapeLogValue(escaped));
  const result = JsonObjectSchema.safeParse(parsed);
  if (!result.success) {
    throw new SyntaxError('log value is not a JSON object');
  }
  return result.data;
}

export function encodeLogObject(object: JsonObject): string {
  return escapeLogValue(JSON.stringify(object));
}

/**
 * Trace tags are plain strings: strings are used as-is, everything else is
 * JSON-encoded, and `null` becomes the empty string.
 */
export function stringifyAttribute(value: JsonValue): string {
  if (value === null) return '';
  if (typeof value === 'string') return value;
  return JSON.stringify(value);
}
