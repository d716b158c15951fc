/**
 * Well-known host properties and the byte/string helpers used to talk to them.
 */

export const Property = {
  /** Set to `off` to stop the gateway re-selecting a route after header edits */
  CLEAR_ROUTE_CACHE: 'clear_route_cache',
  DECODER_BUFFER_LIMIT: 'set_decoder_buffer_limit',
  ENCODER_BUFFER_LIMIT: 'set_encoder_buffer_limit',
  REQUEST_ID: 'x_request_id',
  ROUTE_NAME: 'route_name',
  CLUSTER_NAME: 'cluster_name',
} as const;

export type Property = (typeof Property)[keyof typeof Property];

/** Default property the user attributes are merged into for access logs */
export const CUSTOM_LOG_KEY = 'custom_log';
/** Property consumed by the AI observability log format */
export const AI_LOG_KEY = 'ai_log';
export const TRACE_SPAN_TAG_PREFIX = 'trace_span_tag.';

export const REQUEST_ID_HEADER = 'x-request-id';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function encodeText(text: string): Uint8Array {
  return encoder.encode(text);
}

export function decodeText(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}
