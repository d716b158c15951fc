/**
 * Host Boundary
 *
 * The gateway host delivers lifecycle signals and answers calls for
 * headers, bodies and properties. Calls that fail throw a HostCallError;
 * absent headers and properties are reported as `undefined`.
 */

/** Property path segments, e.g. `['route_name']` */
export type PropertyPath = readonly string[];

/** Host calls scoped to a single exchange. */
export interface ExchangeHost {
  getRequestHeader(name: string): string | undefined;
  getResponseHeader(name: string): string | undefined;
  /** Bytes `[start, start + size)` of the request body buffer visible in the current signal */
  getRequestBody(start: number, size: number): Uint8Array;
  getResponseBody(start: number, size: number): Uint8Array;
  replaceRequestBody(body: Uint8Array): void;
  replaceResponseBody(body: Uint8Array): void;
  getProperty(path: PropertyPath): Uint8Array | undefined;
  setProperty(path: PropertyPath, value: Uint8Array): void;
}

/** Host calls available to the extension instance as a whole. */
export interface PluginHost {
  /** Raw configuration bytes; `undefined` when none was supplied */
  getPluginConfiguration(): Uint8Array | undefined;
  /** Arm the periodic tick signal */
  setTickPeriod(periodMs: number): void;
  /** Milliseconds since the Unix epoch */
  now(): number;
  exchange(contextId: number): ExchangeHost;
}
