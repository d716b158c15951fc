/**
 * Lifecycle Types
 *
 * Values exchanged with the gateway host on every phase signal.
 */

// Action returned to the host for a header or body signal
export const Action = {
  CONTINUE: 'continue',
  PAUSE: 'pause',
} as const;

export type Action = (typeof Action)[keyof typeof Action];

export const StartStatus = {
  OK: 'ok',
  FAILED: 'failed',
} as const;

export type StartStatus = (typeof StartStatus)[keyof typeof StartStatus];

export type Direction = 'request' | 'response';

/**
 * Request attributes the rule matcher resolves configuration from.
 * Missing values are empty strings.
 */
export interface RequestMetadata {
  scheme: string;
  host: string;
  path: string;
  method: string;
  /** Name of the gateway route the request was matched to */
  routeName: string;
  /** Upstream cluster, e.g. `outbound|80||echo.default.svc.cluster.local` */
  clusterName: string;
}
