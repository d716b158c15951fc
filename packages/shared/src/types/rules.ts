/**
 * Rule Configuration Types
 *
 * An extension's configuration is a JSON object. Top-level keys other than
 * `_rules_` form the global configuration; each entry of `_rules_` carries
 * its own configuration plus at least one match key.
 */

import { z } from 'zod';

export const RULES_KEY = '_rules_';
export const MATCH_ROUTE_KEY = '_match_route_';
export const MATCH_DOMAIN_KEY = '_match_domain_';
export const MATCH_SERVICE_KEY = '_match_service_';

export const RULE_MATCH_KEYS = [MATCH_ROUTE_KEY, MATCH_DOMAIN_KEY, MATCH_SERVICE_KEY] as const;

export const RuleMatchKeysSchema = z.object({
  [MATCH_ROUTE_KEY]: z.array(z.string().min(1)).default([]),
  [MATCH_DOMAIN_KEY]: z.array(z.string().min(1)).default([]),
  [MATCH_SERVICE_KEY]: z.array(z.string().min(1)).default([]),
});

export type RuleMatchKeys = z.infer<typeof RuleMatchKeysSchema>;

export const HostMatchType = {
  EXACT: 'exact',
  PREFIX: 'prefix',
  SUFFIX: 'suffix',
} as const;

export type HostMatchType = (typeof HostMatchType)[keyof typeof HostMatchType];

export interface HostMatch {
  type: HostMatchType;
  host: string;
}

export interface ServiceMatch {
  /** Fully qualified service name */
  name: string;
  /** Port, or null to match any port */
  port: number | null;
}
