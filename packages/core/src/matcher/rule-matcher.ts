/**
 * RuleMatcher: the gateway's `_rules_` configuration format.
 *
 * Rules are evaluated in order; within a rule, route names are checked
 * first, then domains, then services. The first matching rule wins. When
 * no rule matches, the global configuration applies if one was given.
 */

import {
  RULES_KEY,
  RULE_MATCH_KEYS,
  HostMatchType,
  RuleMatchKeysSchema,
  isJsonObject,
  type HostMatch,
  type JsonObject,
  type JsonValue,
  type RequestMetadata,
  type ServiceMatch,
} from '@filterkit/shared';
import type { GlobalConfigParser, RuleConfigParser, RuleSet, RuleSetBuilder } from './types.js';
import { toErrorMessage } from '../utils/errors.js';

interface Rule<C> {
  config: C;
  routes: ReadonlySet<string>;
  hosts: readonly HostMatch[];
  services: readonly ServiceMatch[];
}

export function parseHostMatch(pattern: string): HostMatch {
  if (pattern === '*') {
    return { type: HostMatchType.PREFIX, host: '' };
  }
  if (pattern.startsWith('*')) {
    return { type: HostMatchType.SUFFIX, host: pattern.slice(1) };
  }
  if (pattern.endsWith('*')) {
    return { type: HostMatchType.PREFIX, host: pattern.slice(0, -1) };
  }
  return { type: HostMatchType.EXACT, host: pattern };
}

export function parseServiceMatch(entry: string): ServiceMatch {
  const colon = entry.lastIndexOf(':');
  if (colon > 0) {
    const port = Number(entry.slice(colon + 1));
    if (!Number.isInteger(port) || port <= 0 || port > 65535) {
      throw new Error(`invalid port in service match "${entry}"`);
    }
    return { name: entry.slice(0, colon), port };
  }
  return { name: entry, port: null };
}

/** `example.com:8080` → `example.com`, `[::1]:80` → `::1` */
export function stripPort(host: string): string {
  const bracketed = /^\[([^\]]+)\](?::\d+)?$/.exec(host);
  if (bracketed) {
    return bracketed[1];
  }
  const colon = host.lastIndexOf(':');
  if (colon > 0 && host.indexOf(':') === colon && /^\d+$/.test(host.slice(colon + 1))) {
    return host.slice(0, colon);
  }
  return host;
}

function hostMatches(matches: readonly HostMatch[], requestHost: string): boolean {
  const host = stripPort(requestHost);
  return matches.some((match) => {
    switch (match.type) {
      case HostMatchType.EXACT:
        return host === match.host;
      case HostMatchType.PREFIX:
        return host.startsWith(match.host);
      case HostMatchType.SUFFIX:
        return host.endsWith(match.host);
    }
  });
}

/** Cluster names look like `outbound|80||echo.default.svc.cluster.local` */
function serviceMatches(matches: readonly ServiceMatch[], clusterName: string): boolean {
  const parts = clusterName.split('|');
  if (parts.length !== 4) {
    return false;
  }
  const port = Number(parts[1]);
  const fqdn = parts[3];
  return matches.some((match) => match.name === fqdn && (match.port === null || match.port === port));
}

function withoutKeys(json: JsonObject, keys: readonly string[]): JsonObject {
  const result: JsonObject = {};
  for (const [key, value] of Object.entries(json)) {
    if (!keys.includes(key)) {
      result[key] = value;
    }
  }
  return result;
}

class MatchedRuleSet<C> implements RuleSet<C> {
  private readonly rules: readonly Rule<C>[];
  private readonly globalConfig: C | undefined;

  constructor(rules: readonly Rule<C>[], globalConfig: C | undefined) {
    this.rules = rules;
    this.globalConfig = globalConfig;
  }

  resolve(metadata: RequestMetadata): C | null {
    for (const rule of this.rules) {
      if (metadata.routeName !== '' && rule.routes.has(metadata.routeName)) {
        return rule.config;
      }
      if (rule.hosts.length > 0 && hostMatches(rule.hosts, metadata.host)) {
        return rule.config;
      }
      if (rule.services.length > 0 && serviceMatches(rule.services, metadata.clusterName)) {
        return rule.config;
      }
    }
    return this.globalConfig ?? null;
  }
}

export class RuleMatcher<C> implements RuleSetBuilder<C> {
  build(
    raw: JsonValue,
    parseGlobal: GlobalConfigParser<C>,
    parseRule?: RuleConfigParser<C>
  ): RuleSet<C> {
    if (!isJsonObject(raw)) {
      throw new Error('configuration must be a JSON object');
    }

    // An empty configuration enables the extension for all traffic
    if (Object.keys(raw).length === 0) {
      return new MatchedRuleSet<C>([], parseGlobal({}));
    }

    let ruleEntries: JsonValue[] = [];
    const rulesJson = raw[RULES_KEY];
    if (rulesJson !== undefined) {
      if (!Array.isArray(rulesJson)) {
        throw new Error(`${RULES_KEY} must be an array`);
      }
      ruleEntries = rulesJson;
    }

    const globalJson = withoutKeys(raw, [RULES_KEY]);
    let globalConfig: C | undefined;
    let globalError: string | undefined;
    if (Object.keys(globalJson).length > 0) {
      try {
        globalConfig = parseGlobal(globalJson);
      } catch (err) {
        globalError = toErrorMessage(err);
      }
    }

    if (ruleEntries.length === 0) {
      if (globalConfig !== undefined) {
        return new MatchedRuleSet<C>([], globalConfig);
      }
      throw new Error(`no valid rules; global config parse error: ${globalError ?? 'none'}`);
    }

    const rules = ruleEntries.map((entry, index) =>
      this.buildRule(entry, index, globalConfig, parseGlobal, parseRule)
    );
    return new MatchedRuleSet(rules, globalConfig);
  }

  private buildRule(
    entry: JsonValue,
    index: number,
    globalConfig: C | undefined,
    parseGlobal: GlobalConfigParser<C>,
    parseRule?: RuleConfigParser<C>
  ): Rule<C> {
    if (!isJsonObject(entry)) {
      throw new Error(`${RULES_KEY}[${index}] must be an object`);
    }

    const keys = RuleMatchKeysSchema.safeParse(entry);
    if (!keys.success) {
      throw new Error(`${RULES_KEY}[${index}]: ${keys.error.message}`);
    }
    const { _match_route_: routes, _match_domain_: domains, _match_service_: services } = keys.data;
    if (routes.length === 0 && domains.length === 0 && services.length === 0) {
      throw new Error(
        `${RULES_KEY}[${index}]: at least one of ${RULE_MATCH_KEYS.join(', ')} must be present`
      );
    }

    const json = withoutKeys(entry, RULE_MATCH_KEYS);
    const config = parseRule ? parseRule(json, globalConfig) : parseGlobal(json);

    return {
      config,
      routes: new Set(routes),
      hosts: domains.map(parseHostMatch),
      services: services.map(parseServiceMatch),
    };
  }
}
