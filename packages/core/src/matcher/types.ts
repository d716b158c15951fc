/**
 * Rule matcher contract.
 *
 * The runtime hands the matcher the raw configuration and closures that run
 * the extension's parsers; the matcher returns an immutable rule set that
 * resolves request metadata to a configuration.
 */

import type { JsonObject, JsonValue, RequestMetadata } from '@filterkit/shared';

export type GlobalConfigParser<C> = (json: JsonObject) => C;

export type RuleConfigParser<C> = (json: JsonObject, global: Readonly<C> | undefined) => C;

export interface RuleSet<C> {
  /** The configuration for this request, or null when no rule applies */
  resolve(metadata: RequestMetadata): C | null;
}

export interface RuleSetBuilder<C> {
  /**
   * Build a rule set. Throws when the configuration cannot be turned into
   * rules; nothing is retained from a failed build.
   */
  build(
    raw: JsonValue,
    parseGlobal: GlobalConfigParser<C>,
    parseRule?: RuleConfigParser<C>
  ): RuleSet<C>;
}
