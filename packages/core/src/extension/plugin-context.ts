/**
 * PluginContext: one per extension instance.
 *
 * `start()` reads the configuration from the host, builds the rule set and
 * arms the tick timer. Either all of it takes effect or none of it does.
 */

import {
  JsonValueSchema,
  StartStatus,
  type JsonValue,
  type RequestMetadata,
} from '@filterkit/shared';
import type { ExtensionLogger } from '../logging/logger.js';
import type { PluginHost } from '../host/types.js';
import { decodeText } from '../host/properties.js';
import type { RuleSet } from '../matcher/types.js';
import { TICK_GRANULARITY_MS, TickRegistry, TickScheduler } from '../tick/scheduler.js';
import {
  PluginStartError,
  isNotFound,
  toErrorMessage,
  type PluginStartErrorCode,
} from '../utils/errors.js';
import type { ExtensionDefinition } from './define.js';
import { ExchangeContext } from './exchange-context.js';
import type { ExtensionHooks, ParseContext } from './types.js';

const START_FAILURE_LEVEL: Record<PluginStartErrorCode, 'fatal' | 'error' | 'warn'> = {
  CONFIG_READ: 'fatal',
  CONFIG_INVALID: 'warn',
  RULES_INVALID: 'warn',
  TICK_ARM: 'error',
};

export class PluginContext<C> {
  readonly definition: ExtensionDefinition<C>;
  private readonly host: PluginHost;
  private ruleSet: RuleSet<C> | null = null;
  private scheduler: TickScheduler | null = null;

  constructor(definition: ExtensionDefinition<C>, host: PluginHost) {
    this.definition = definition;
    this.host = host;
  }

  get logger(): ExtensionLogger {
    return this.definition.logger;
  }

  get hooks(): Readonly<ExtensionHooks<C>> {
    return this.definition.hooks;
  }

  get isStarted(): boolean {
    return this.ruleSet !== null;
  }

  get tickEntryCount(): number {
    return this.scheduler?.size ?? 0;
  }

  start(): StartStatus {
    try {
      const { ruleSet, scheduler } = this.prepare();
      this.ruleSet = ruleSet;
      this.scheduler = scheduler;
      this.logger.debug('Extension started', { tickEntries: scheduler?.size ?? 0 });
      return StartStatus.OK;
    } catch (err) {
      this.ruleSet = null;
      this.scheduler = null;
      if (err instanceof PluginStartError) {
        this.logger[START_FAILURE_LEVEL[err.code]](err.message, { code: err.code });
      } else {
        this.logger.error('Extension start failed', { error: toErrorMessage(err) });
      }
      return StartStatus.FAILED;
    }
  }

  onTick(): void {
    this.scheduler?.tick(() => this.host.now());
  }

  resolve(metadata: RequestMetadata): C | null {
    return this.ruleSet?.resolve(metadata) ?? null;
  }

  newExchange(contextId: number): ExchangeContext<C> {
    return new ExchangeContext(this, contextId, this.host.exchange(contextId));
  }

  private prepare(): { ruleSet: RuleSet<C>; scheduler: TickScheduler | null } {
    const raw = this.readConfiguration();

    // Parsers register tick actions here; nothing outlives a failed start
    const ticks = new TickRegistry(this.logger);
    const ctx: ParseContext = { logger: this.logger, ticks };
    const { parseConfig, parseOverrideConfig } = this.definition;

    let ruleSet: RuleSet<C>;
    try {
      ruleSet = this.definition.createRuleMatcher().build(
        raw,
        (json) => parseConfig(json, ctx),
        parseOverrideConfig ? (json, global) => parseOverrideConfig(json, global, ctx) : undefined
      );
    } catch (err) {
      throw new PluginStartError('RULES_INVALID', `parse rule config failed: ${toErrorMessage(err)}`, err);
    }

    if (ticks.size === 0) {
      return { ruleSet, scheduler: null };
    }

    const scheduler = new TickScheduler(ticks.drain());
    try {
      this.host.setTickPeriod(TICK_GRANULARITY_MS);
    } catch (err) {
      throw new PluginStartError(
        'TICK_ARM',
        `setting the tick period failed, tick actions will not run: ${toErrorMessage(err)}`,
        err
      );
    }
    return { ruleSet, scheduler };
  }

  private readConfiguration(): JsonValue {
    let data: Uint8Array | undefined;
    try {
      data = this.host.getPluginConfiguration();
    } catch (err) {
      if (!isNotFound(err)) {
        throw new PluginStartError('CONFIG_READ', `error reading plugin configuration: ${toErrorMessage(err)}`, err);
      }
    }

    if (!data || data.length === 0) {
      if (this.definition.hasCustomConfig) {
        this.logger.warn('config is empty, but a config parser is registered');
      }
      return {};
    }

    const text = decodeText(data);
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new PluginStartError('CONFIG_INVALID', `the plugin configuration is not valid JSON: ${text}`, err);
    }
    return JsonValueSchema.parse(parsed);
  }
}
