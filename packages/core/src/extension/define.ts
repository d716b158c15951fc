/**
 * Extension registration.
 *
 * `defineExtension` validates the hook record once, at load time. A missing
 * config parser is only accepted for extensions whose configuration type is
 * empty; for any other configuration type the call does not type-check.
 * Without an explicit logger, logging follows the runtime configuration
 * (FILTERKIT_CONFIG, FILTERKIT_LOG_LEVEL, FILTERKIT_LOG_FORMAT).
 */

import { loadRuntimeConfig } from '../config/loader.js';
import type { ExtensionLogger } from '../logging/logger.js';
import { createExtensionLogger } from '../logging/logger.js';
import { RuleMatcher } from '../matcher/rule-matcher.js';
import type { RuleSetBuilder } from '../matcher/types.js';
import { ExtensionRegistrationError } from '../utils/errors.js';
import type {
  ConfiglessExtensionOptions,
  EmptyConfig,
  ExtensionCommonOptions,
  ExtensionHooks,
  ExtensionOptions,
  ParseConfigFunc,
  ParseOverrideConfigFunc,
} from './types.js';

export const HOOK_NAMES = [
  'onRequestHeaders',
  'onRequestBody',
  'onStreamingRequestBody',
  'onResponseHeaders',
  'onResponseBody',
  'onStreamingResponseBody',
  'onStreamDone',
] as const satisfies readonly (keyof ExtensionHooks<unknown>)[];

const parseEmptyConfig: ParseConfigFunc<EmptyConfig> = () => ({});

export class ExtensionDefinition<C> {
  readonly name: string;
  readonly logger: ExtensionLogger;
  readonly hooks: Readonly<ExtensionHooks<C>>;
  readonly parseConfig: ParseConfigFunc<C>;
  readonly parseOverrideConfig: ParseOverrideConfigFunc<C> | undefined;
  /** False when the no-op parser stands in for a missing one */
  readonly hasCustomConfig: boolean;
  private readonly ruleMatcherFactory: () => RuleSetBuilder<C>;

  constructor(
    name: string,
    options: ExtensionCommonOptions<C> & { parseOverrideConfig?: ParseOverrideConfigFunc<C> },
    logger: ExtensionLogger,
    parseConfig: ParseConfigFunc<C>,
    hasCustomConfig: boolean
  ) {
    this.name = name;
    this.logger = logger;
    this.hooks = Object.freeze({
      onRequestHeaders: options.onRequestHeaders,
      onRequestBody: options.onRequestBody,
      onStreamingRequestBody: options.onStreamingRequestBody,
      onResponseHeaders: options.onResponseHeaders,
      onResponseBody: options.onResponseBody,
      onStreamingResponseBody: options.onStreamingResponseBody,
      onStreamDone: options.onStreamDone,
    });
    this.parseConfig = parseConfig;
    this.parseOverrideConfig = options.parseOverrideConfig;
    this.hasCustomConfig = hasCustomConfig;
    this.ruleMatcherFactory = options.ruleMatcher ?? (() => new RuleMatcher<C>());
  }

  createRuleMatcher(): RuleSetBuilder<C> {
    return this.ruleMatcherFactory();
  }
}

function fail(name: string, logger: ExtensionLogger, message: string): never {
  const error = new ExtensionRegistrationError(name, message);
  logger.fatal(error.message);
  throw error;
}

export function defineExtension(
  name: string,
  options?: ConfiglessExtensionOptions
): ExtensionDefinition<EmptyConfig>;
export function defineExtension<C>(name: string, options: ExtensionOptions<C>): ExtensionDefinition<C>;
export function defineExtension<C>(
  name: string,
  options: ExtensionOptions<C> | ConfiglessExtensionOptions = {}
): ExtensionDefinition<C> | ExtensionDefinition<EmptyConfig> {
  const logger = options.logger ?? createExtensionLogger(name, loadRuntimeConfig().logging);

  if (name.trim() === '') {
    fail(name, logger, 'extension name must not be empty');
  }
  for (const hook of HOOK_NAMES) {
    const handler: unknown = options[hook];
    if (handler !== undefined && typeof handler !== 'function') {
      fail(name, logger, `${hook} must be a function`);
    }
  }
  if (options.parseConfig === undefined && options.parseOverrideConfig !== undefined) {
    fail(name, logger, 'parseOverrideConfig requires parseConfig');
  }

  if (options.parseConfig !== undefined) {
    return new ExtensionDefinition<C>(name, options, logger, options.parseConfig, true);
  }
  return new ExtensionDefinition<EmptyConfig>(name, options, logger, parseEmptyConfig, false);
}
