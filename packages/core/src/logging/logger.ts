/**
 * Extension Logger
 *
 * - Structured JSON output via pino, one logger per extension instance
 * - Every record carries the extension name
 * - Credentials in log context are redacted before they reach the sink
 */

import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';
import { LoggingConfigSchema, type LoggingConfig, type LogLevel } from '@filterkit/shared';
import { sanitizeContext } from '../utils/sanitize.js';

export type { LogLevel };

export interface LogContext {
  extension?: string;
  exchangeId?: number;
  hook?: string;
  error?: string;
  [key: string]: unknown;
}

export interface ExtensionLogger {
  trace(msg: string, context?: LogContext): void;
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(context: LogContext): ExtensionLogger;
  level: LogLevel;
}

export interface CreateLoggerOptions {
  /** Fixed bindings added to every record */
  bindings?: LogContext;
  /** Write to this stream instead of the configured outputs */
  destination?: pino.DestinationStream;
}

const DEFAULT_LOGGING: LoggingConfig = LoggingConfigSchema.parse(undefined);

/**
 * pino rejects a custom level formatter when logging to several transport
 * targets, so labels are only applied to single-destination loggers.
 */
function createPinoOptions(config: LoggingConfig, labelLevels: boolean): LoggerOptions {
  return {
    level: config.level,
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      ...(labelLevels ? { level: (label: string) => ({ level: label }) } : {}),
      bindings: (bindings) => ({ pid: bindings.pid }),
    },
    redact: {
      paths: [
        'headers.authorization',
        'headers.cookie',
        'headers["proxy-authorization"]',
        '*.authorization',
        '*.cookie',
      ],
      censor: '[REDACTED]',
    },
  };
}

/**
 * JSON stdout needs no transport: pino(options) writes to fd 1 without a
 * worker thread. Pretty output and files go through pino transports.
 */
function createTransport(
  config: LoggingConfig
): pino.TransportMultiOptions | pino.TransportSingleOptions | undefined {
  const targets: pino.TransportTargetOptions[] = [];

  for (const output of config.output) {
    if (output.type === 'stdout') {
      if (output.format === 'pretty') {
        targets.push({
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
          level: config.level,
        });
      }
    } else {
      targets.push({
        target: 'pino/file',
        options: {
          destination: output.path,
          mkdir: true,
        },
        level: config.level,
      });
    }
  }

  if (targets.length === 0) {
    return undefined;
  }

  if (targets.length === 1) {
    return targets[0];
  }

  return { targets };
}

function isLogLevel(value: string): value is LogLevel {
  return ['trace', 'debug', 'info', 'warn', 'error', 'fatal'].includes(value);
}

class ExtensionLoggerImpl implements ExtensionLogger {
  private readonly pino: PinoLogger;
  private readonly defaultContext: LogContext;

  constructor(pino: PinoLogger, defaultContext: LogContext = {}) {
    this.pino = pino;
    this.defaultContext = defaultContext;
  }

  get level(): LogLevel {
    const level = this.pino.level;
    return isLogLevel(level) ? level : 'info';
  }

  private withContext(context?: LogContext): Record<string, unknown> {
    return sanitizeContext({ ...this.defaultContext, ...context });
  }

  trace(msg: string, context?: LogContext): void {
    this.pino.trace(this.withContext(context), msg);
  }

  debug(msg: string, context?: LogContext): void {
    this.pino.debug(this.withContext(context), msg);
  }

  info(msg: string, context?: LogContext): void {
    this.pino.info(this.withContext(context), msg);
  }

  warn(msg: string, context?: LogContext): void {
    this.pino.warn(this.withContext(context), msg);
  }

  error(msg: string, context?: LogContext): void {
    this.pino.error(this.withContext(context), msg);
  }

  fatal(msg: string, context?: LogContext): void {
    this.pino.fatal(this.withContext(context), msg);
  }

  child(context: LogContext): ExtensionLogger {
    return new ExtensionLoggerImpl(this.pino, { ...this.defaultContext, ...context });
  }
}

export function createLogger(
  config: LoggingConfig = DEFAULT_LOGGING,
  options: CreateLoggerOptions = {}
): ExtensionLogger {
  let pinoLogger: PinoLogger;
  if (options.destination) {
    pinoLogger = pino(createPinoOptions(config, true), options.destination);
  } else {
    const transport = createTransport(config);
    const pinoOptions = createPinoOptions(config, !(transport && 'targets' in transport));
    pinoLogger = transport ? pino(pinoOptions, pino.transport(transport)) : pino(pinoOptions);
  }

  return new ExtensionLoggerImpl(pinoLogger, options.bindings);
}

/**
 * Default logger for an extension: every record is stamped with its name.
 */
export function createExtensionLogger(
  extension: string,
  config: LoggingConfig = DEFAULT_LOGGING,
  options: Omit<CreateLoggerOptions, 'bindings'> = {}
): ExtensionLogger {
  return createLogger(config, { ...options, bindings: { extension } });
}

/**
 * Create a no-op logger that silently discards all messages.
 */
export function createNoopLogger(): ExtensionLogger {
  const noop: ExtensionLogger = {
    trace: () => {},
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
    fatal: () => {},
    child: () => noop,
    level: 'info',
  };
  return noop;
}
