/**
 * Runtime Error Types
 *
 * Every error carries a stable `code` that callers switch on.
 */

/**
 * Extracts a readable message from an unknown error value.
 * Use in catch blocks: `logger.warn('...', { error: toErrorMessage(err) })`
 */
export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}

export class FilterKitError extends Error {
  readonly code: string;

  constructor(
    message: string,
    options: {
      code: string;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options.cause });
    this.name = 'FilterKitError';
    this.code = options.code;
  }
}

export class ExtensionRegistrationError extends FilterKitError {
  readonly extension: string;

  constructor(extension: string, message: string) {
    super(`Extension "${extension}": ${message}`, {
      code: 'REGISTRATION',
    });
    this.name = 'ExtensionRegistrationError';
    this.extension = extension;
  }
}

export type PluginStartErrorCode =
  | 'CONFIG_READ'
  | 'CONFIG_INVALID'
  | 'RULES_INVALID'
  | 'TICK_ARM';

export class PluginStartError extends FilterKitError {
  declare readonly code: PluginStartErrorCode;

  constructor(code: PluginStartErrorCode, message: string, cause?: unknown) {
    super(message, { code, cause });
    this.name = 'PluginStartError';
  }
}

export type HostCallErrorCode = 'NOT_FOUND' | 'BAD_ARGUMENT' | 'INTERNAL';

/** Thrown by host implementations when a call across the host boundary fails. */
export class HostCallError extends FilterKitError {
  declare readonly code: HostCallErrorCode;
  readonly call: string;

  constructor(call: string, code: HostCallErrorCode, cause?: unknown) {
    super(`Host call ${call} failed: ${code}`, { code, cause });
    this.name = 'HostCallError';
    this.call = call;
  }
}

export function isNotFound(err: unknown): boolean {
  return err instanceof HostCallError && err.code === 'NOT_FOUND';
}

export type AttributeExportErrorCode =
  | 'PROPERTY_READ'
  | 'PROPERTY_WRITE'
  | 'LOG_PARSE'
  | 'TRACE_VALUE_EMPTY';

export class AttributeExportError extends FilterKitError {
  declare readonly code: AttributeExportErrorCode;
  readonly property: string;

  constructor(code: AttributeExportErrorCode, property: string, message: string, cause?: unknown) {
    super(message, { code, cause });
    this.name = 'AttributeExportError';
    this.property = property;
  }
}
