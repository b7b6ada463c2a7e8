/**
 * Router Errors
 *
 * Each failure kind the pipeline can surface carries a stable code so the
 * HTTP layer and logs can tell them apart.
 */

export type RouterErrorCode =
  | 'CONFIG_INVALID'
  | 'UPSTREAM_UNAVAILABLE'
  | 'MALFORMED_OUTPUT'
  | 'PERSISTENCE_ERROR'
  | 'NOT_FOUND';

export class RouterError extends Error {
  constructor(
    public readonly code: RouterErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RouterError';
  }

  toJSON(): { code: RouterErrorCode; message: string } {
    return { code: this.code, message: this.message };
  }
}

export class ConfigError extends RouterError {
  constructor(public readonly issues: string[]) {
    super('CONFIG_INVALID', `Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/** Classifier unreachable, timed out or failed */
export class UpstreamUnavailableError extends RouterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('UPSTREAM_UNAVAILABLE', message, options);
    this.name = 'UpstreamUnavailableError';
  }
}

/** Classifier text contained no parseable JSON object */
export class MalformedOutputError extends RouterError {
  constructor(message: string) {
    super('MALFORMED_OUTPUT', message);
    this.name = 'MalformedOutputError';
  }
}

/** Store rejected a create */
export class PersistenceError extends RouterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PERSISTENCE_ERROR', message, options);
    this.name = 'PersistenceError';
  }
}

export class NotFoundError extends RouterError {
  constructor(message: string) {
    super('NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
