export type ErrorCode =
  | 'parse_failure'
  | 'node_skipped'
  | 'store_connection'
  | 'store_operation'
  | 'rate_limited'
  | 'provider_unavailable'
  | 'invalid_input'
  | 'configuration';

export class CodeRecallError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The whole file could not be parsed. Fatal for the file, not for the run. */
export class ParseFailure extends CodeRecallError {
  constructor(readonly filePath: string, readonly reason: string) {
    super('parse_failure', `Failed to parse ${filePath}: ${reason}`);
  }
}

/** A malformed sub-node was skipped while the rest of the file was extracted. */
export class NodeSkipped extends CodeRecallError {
  constructor(readonly filePath: string, readonly line: number, readonly nodeType: string, readonly reason: string) {
    super('node_skipped', `Skipped ${nodeType} at ${filePath}:${line}: ${reason}`);
  }
}

export class StoreConnectionError extends CodeRecallError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('store_connection', message, options);
  }
}

export class StoreOperationError extends CodeRecallError {
  constructor(readonly key: string, message: string, options?: { cause?: unknown }) {
    super('store_operation', `${message} (key ${key})`, options);
  }
}

export abstract class ProviderError extends CodeRecallError {
  abstract readonly providerId: string;
}

export class RateLimitedError extends ProviderError {
  constructor(readonly providerId: string, readonly retryAfterMs?: number) {
    super('rate_limited', `${providerId} rate limit reached`);
  }
}

export class ProviderUnavailableError extends ProviderError {
  constructor(readonly providerId: string, message: string, options?: { cause?: unknown }) {
    super('provider_unavailable', `${providerId} unavailable: ${message}`, options);
  }
}

export class InvalidInputError extends ProviderError {
  /**
   * `itemIndex` is set when the provider names the rejected item, which lets
   * the caller drop just that item and keep the rest of the batch.
   */
  constructor(readonly providerId: string, message: string, readonly itemIndex?: number) {
    super('invalid_input', `${providerId} rejected input: ${message}`);
  }
}

export class ConfigurationError extends CodeRecallError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('configuration', message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
