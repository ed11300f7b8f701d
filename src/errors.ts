export type TaggingErrorKind =
  | 'validation'
  | 'remote-write'
  | 'connectivity'
  | 'auth'
  | 'source-data'
  | 'config'
  | 'unexpected';

/**
 * Base error for everything the tagger reports to an operator.
 * `kind` lets the reporting boundary switch on the failure without instanceof chains.
 */
export class TaggingError extends Error {
  readonly kind: TaggingErrorKind;

  constructor(kind: TaggingErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TaggingError';
    this.kind = kind;
  }
}

/** Empty or malformed input on a mapping write. */
export class ValidationError extends TaggingError {
  constructor(message: string) {
    super('validation', message);
    this.name = 'ValidationError';
  }
}

/** A single product could not be saved back to the catalog. */
export class RemoteWriteError extends TaggingError {
  readonly productId: number;

  constructor(productId: number, message: string, options?: { cause?: unknown }) {
    super('remote-write', message, options);
    this.name = 'RemoteWriteError';
    this.productId = productId;
  }
}

export class ConnectivityError extends TaggingError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super('connectivity', message, options);
    this.name = 'ConnectivityError';
    this.status = options?.status;
  }
}

export class AuthError extends TaggingError {
  readonly status: number;

  constructor(status: number, message: string) {
    super('auth', message);
    this.name = 'AuthError';
    this.status = status;
  }
}

/** Mapping sheet missing, unreadable, or lacking required columns. */
export class SourceDataError extends TaggingError {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super('source-data', message, options);
    this.name = 'SourceDataError';
    this.filePath = filePath;
  }
}

export class ConfigError extends TaggingError {
  constructor(message: string) {
    super('config', message);
    this.name = 'ConfigError';
  }
}

export function toTaggingError(err: unknown): TaggingError {
  if (err instanceof TaggingError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new TaggingError('unexpected', message, { cause: err });
}
