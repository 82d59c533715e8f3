/**
 * Error hierarchy for object store operations.
 *
 * Every failure surfaced by the inspector or the lister is one of the
 * subclasses below, so callers can branch on `instanceof` or on `code`.
 */

export type ObjectStoreErrorCode =
  | 'InvalidReference'
  | 'InvalidPattern'
  | 'NotFound'
  | 'TransportError';

/**
 * Base object store error.
 */
export class ObjectStoreError extends Error {
  public readonly code: ObjectStoreErrorCode;

  constructor(message: string, code: ObjectStoreErrorCode, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ObjectStoreError';
    this.code = code;
    Object.setPrototypeOf(this, ObjectStoreError.prototype);
  }
}

/**
 * The URI does not name a single object (bad scheme, no bucket, no key).
 */
export class InvalidReferenceError extends ObjectStoreError {
  public readonly uri: string;

  constructor(message: string, uri: string) {
    super(`${message}: ${uri}`, 'InvalidReference');
    this.name = 'InvalidReferenceError';
    this.uri = uri;
    Object.setPrototypeOf(this, InvalidReferenceError.prototype);
  }
}

/**
 * The glob pattern is empty or cannot be compiled.
 */
export class InvalidPatternError extends ObjectStoreError {
  public readonly pattern: string;

  constructor(message: string, pattern: string) {
    super(`${message}: ${pattern}`, 'InvalidPattern');
    this.name = 'InvalidPatternError';
    this.pattern = pattern;
    Object.setPrototypeOf(this, InvalidPatternError.prototype);
  }
}

export class NotFoundError extends ObjectStoreError {
  public readonly uri: string;

  constructor(uri: string) {
    super(`Object ${uri} does not exist`, 'NotFound');
    this.name = 'NotFoundError';
    this.uri = uri;
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * Network or storage backend failure. Not retried.
 */
export class TransportError extends ObjectStoreError {
  /** Name of the underlying SDK error, e.g. `AccessDenied` */
  public readonly backendCode?: string;

  /** HTTP status reported by the backend, when there was a response */
  public readonly httpStatusCode?: number;

  constructor(
    operation: string,
    cause: unknown,
    details: { backendCode?: string; httpStatusCode?: number } = {}
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`S3 ${operation} failed: ${reason}`, 'TransportError', cause);
    this.name = 'TransportError';
    this.backendCode = details.backendCode;
    this.httpStatusCode = details.httpStatusCode;
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}
