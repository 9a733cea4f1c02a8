export const ErrorCodes = {
  VALIDATION_FAILED: "VALIDATION_FAILED",
  PROPERTY_NOT_FOUND: "PROPERTY_NOT_FOUND",
  CONCURRENT_UPDATE: "CONCURRENT_UPDATE",
  RECONCILE_TIMEOUT: "RECONCILE_TIMEOUT",
  DECRYPTION_FAILED: "DECRYPTION_FAILED",
  STORE_UNAVAILABLE: "STORE_UNAVAILABLE",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base for every record-level or infrastructure failure of the property
 * state core. Field-level rejections are outcome entries, never errors.
 */
export class PropertyStateError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "PropertyStateError";
  }
}

export class ValidationError extends PropertyStateError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, ErrorCodes.VALIDATION_FAILED, details);
    this.name = "ValidationError";
  }
}

export class PropertyNotFoundError extends PropertyStateError {
  constructor(propertyId: string) {
    super(`Property ${propertyId} not found`, ErrorCodes.PROPERTY_NOT_FOUND, {
      propertyId,
    });
    this.name = "PropertyNotFoundError";
  }
}

export class ConcurrentUpdateError extends PropertyStateError {
  constructor(propertyKey: string, retries: number) {
    super(
      `Gave up on ${propertyKey} after ${retries} conflicting retries`,
      ErrorCodes.CONCURRENT_UPDATE,
      { propertyKey, retries }
    );
    this.name = "ConcurrentUpdateError";
  }
}

export class ReconcileTimeoutError extends PropertyStateError {
  constructor(propertyKey: string, timeoutMs: number, retries: number) {
    super(
      `Reconcile of ${propertyKey} exceeded ${timeoutMs}ms`,
      ErrorCodes.RECONCILE_TIMEOUT,
      { propertyKey, timeoutMs, retries }
    );
    this.name = "ReconcileTimeoutError";
  }
}

export class DecryptionError extends PropertyStateError {
  constructor(reason: string) {
    super(`Unable to decrypt field: ${reason}`, ErrorCodes.DECRYPTION_FAILED, {
      reason,
    });
    this.name = "DecryptionError";
  }
}

export class StoreUnavailableError extends PropertyStateError {
  constructor(operation: string, cause: unknown) {
    super(
      `Property store unavailable during ${operation}`,
      ErrorCodes.STORE_UNAVAILABLE,
      { operation },
      { cause }
    );
    this.name = "StoreUnavailableError";
  }
}

export function isPropertyStateError(error: unknown): error is PropertyStateError {
  return error instanceof PropertyStateError;
}
