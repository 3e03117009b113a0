/**
 * Error taxonomy shared by the resolver, batcher, client and dispatcher.
 */

export const ErrorKinds = {
  CONFIGURATION: 'ConfigurationError',
  VALIDATION: 'ValidationError',
  TRANSIENT: 'TransientDeliveryError',
  DELIVERY_FAILED: 'DeliveryFailed',
  AUTH: 'AuthError',
  CAPABILITY_UNAVAILABLE: 'CapabilityUnavailable',
} as const;

export type PurgeErrorKind = (typeof ErrorKinds)[keyof typeof ErrorKinds];

export class PurgeError extends Error {
  constructor(
    public readonly kind: PurgeErrorKind,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'PurgeError';
  }
}

/** Missing or invalid credential, zone or setting. Never retried. */
export class ConfigurationError extends PurgeError {
  constructor(message: string, details?: unknown) {
    super(ErrorKinds.CONFIGURATION, message, details);
    this.name = 'ConfigurationError';
  }
}

/** Rejected before any network call. */
export class ValidationError extends PurgeError {
  constructor(message: string, details?: unknown) {
    super(ErrorKinds.VALIDATION, message, details);
    this.name = 'ValidationError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
