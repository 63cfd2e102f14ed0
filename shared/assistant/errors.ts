/**
 * Raised when a caller passes values that break a documented contract
 * (future timestamps, confidences outside [0, 1], non-finite numbers).
 * These indicate a bug at the call site and are never recovered locally.
 */
export class ContractViolationError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`${field}: ${message}`);
    this.name = 'ContractViolationError';
    this.field = field;
  }
}

export type UnavailableReason = 'timeout' | 'network' | 'invalid_response' | 'unavailable' | 'error';

/** Internal signal that the remote classifier could not answer. Never escapes the classifier. */
export class ClassifierUnavailableError extends Error {
  readonly reason: UnavailableReason;

  constructor(reason: UnavailableReason, message?: string) {
    super(message ?? `classifier unavailable (${reason})`);
    this.name = 'ClassifierUnavailableError';
    this.reason = reason;
  }
}

export function requireContract(condition: boolean, field: string, message: string): asserts condition {
  if (!condition) {
    throw new ContractViolationError(field, message);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'unknown error';
}
