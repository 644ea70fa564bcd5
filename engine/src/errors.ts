/**
 * Typed failures surfaced by the engine. Callers branch on `kind`; turning a
 * kind into a user-facing message is the UI's job.
 */

export type EngineErrorKind = 'not_found' | 'conflict' | 'auth_required' | 'validation' | 'transient';

export abstract class EngineError extends Error {
  abstract readonly kind: EngineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Unknown card or word id. Not retried.
export class NotFoundError extends EngineError {
  readonly kind = 'not_found';

  constructor(readonly entity: 'card' | 'word', readonly id: string) {
    super(`${entity} not found: ${id}`);
  }
}

// Another mutation on the same record (or another sync) is in flight.
// Reload and retry.
export class ConflictError extends EngineError {
  readonly kind = 'conflict';
}

// Remote-touching call without a valid session
export class AuthRequiredError extends EngineError {
  readonly kind = 'auth_required';

  constructor(message = 'Authentication required') {
    super(message);
  }
}

// Malformed input; nothing was applied
export class ValidationError extends EngineError {
  readonly kind = 'validation';

  constructor(message: string, readonly issues: string[] = []) {
    super(message);
  }
}

// Network or storage failure; safe to retry the whole operation
export class TransientError extends EngineError {
  readonly kind = 'transient';
}

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}
