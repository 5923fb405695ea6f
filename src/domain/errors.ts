/**
 * Error taxonomy shared by the storage adapters, the lifecycle use cases
 * and the HTTP layer. Each error carries a stable `code` that the HTTP
 * error handler maps to a status.
 */

export type EventErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'ACTIVE_EVENT_EXISTS'
  | 'STORAGE_ERROR';

export abstract class EventServiceError extends Error {
  abstract readonly code: EventErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export interface ValidationIssue {
  readonly path: readonly (string | number)[];
  readonly message: string;
}

/** Malformed request input. Never retried. */
export class ValidationError extends EventServiceError {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    message: string,
    readonly issues: readonly ValidationIssue[] = [],
  ) {
    super(message);
  }
}

/** Finish requested for a type with no active event. */
export class NotFoundError extends EventServiceError {
  readonly code = 'NOT_FOUND';

  constructor(readonly eventType: string) {
    super(`No active event of type '${eventType}'`);
  }
}

/**
 * Raised by `create` when another active event of the same type was
 * inserted concurrently (partial unique index on active rows).
 */
export class ActiveEventConflictError extends EventServiceError {
  readonly code = 'ACTIVE_EVENT_EXISTS';

  constructor(readonly eventType: string) {
    super(`An active event of type '${eventType}' already exists`);
  }
}

/** Any store failure: connectivity, cancellation, timeout, unexpected row shape. */
export class StorageError extends EventServiceError {
  readonly code = 'STORAGE_ERROR';
}
