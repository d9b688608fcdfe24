/**
 * Typed errors raised by the data layer. The HTTP layer decides what
 * each of them means for a client.
 */

export class DatabaseError extends Error {
  readonly details: Record<string, unknown> | undefined;

  constructor(
    public readonly errorCode: string,
    message: string,
    options?: ErrorOptions & { details?: Record<string, unknown> },
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.details = options?.details;
  }
}

export class NotFoundError extends DatabaseError {
  constructor(message = "Resource not found", details?: Record<string, unknown>) {
    super("NOT_FOUND", message, { details });
  }
}

/** A unique or foreign key constraint rejected the change. */
export class IntegrityError extends DatabaseError {
  constructor(message = "Integrity constraint violated", options?: ErrorOptions) {
    super("INTEGRITY", message, options);
  }
}

/** The requesting user's role does not allow the change. */
export class PermissionDeniedError extends DatabaseError {
  constructor(message = "Permission denied") {
    super("PERMISSION_DENIED", message);
  }
}

/** A filter or field name that the resource does not have. */
export class FilterNotValidError extends DatabaseError {
  constructor(message = "Filter not valid") {
    super("FILTER_NOT_VALID", message);
  }
}
