/**
 * Errors raised by endpoint handlers, and the statuses the dispatcher
 * turns them into.
 */

export class RestApiError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/** An endpoint or group was declared with an invalid shape. */
export class EndpointRegistrationError extends RestApiError {}

/** A value reached the JSON encoder that it does not know how to encode. */
export class SerializationError extends RestApiError {}

export type ResourceErrorKind =
  | "invalid-input"
  | "unauthorized"
  | "forbidden"
  | "not-found"
  | "integrity"
  | "server-error";

export abstract class ResourceError extends RestApiError {
  abstract readonly kind: ResourceErrorKind;
}

// 400

export class InvalidInputError extends ResourceError {
  readonly kind = "invalid-input";

  constructor(message = "Invalid input", options?: ErrorOptions) {
    super(message, options);
  }
}

// 401

export class ResourceUnauthorizedError extends ResourceError {
  readonly kind = "unauthorized";

  constructor(message = "Unauthorized", options?: ErrorOptions) {
    super(message, options);
  }
}

// 403

export class ResourceForbiddenError extends ResourceError {
  readonly kind = "forbidden";

  constructor(message = "Forbidden", options?: ErrorOptions) {
    super(message, options);
  }
}

// 404

export class ResourceNotFoundError extends ResourceError {
  readonly kind = "not-found";

  constructor(message = "Resource not found", options?: ErrorOptions) {
    super(message, options);
  }
}

// 500

export class ResourceIntegrityError extends ResourceError {
  readonly kind = "integrity";

  constructor(message = "Resource conflicts with existing data", options?: ErrorOptions) {
    super(message, options);
  }
}

export class ServerError extends ResourceError {
  readonly kind = "server-error";

  constructor(message = "Internal server error", options?: ErrorOptions) {
    super(message, options);
  }
}

export const INTERNAL_ERROR_MESSAGE = "Internal server error";

export function statusForErrorKind(kind: ResourceErrorKind): number {
  switch (kind) {
    case "invalid-input":
      return 400;
    case "unauthorized":
      return 401;
    case "forbidden":
      return 403;
    case "not-found":
      return 404;
    case "integrity":
    case "server-error":
      return 500;
    default: {
      const unreachable: never = kind;
      throw new RestApiError(`Unknown resource error kind: ${String(unreachable)}`);
    }
  }
}

/**
 * The message sent to the client. Credentials and server failures get a
 * fixed text; the real error stays in the server log.
 */
export function clientMessageFor(error: ResourceError): string {
  switch (error.kind) {
    case "invalid-input":
    case "not-found":
    case "integrity":
      return error.message;
    case "unauthorized":
      return "Unauthorized";
    case "forbidden":
      return "Forbidden";
    case "server-error":
      return INTERNAL_ERROR_MESSAGE;
    default: {
      const unreachable: never = error.kind;
      throw new RestApiError(`Unknown resource error kind: ${String(unreachable)}`);
    }
  }
}
