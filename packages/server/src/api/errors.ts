import {
  InvalidInputError,
  ResourceError,
  ResourceForbiddenError,
  ResourceIntegrityError,
  ResourceNotFoundError,
  ServerError,
} from "@my-app/rest-api";
import {
  FilterNotValidError,
  IntegrityError,
  NotFoundError,
  PermissionDeniedError,
} from "@my-app/core/errors";

/** Maps a data layer failure to the resource error a client sees. */
export function toResourceError(err: unknown): ResourceError {
  if (err instanceof ResourceError) return err;
  if (err instanceof NotFoundError) {
    return new ResourceNotFoundError(err.message, { cause: err });
  }
  if (err instanceof PermissionDeniedError) {
    return new ResourceForbiddenError(err.message, { cause: err });
  }
  if (err instanceof IntegrityError) {
    return new ResourceIntegrityError(err.message, { cause: err });
  }
  if (err instanceof FilterNotValidError) {
    return new InvalidInputError(err.message, { cause: err });
  }
  return new ServerError(undefined, { cause: err });
}

export function withResourceErrors<T>(fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw toResourceError(err);
  }
}
