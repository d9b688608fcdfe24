import { describe, it, expect } from "vitest";
import {
  InvalidInputError,
  ResourceError,
  ResourceForbiddenError,
  ResourceIntegrityError,
  ResourceNotFoundError,
  ResourceUnauthorizedError,
  ServerError,
  clientMessageFor,
  statusForErrorKind,
} from "./errors.js";

describe("resource errors", () => {
  it("sets the class name and keeps the cause", () => {
    const cause = new Error("constraint failed");
    const err = new ResourceIntegrityError("Tag exists", { cause });

    expect(err).toBeInstanceOf(ResourceError);
    expect(err.name).toBe("ResourceIntegrityError");
    expect(err.kind).toBe("integrity");
    expect(err.cause).toBe(cause);
  });

  it("has a default message per kind", () => {
    expect(new InvalidInputError().message).toBe("Invalid input");
    expect(new ResourceNotFoundError().message).toBe("Resource not found");
    expect(new ServerError().message).toBe("Internal server error");
  });

  it("maps every kind to one status", () => {
    expect(statusForErrorKind("invalid-input")).toBe(400);
    expect(statusForErrorKind("unauthorized")).toBe(401);
    expect(statusForErrorKind("forbidden")).toBe(403);
    expect(statusForErrorKind("not-found")).toBe(404);
    expect(statusForErrorKind("integrity")).toBe(500);
    expect(statusForErrorKind("server-error")).toBe(500);
  });

  it("hides server and credential details from clients", () => {
    expect(clientMessageFor(new ServerError("disk /dev/sda1 full"))).toBe(
      "Internal server error",
    );
    expect(clientMessageFor(new ResourceUnauthorizedError("token abc expired"))).toBe(
      "Unauthorized",
    );
    expect(clientMessageFor(new ResourceForbiddenError("missing tags.create"))).toBe(
      "Forbidden",
    );
    expect(clientMessageFor(new InvalidInputError("title: Required"))).toBe("title: Required");
  });
});
