import type { z } from "zod";
import type { EndpointRequest } from "./endpoint.js";
import { InvalidInputError } from "./errors.js";

/**
 * Parses the request body as JSON and validates it against `schema`.
 * Missing, malformed or invalid bodies raise InvalidInputError.
 */
export function readJsonBody<T>(request: EndpointRequest, schema: z.ZodType<T>): T {
  if (request.body === undefined || request.body.trim() === "") {
    throw new InvalidInputError("Request body is required");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(request.body);
  } catch (err) {
    throw new InvalidInputError("Invalid JSON body", { cause: err });
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => {
        const path = issue.path.map(String).join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
      })
      .join("; ");
    throw new InvalidInputError(`Invalid request body: ${detail}`);
  }

  return result.data;
}
