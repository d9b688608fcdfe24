import { Buffer } from "node:buffer";

/**
 * Outcome of an authorization check. `data` carries the principal the
 * resolver authenticated, for handlers to act on.
 */
export interface Authorization<P = unknown> {
  authorized: boolean;
  data: P | null;
}

export type AuthCredentials =
  | { scheme: "basic"; username: string; password: string }
  | { scheme: "bearer"; token: string };

/**
 * Application-supplied resolver. Receives the parsed Authorization header
 * (or null when it is missing or unsupported) and the scopes the endpoint
 * lists for the request method (or null when it lists none).
 */
export type AuthorizeFunction<P = unknown> = (
  credentials: AuthCredentials | null,
  scopes: readonly string[] | null,
) => Authorization<P> | Promise<Authorization<P>>;

export function grant<P>(data: P): Authorization<P> {
  return { authorized: true, data };
}

export function deny<P>(): Authorization<P> {
  return { authorized: false, data: null };
}

const BASE64_RE = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * Parses `Basic <base64 user:password>` and `Bearer <token>` headers.
 * Anything else, including a missing header, yields null.
 */
export function parseAuthorizationHeader(
  headerValue: string | undefined,
): AuthCredentials | null {
  if (!headerValue) return null;

  const match = /^(\S+)\s+(\S+)$/.exec(headerValue.trim());
  if (!match) return null;

  const scheme = match[1].toLowerCase();
  const param = match[2];

  if (scheme === "bearer") {
    return { scheme: "bearer", token: param };
  }

  if (scheme === "basic") {
    if (!BASE64_RE.test(param)) return null;
    const decoded = Buffer.from(param, "base64").toString("utf-8");
    const separator = decoded.indexOf(":");
    if (separator === -1) return null;
    return {
      scheme: "basic",
      username: decoded.slice(0, separator),
      password: decoded.slice(separator + 1),
    };
  }

  return null;
}
