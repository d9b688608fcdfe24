import type { Authorization } from "./authorization.js";
import { EndpointRegistrationError } from "./errors.js";
import { isHttpMethod, type HttpMethod } from "./http-method.js";
import type { ApiResponse } from "./response.js";

/** Required scopes per method; at least one must be granted. */
export type EndpointScopes = Partial<Record<HttpMethod, readonly string[]>>;

/** The regular expression match that selected the endpoint. */
export interface UrlMatch {
  path: string;
  /** Positional capture groups, `undefined` for groups that did not take part. */
  params: readonly (string | undefined)[];
  groups: Readonly<Record<string, string | undefined>>;
}

export interface EndpointRequest {
  method: HttpMethod;
  path: string;
  query: Readonly<Record<string, string>>;
  headers: Readonly<Record<string, string | undefined>>;
  /** Raw request body, if one was sent. */
  body?: string;
}

export type EndpointHandler<P = unknown> = (
  auth: Authorization<P> | null,
  match: UrlMatch,
  request: EndpointRequest,
) => ApiResponse | Promise<ApiResponse>;

export interface EndpointDescriptor<P = unknown> {
  urlSuffixes: readonly string[];
  httpMethods: readonly HttpMethod[];
  handler: EndpointHandler<P>;
  name?: string;
  description?: string;
  authNeeded?: boolean;
  authScopes?: EndpointScopes;
}

export interface Endpoint<P = unknown> {
  readonly urlSuffixes: readonly string[];
  readonly httpMethods: readonly HttpMethod[];
  readonly handler: EndpointHandler<P>;
  readonly name: string;
  readonly description: string;
  readonly authNeeded: boolean;
  readonly authScopes: EndpointScopes;
}

export interface EndpointUrl<P = unknown> {
  url: string;
  endpoint: Endpoint<P>;
}

/** Validates a descriptor and freezes it into an Endpoint. */
export function createEndpoint<P>(descriptor: EndpointDescriptor<P>): Endpoint<P> {
  const label = descriptor.name ?? descriptor.urlSuffixes[0] ?? "<unnamed>";

  if (descriptor.urlSuffixes.length === 0) {
    throw new EndpointRegistrationError(`Endpoint "${label}" has no URL suffixes`);
  }
  if (descriptor.httpMethods.length === 0) {
    throw new EndpointRegistrationError(`Endpoint "${label}" has no HTTP methods`);
  }
  for (const method of descriptor.httpMethods) {
    if (!isHttpMethod(method)) {
      throw new EndpointRegistrationError(
        `Endpoint "${label}" lists unsupported HTTP method "${String(method)}"`,
      );
    }
  }

  const authScopes: EndpointScopes = {};
  for (const [method, scopes] of Object.entries(descriptor.authScopes ?? {})) {
    if (!isHttpMethod(method) || !descriptor.httpMethods.includes(method)) {
      throw new EndpointRegistrationError(
        `Endpoint "${label}" declares scopes for "${method}", which it does not serve`,
      );
    }
    if (scopes !== undefined) {
      authScopes[method] = Object.freeze([...scopes]);
    }
  }

  return Object.freeze({
    urlSuffixes: Object.freeze([...descriptor.urlSuffixes]),
    httpMethods: Object.freeze([...descriptor.httpMethods]),
    handler: descriptor.handler,
    name: descriptor.name ?? "",
    description: descriptor.description ?? "",
    authNeeded: descriptor.authNeeded ?? false,
    authScopes: Object.freeze(authScopes),
  });
}
