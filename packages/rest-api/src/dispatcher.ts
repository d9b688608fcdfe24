import type { Logger } from "pino";
import {
  parseAuthorizationHeader,
  type Authorization,
  type AuthorizeFunction,
} from "./authorization.js";
import type { EndpointUrl, UrlMatch } from "./endpoint.js";
import {
  EndpointRegistrationError,
  INTERNAL_ERROR_MESSAGE,
  ResourceError,
  clientMessageFor,
  statusForErrorKind,
} from "./errors.js";
import type { Group } from "./group.js";
import { isHttpMethod } from "./http-method.js";
import { serializeResponse } from "./json-encoder.js";
import { DEFAULT_PAGE_LIMIT, paginate, readPagination } from "./pagination.js";
import { ApiResponse, ResponseType } from "./response.js";
import { RouteCache, type ResolvedRoute } from "./route-cache.js";

export interface DispatcherOptions<P> {
  logger: Logger;
  /** Called for endpoints with `authNeeded`; without it no check is made. */
  authorize?: AuthorizeFunction<P>;
  defaultLimit?: number;
  cache?: RouteCache<P>;
}

export interface DispatchRequest {
  method: string;
  /** Path relative to the API base, without a leading slash. */
  path: string;
  headers: Readonly<Record<string, string | undefined>>;
  query: Readonly<Record<string, string>>;
  body?: string;
}

export interface DispatchResult {
  status: number;
  body: string;
  headers: { "content-type": string };
}

interface CompiledRoute<P> extends EndpointUrl<P> {
  pattern: RegExp;
}

function compileRoute<P>(entry: EndpointUrl<P>): CompiledRoute<P> {
  try {
    return { ...entry, pattern: new RegExp(`^(?:${entry.url})$`) };
  } catch (err) {
    throw new EndpointRegistrationError(`Invalid URL pattern "${entry.url}"`, {
      cause: err,
    });
  }
}

function toUrlMatch(result: RegExpExecArray): UrlMatch {
  return {
    path: result[0],
    params: result.slice(1),
    groups: { ...(result.groups ?? {}) },
  };
}

function headerValue(
  headers: Readonly<Record<string, string | undefined>>,
  name: string,
): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
}

/**
 * Routes relative API paths to the endpoints of the registered groups.
 *
 * Each dispatch resolves the path (through the route cache), checks the
 * method, authorizes, invokes the handler, paginates resource sets and
 * encodes the result. Handler errors never escape: they become error
 * responses with the status of their kind.
 */
export class Dispatcher<P = unknown> {
  private readonly logger: Logger;
  private readonly authorize: AuthorizeFunction<P> | undefined;
  private readonly defaultLimit: number;
  private readonly cache: RouteCache<P>;
  private readonly groups: Group<P>[] = [];
  private routes: CompiledRoute<P>[] = [];

  constructor(options: DispatcherOptions<P>) {
    this.logger = options.logger;
    this.authorize = options.authorize;
    this.defaultLimit = options.defaultLimit ?? DEFAULT_PAGE_LIMIT;
    this.cache = options.cache ?? new RouteCache<P>();
  }

  registerGroup(group: Group<P>): this {
    const compiled = group.getEndpoints().map(compileRoute);
    this.groups.push(group);
    this.routes = [...this.routes, ...compiled];
    return this;
  }

  getAllEndpoints(): EndpointUrl<P>[] {
    return this.groups.flatMap((group) => group.getEndpoints());
  }

  async dispatch(request: DispatchRequest): Promise<DispatchResult> {
    const startedAt = performance.now();
    const response = await this.handle(request);
    response.runtime = performance.now() - startedAt;
    return this.finalize(response, Object.hasOwn(request.query, "pretty"));
  }

  private resolve(path: string): ResolvedRoute<P> | null {
    const cached = this.cache.get(path);
    if (cached) return cached;

    const candidates: ResolvedRoute<P>[] = [];
    for (const route of this.routes) {
      const result = route.pattern.exec(path);
      if (result) {
        candidates.push({
          url: route.url,
          endpoint: route.endpoint,
          match: toUrlMatch(result),
        });
      }
    }

    if (candidates.length > 1) {
      this.logger.warn(
        { path, urls: candidates.map((candidate) => candidate.url) },
        "Ambiguous endpoint path",
      );
    }
    if (candidates.length !== 1) return null;

    const [route] = candidates;
    this.cache.set(path, route);
    return route;
  }

  private async handle(request: DispatchRequest): Promise<ApiResponse> {
    const route = this.resolve(request.path);
    if (!route) {
      return ApiResponse.error(404, "Endpoint not found");
    }

    const { endpoint, match } = route;
    const method = request.method.toUpperCase();
    if (!isHttpMethod(method) || !endpoint.httpMethods.includes(method)) {
      return ApiResponse.error(
        405,
        `Method ${method} not allowed; supported methods: ${endpoint.httpMethods.join(", ")}`,
      );
    }

    try {
      let auth: Authorization<P> | null = null;
      if (endpoint.authNeeded && this.authorize) {
        const credentials = parseAuthorizationHeader(
          headerValue(request.headers, "authorization"),
        );
        auth = await this.authorize(credentials, endpoint.authScopes[method] ?? null);
        if (!auth.authorized) {
          this.logger.debug({ method, path: request.path }, "Authorization denied");
          return ApiResponse.error(403, "Forbidden");
        }
      }

      const { page, limit } = readPagination(request.query, this.defaultLimit);
      const response = await endpoint.handler(auth, match, { ...request, method });

      if (
        response.paginate &&
        response.type === ResponseType.RESOURCE_SET &&
        Array.isArray(response.data)
      ) {
        const items: readonly unknown[] = response.data;
        const slice = paginate(items, page, limit);
        response.data = slice.items;
        response.page = slice.page;
        response.limit = slice.limit;
        response.totalItems = slice.totalItems;
        response.lastPage = slice.lastPage;
      }

      return response;
    } catch (err) {
      return this.errorResponse(err, method, request.path);
    }
  }

  private errorResponse(err: unknown, method: string, path: string): ApiResponse {
    if (err instanceof ResourceError) {
      const status = statusForErrorKind(err.kind);
      if (err.kind === "server-error") {
        this.logger.error({ err, method, path }, "Endpoint failed");
      } else {
        this.logger.debug({ err, method, path, status }, err.message);
      }
      return ApiResponse.error(status, clientMessageFor(err));
    }

    this.logger.error({ err, method, path }, "Unhandled error in endpoint");
    return ApiResponse.error(500, INTERNAL_ERROR_MESSAGE);
  }

  private finalize(response: ApiResponse, pretty: boolean): DispatchResult {
    let sent = response;
    let body: string;
    try {
      body = serializeResponse(sent, pretty);
    } catch (err) {
      this.logger.error({ err }, "Failed to serialize response");
      sent = ApiResponse.error(500, INTERNAL_ERROR_MESSAGE);
      sent.runtime = response.runtime;
      body = serializeResponse(sent, pretty);
    }

    return {
      status: sent.errorCode !== 0 ? sent.errorCode : 200,
      body,
      headers: { "content-type": "application/json" },
    };
  }
}
