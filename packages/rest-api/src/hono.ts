import { Hono } from "hono";
import type { Dispatcher } from "./dispatcher.js";

export interface RestApiRoutesDeps<P> {
  dispatcher: Dispatcher<P>;
  /** Path the routes are mounted under, e.g. `/api/v1`. */
  basePath: string;
}

/** Strips the mount point and leading slash from a request path. */
export function relativeApiPath(path: string, basePath: string): string {
  const base = basePath.replace(/\/+$/, "");
  if (path === base) return "";
  const rest = base !== "" && path.startsWith(`${base}/`) ? path.slice(base.length) : path;
  return rest.replace(/^\/+/, "");
}

/**
 * Hands every request under `basePath` to the dispatcher. Mount with
 * `app.route(basePath, restApiRoutes({ dispatcher, basePath }))`.
 */
export function restApiRoutes<P>(deps: RestApiRoutesDeps<P>): Hono {
  const app = new Hono();

  app.all("*", async (c) => {
    const method = c.req.method;
    const body = method === "GET" || method === "HEAD" ? undefined : await c.req.text();

    const result = await deps.dispatcher.dispatch({
      method,
      path: relativeApiPath(c.req.path, deps.basePath),
      headers: c.req.header(),
      query: c.req.query(),
      body,
    });

    return new Response(result.body, {
      status: result.status,
      headers: result.headers,
    });
  });

  return app;
}
