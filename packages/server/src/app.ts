import { Hono } from "hono";
import { cors } from "hono/cors";
import type { Dispatcher } from "@my-app/rest-api";
import { restApiRoutes } from "@my-app/rest-api/hono";
import type { Logger } from "pino";
import type { Principal } from "./api/index.js";
import { healthRoute } from "./routes/health.js";

export interface AppDeps {
  logger: Logger;
  version: string;
  startedAt: Date;
  /** Mount point of the REST API, e.g. `/api/v1`. */
  basePath: string;
  dispatcher: Dispatcher<Principal>;
}

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  // CORS: allow all origins for browser-based clients
  app.use(
    "*",
    cors({
      origin: "*",
      allowHeaders: ["Content-Type", "Authorization"],
      allowMethods: ["GET", "POST", "PATCH", "DELETE", "OPTIONS"],
      maxAge: 86400,
    }),
  );

  app.route(
    "/",
    healthRoute({ version: deps.version, startedAt: deps.startedAt }),
  );

  // The dispatcher answers every path under the base, known or not
  app.route(
    deps.basePath,
    restApiRoutes({ dispatcher: deps.dispatcher, basePath: deps.basePath }),
  );

  // Global error handler
  app.onError((err, c) => {
    deps.logger.error({ err }, "Unhandled error");
    return c.json(
      {
        error: {
          code: 500,
          errorCode: "INTERNAL_ERROR",
          message: "Internal server error",
        },
      },
      500,
    );
  });

  // 404 fallback
  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 404,
          errorCode: "NOT_FOUND",
          message: "Not found",
        },
      },
      404,
    );
  });

  return app;
}
