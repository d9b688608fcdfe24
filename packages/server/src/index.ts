import { serve } from "@hono/node-server";
import { createRequire } from "node:module";
import { loadConfig } from "@my-app/core/config";
import { createServer } from "./bootstrap.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

const DRAIN_TIMEOUT_MS = 5_000;

async function main(): Promise<void> {
  // The root path comes from MY_APP_ROOT_PATH, or the default
  const config = await loadConfig();
  const context = await createServer(config);
  const { app, logger } = context;

  const server = serve(
    { fetch: app.fetch, port: config.server.port },
    (info) => {
      logger.info(
        {
          port: info.port,
          version: pkg.version,
          api: `${config.server.origin}${config.api.basePath}`,
        },
        "HTTP server started",
      );
    },
  );

  function shutdown(signal: string): void {
    logger.info({ signal }, "Shutdown signal received, draining connections");

    server.close(() => {
      context
        .cleanup()
        .then(() => {
          logger.info("Server stopped");
          process.exit(0);
        })
        .catch((err: unknown) => {
          logger.error({ err }, "Cleanup failed");
          process.exit(1);
        });
    });

    // Force exit after drain timeout
    setTimeout(() => {
      logger.warn("Drain timeout exceeded, forcing exit");
      process.exit(1);
    }, DRAIN_TIMEOUT_MS).unref();
  }

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
