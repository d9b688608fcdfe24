import { mkdir } from "node:fs/promises";
import { createRequire } from "node:module";
import type Database from "better-sqlite3";
import type { Hono } from "hono";
import type { Dispatcher } from "@my-app/rest-api";
import type { ServerConfig } from "@my-app/core/schemas/server-config";
import { resolveDataPath, resolveRootPath } from "@my-app/core/config";
import { createLogger, type Logger } from "@my-app/core/logger";
import {
  createManagers,
  initializeDatabase,
  type Managers,
} from "@my-app/core/database";
import { createRestApi, requiredScopes, type Principal } from "./api/index.js";
import { createApp } from "./app.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

export interface ServerContext {
  app: Hono;
  logger: Logger;
  config: ServerConfig;
  startedAt: Date;
  rootPath: string;
  db: Database.Database;
  managers: Managers;
  dispatcher: Dispatcher<Principal>;
  cleanup: () => Promise<void>;
}

export interface CreateServerOptions {
  rootPath?: string;
  /** Replaces the logger built from `config.logging`. */
  logger?: Logger;
}

/**
 * Creates the first root user, with an API client and a token that holds
 * every scope, and logs the credentials. They are not shown again.
 */
function bootstrapRootUser(
  managers: Managers,
  config: ServerConfig,
  logger: Logger,
): void {
  const { user, password } = managers.users.createRoot({
    fullname: "Root",
    username: config.bootstrap.rootUsername,
    email: config.bootstrap.rootEmail,
  });
  const client = managers.apiClients.create(user, {
    appName: "bootstrap",
    appPublisher: config.bootstrap.rootUsername,
  });
  const token = managers.apiTokens.create(user, {
    clientId: client.id,
    scopes: ["*"],
  });

  logger.warn(
    { username: user.username, password, apiToken: token.token },
    "Created root user; store these credentials, they are not shown again",
  );
}

export async function createServer(
  config: ServerConfig,
  options?: CreateServerOptions,
): Promise<ServerContext> {
  const logger = options?.logger ?? createLogger(config.logging);
  const startedAt = new Date();

  const rootPath = resolveRootPath(options?.rootPath);
  await mkdir(rootPath, { recursive: true });

  const db = initializeDatabase(resolveDataPath(rootPath, config.database.filename));
  const managers = createManagers(db);

  const dispatcher = createRestApi({
    managers,
    logger,
    defaultLimit: config.api.defaultLimit,
  });

  const added = managers.apiScopes.seed(requiredScopes(dispatcher.getAllEndpoints()));
  if (added > 0) {
    logger.info({ added }, "API scopes seeded");
  }

  if (managers.users.count() === 0) {
    bootstrapRootUser(managers, config, logger);
  }

  const app = createApp({
    logger,
    version: pkg.version,
    startedAt,
    basePath: config.api.basePath,
    dispatcher,
  });

  const cleanup = async () => {
    db.close();
  };

  return {
    app,
    logger,
    config,
    startedAt,
    rootPath,
    db,
    managers,
    dispatcher,
    cleanup,
  };
}
