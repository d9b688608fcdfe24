/**
 * The full v1 API over an in-memory database, for route tests.
 */

import type { Hono } from "hono";
import pino from "pino";
import type { Dispatcher } from "@my-app/rest-api";
import type { User } from "@my-app/core/database";
import { createTestDatabase, type TestDatabase } from "@my-app/core/test-utils";
import { createRestApi, requiredScopes, type Principal } from "./api/index.js";
import { createApp } from "./app.js";

export const TEST_BASE_PATH = "/api/v1";

export interface ApiCallOptions {
  token?: string;
  body?: unknown;
  /** Sent as is, instead of JSON-encoding `body`. */
  rawBody?: string;
}

export interface ApiCallResult {
  status: number;
  body: unknown;
}

export interface TestApi extends TestDatabase {
  app: Hono;
  dispatcher: Dispatcher<Principal>;
  /** Issues a token for `user` through a fresh API client. */
  tokenFor(user: User, scopes?: string[]): string;
  call(method: string, path: string, options?: ApiCallOptions): Promise<ApiCallResult>;
}

export function createTestApi(): TestApi {
  const database = createTestDatabase();
  const logger = pino({ level: "silent" });

  const dispatcher = createRestApi({ managers: database.managers, logger });
  database.managers.apiScopes.seed(requiredScopes(dispatcher.getAllEndpoints()));

  const app = createApp({
    logger,
    version: "0.0.0-test",
    startedAt: new Date(),
    basePath: TEST_BASE_PATH,
    dispatcher,
  });

  let clients = 0;

  return {
    ...database,
    app,
    dispatcher,

    tokenFor(user, scopes = ["*"]) {
      clients += 1;
      const client = database.managers.apiClients.create(user, {
        appName: `test-client-${clients}`,
        appPublisher: "tests",
      });
      return database.managers.apiTokens.create(user, { clientId: client.id, scopes }).token;
    },

    async call(method, path, options = {}) {
      const headers: Record<string, string> = {};
      if (options.token !== undefined) {
        headers.Authorization = `Bearer ${options.token}`;
      }

      let body = options.rawBody;
      if (body === undefined && options.body !== undefined) {
        body = JSON.stringify(options.body);
        headers["Content-Type"] = "application/json";
      }

      const res = await app.request(`${TEST_BASE_PATH}/${path}`, { method, headers, body });
      const parsed: unknown = JSON.parse(await res.text());
      return { status: res.status, body: parsed };
    },
  };
}
