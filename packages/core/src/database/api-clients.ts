import type Database from "better-sqlite3";
import { defineEntity } from "@my-app/rest-api";
import { NotFoundError } from "../errors/catalog.js";
import { fromDate, nowIso, toDate } from "./columns.js";
import { withIntegrity } from "./constraints.js";
import { generateToken } from "./tokens.js";
import {
  API_CLIENT_ENTITY,
  type ApiClient,
  type IdFilter,
  type RequestingUser,
} from "./types.js";

export interface CreateApiClientInput {
  appName: string;
  appPublisher: string;
  expires?: Date | null;
}

export interface UpdateApiClientInput {
  appName?: string;
  appPublisher?: string;
  enabled?: boolean;
  /** `null` clears the expiry date. */
  expires?: Date | null;
}

export interface ApiClientManager {
  create(reqUser: RequestingUser, input: CreateApiClientInput): ApiClient;
  update(reqUser: RequestingUser, id: number, changes: UpdateApiClientInput): ApiClient;
  list(reqUser: RequestingUser, filter?: IdFilter): ApiClient[];
  get(reqUser: RequestingUser, id: number): ApiClient;
  /** Deletes the client together with its tokens. */
  delete(reqUser: RequestingUser, id: number): void;
  findById(id: number): ApiClient | undefined;
}

interface RawRow {
  id: number;
  created: string;
  expires: string | null;
  user_id: number;
  enabled: number;
  app_name: string;
  app_publisher: string;
  token: string;
}

function rowToClient(row: RawRow): ApiClient {
  return defineEntity(API_CLIENT_ENTITY, {
    id: row.id,
    created: toDate(row.created),
    expires: toDate(row.expires),
    userId: row.user_id,
    enabled: row.enabled === 1,
    appName: row.app_name,
    appPublisher: row.app_publisher,
    token: row.token,
  });
}

export function createApiClientManager(db: Database.Database): ApiClientManager {
  const insertStmt = db.prepare<{
    created: string;
    expires: string | null;
    user_id: number;
    app_name: string;
    app_publisher: string;
    token: string;
  }>(
    `INSERT INTO api_clients (created, expires, user_id, app_name, app_publisher, token)
     VALUES (@created, @expires, @user_id, @app_name, @app_publisher, @token)`,
  );

  const listStmt = db.prepare<{ user_id: number }>(
    "SELECT * FROM api_clients WHERE user_id = @user_id ORDER BY id",
  );

  const findStmt = db.prepare<{ user_id: number; id: number }>(
    "SELECT * FROM api_clients WHERE user_id = @user_id AND id = @id",
  );

  const findByIdStmt = db.prepare<{ id: number }>("SELECT * FROM api_clients WHERE id = @id");

  const updateStmt = db.prepare<{
    id: number;
    expires: string | null;
    enabled: number;
    app_name: string;
    app_publisher: string;
  }>(
    `UPDATE api_clients
     SET expires = @expires, enabled = @enabled, app_name = @app_name, app_publisher = @app_publisher
     WHERE id = @id`,
  );

  const deleteStmt = db.prepare<{ id: number }>("DELETE FROM api_clients WHERE id = @id");

  const manager: ApiClientManager = {
    create(reqUser, input) {
      const result = withIntegrity("API client already exists", () =>
        insertStmt.run({
          created: nowIso(),
          expires: fromDate(input.expires),
          user_id: reqUser.id,
          app_name: input.appName,
          app_publisher: input.appPublisher,
          token: generateToken(),
        }),
      );
      return manager.get(reqUser, Number(result.lastInsertRowid));
    },

    list(reqUser, filter = {}) {
      const rows =
        filter.id !== undefined
          ? (findStmt.all({ user_id: reqUser.id, id: filter.id }) as RawRow[])
          : (listStmt.all({ user_id: reqUser.id }) as RawRow[]);
      return rows.map(rowToClient);
    },

    get(reqUser, id) {
      const row = findStmt.get({ user_id: reqUser.id, id }) as RawRow | undefined;
      if (!row) {
        throw new NotFoundError(`API client with ID ${id} is not found.`, { id });
      }
      return rowToClient(row);
    },

    update(reqUser, id, changes) {
      const target = manager.get(reqUser, id);
      withIntegrity("API client already exists", () =>
        updateStmt.run({
          id,
          expires: fromDate(changes.expires !== undefined ? changes.expires : target.expires),
          enabled: (changes.enabled ?? target.enabled) ? 1 : 0,
          app_name: changes.appName ?? target.appName,
          app_publisher: changes.appPublisher ?? target.appPublisher,
        }),
      );
      return manager.get(reqUser, id);
    },

    delete(reqUser, id) {
      manager.get(reqUser, id);
      deleteStmt.run({ id });
    },

    findById(id) {
      const row = findByIdStmt.get({ id }) as RawRow | undefined;
      return row ? rowToClient(row) : undefined;
    },
  };

  return manager;
}
