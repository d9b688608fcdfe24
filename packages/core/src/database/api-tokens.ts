import type Database from "better-sqlite3";
import { defineEntity, type EntityDescriptor } from "@my-app/rest-api";
import { NotFoundError, PermissionDeniedError } from "../errors/catalog.js";
import { scopeCoveredByGrant, scopeMatchesPattern } from "../scopes/match.js";
import { fromDate, nowIso, toDate } from "./columns.js";
import { withIntegrity } from "./constraints.js";
import { generateToken } from "./tokens.js";
import {
  API_TOKEN_ENTITY,
  CREATED_API_TOKEN_ENTITY,
  type ApiClient,
  type ApiToken,
  type ApiTokenRecord,
  type IdFilter,
  type RequestingUser,
  type User,
} from "./types.js";
import type { ApiClientManager } from "./api-clients.js";
import type { ApiScopeManager } from "./api-scopes.js";
import type { UserManager } from "./users.js";

export interface CreateApiTokenInput {
  clientId: number;
  /** Scope names or patterns (`tags.*`, `*`), expanded against the known scopes. */
  scopes: readonly string[];
  expires?: Date | null;
  /**
   * Scopes held by whoever asks for the token. When given, every scope the
   * new token would get must be covered by one of them.
   */
  grantedBy?: readonly string[];
}

export interface UpdateApiTokenInput {
  enabled?: boolean;
  /** `null` clears the expiry date. */
  expires?: Date | null;
}

/** Everything the authorizer needs to know about a presented token. */
export interface TokenGrant {
  token: ApiToken;
  client: ApiClient;
  user: User;
}

export interface ApiTokenManager {
  /** The returned token is the only one that shows its secret. */
  create(reqUser: RequestingUser, input: CreateApiTokenInput): ApiToken;
  update(reqUser: RequestingUser, id: number, changes: UpdateApiTokenInput): ApiToken;
  list(reqUser: RequestingUser, filter?: IdFilter): ApiToken[];
  delete(reqUser: RequestingUser, id: number): void;
  findByToken(token: string): TokenGrant | undefined;
}

interface RawRow {
  id: number;
  created: string;
  expires: string | null;
  client_id: number;
  user_id: number;
  enabled: number;
  token: string;
}

export interface ApiTokenManagerDeps {
  clients: ApiClientManager;
  scopes: ApiScopeManager;
  users: UserManager;
}

export function createApiTokenManager(
  db: Database.Database,
  deps: ApiTokenManagerDeps,
): ApiTokenManager {
  const insertStmt = db.prepare<{
    created: string;
    expires: string | null;
    client_id: number;
    user_id: number;
    token: string;
  }>(
    `INSERT INTO api_tokens (created, expires, client_id, user_id, token)
     VALUES (@created, @expires, @client_id, @user_id, @token)`,
  );

  const linkScopeStmt = db.prepare<{ token_id: number; scope_id: number }>(
    "INSERT OR IGNORE INTO api_token_scopes (token_id, scope_id) VALUES (@token_id, @scope_id)",
  );

  const scopesStmt = db.prepare<{ token_id: number }>(
    `SELECT api_scopes.module, api_scopes.subject FROM api_token_scopes
     JOIN api_scopes ON api_scopes.id = api_token_scopes.scope_id
     WHERE api_token_scopes.token_id = @token_id
     ORDER BY api_scopes.module, api_scopes.subject`,
  );

  const listStmt = db.prepare<{ user_id: number }>(
    "SELECT * FROM api_tokens WHERE user_id = @user_id ORDER BY id",
  );

  const findStmt = db.prepare<{ user_id: number; id: number }>(
    "SELECT * FROM api_tokens WHERE user_id = @user_id AND id = @id",
  );

  const findByTokenStmt = db.prepare<{ token: string }>(
    "SELECT * FROM api_tokens WHERE token = @token",
  );

  const updateStmt = db.prepare<{ id: number; expires: string | null; enabled: number }>(
    "UPDATE api_tokens SET expires = @expires, enabled = @enabled WHERE id = @id",
  );

  const deleteStmt = db.prepare<{ id: number }>("DELETE FROM api_tokens WHERE id = @id");

  function scopeNames(tokenId: number): string[] {
    const rows = scopesStmt.all({ token_id: tokenId }) as { module: string; subject: string }[];
    return rows.map((row) => `${row.module}.${row.subject}`);
  }

  function rowToToken(
    row: RawRow,
    descriptor: EntityDescriptor<ApiTokenRecord> = API_TOKEN_ENTITY,
  ): ApiToken {
    return defineEntity(descriptor, {
      id: row.id,
      created: toDate(row.created),
      expires: toDate(row.expires),
      clientId: row.client_id,
      userId: row.user_id,
      enabled: row.enabled === 1,
      token: row.token,
      scopes: scopeNames(row.id),
    });
  }

  /**
   * Expands patterns to scope ids. A pattern that matches nothing is an
   * error, and so is a scope that `grantedBy` does not cover.
   */
  function resolveScopeIds(
    patterns: readonly string[],
    grantedBy: readonly string[] | undefined,
  ): number[] {
    const known = deps.scopes.list();
    const ids = new Set<number>();
    for (const pattern of patterns) {
      const matched = known.filter((scope) =>
        scopeMatchesPattern(scope.fullScopeName, pattern),
      );
      if (matched.length === 0) {
        throw new NotFoundError(`API scope "${pattern}" is not found.`, { scope: pattern });
      }
      for (const scope of matched) {
        if (grantedBy !== undefined && !scopeCoveredByGrant(scope.fullScopeName, grantedBy)) {
          throw new PermissionDeniedError(
            `API scope "${scope.fullScopeName}" is not held by the requesting token`,
          );
        }
        ids.add(scope.id);
      }
    }
    return [...ids];
  }

  const createWithScopes = db.transaction(
    (reqUser: RequestingUser, input: CreateApiTokenInput): number => {
      const scopeIds = resolveScopeIds(input.scopes, input.grantedBy);
      const result = withIntegrity("API token already exists", () =>
        insertStmt.run({
          created: nowIso(),
          expires: fromDate(input.expires),
          client_id: input.clientId,
          user_id: reqUser.id,
          token: generateToken(),
        }),
      );
      const tokenId = Number(result.lastInsertRowid);
      for (const scopeId of scopeIds) {
        linkScopeStmt.run({ token_id: tokenId, scope_id: scopeId });
      }
      return tokenId;
    },
  );

  function find(reqUser: RequestingUser, id: number): RawRow {
    const row = findStmt.get({ user_id: reqUser.id, id }) as RawRow | undefined;
    if (!row) {
      throw new NotFoundError(`API token with ID ${id} is not found.`, { id });
    }
    return row;
  }

  return {
    create(reqUser, input) {
      // The client has to be one of the requesting user's own.
      deps.clients.get(reqUser, input.clientId);
      const tokenId = createWithScopes(reqUser, input);
      return rowToToken(find(reqUser, tokenId), CREATED_API_TOKEN_ENTITY);
    },

    update(reqUser, id, changes) {
      const target = find(reqUser, id);
      updateStmt.run({
        id,
        expires: changes.expires !== undefined ? fromDate(changes.expires) : target.expires,
        enabled: (changes.enabled ?? target.enabled === 1) ? 1 : 0,
      });
      return rowToToken(find(reqUser, id));
    },

    list(reqUser, filter = {}) {
      const rows =
        filter.id !== undefined
          ? (findStmt.all({ user_id: reqUser.id, id: filter.id }) as RawRow[])
          : (listStmt.all({ user_id: reqUser.id }) as RawRow[]);
      return rows.map((row) => rowToToken(row));
    },

    delete(reqUser, id) {
      find(reqUser, id);
      deleteStmt.run({ id });
    },

    findByToken(token) {
      const row = findByTokenStmt.get({ token }) as RawRow | undefined;
      if (!row) return undefined;

      const client = deps.clients.findById(row.client_id);
      const user = deps.users.findById(row.user_id);
      if (!client || !user) return undefined;

      return { token: rowToToken(row), client, user };
    },
  };
}
