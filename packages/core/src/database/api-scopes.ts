import type Database from "better-sqlite3";
import { defineEntity } from "@my-app/rest-api";
import { formatScope, parseScope } from "../scopes/parse.js";
import { API_SCOPE_ENTITY, type ApiScope } from "./types.js";

export interface ApiScopeManager {
  /** Inserts the scopes that do not exist yet; returns how many were added. */
  seed(scopes: readonly string[]): number;
  list(): ApiScope[];
  findByFullName(fullScopeName: string): ApiScope | undefined;
}

interface RawRow {
  id: number;
  module: string;
  subject: string;
}

function rowToScope(row: RawRow): ApiScope {
  return defineEntity(API_SCOPE_ENTITY, {
    id: row.id,
    module: row.module,
    subject: row.subject,
    fullScopeName: formatScope(row.module, row.subject),
  });
}

export function createApiScopeManager(db: Database.Database): ApiScopeManager {
  const insertStmt = db.prepare<{ module: string; subject: string }>(
    "INSERT OR IGNORE INTO api_scopes (module, subject) VALUES (@module, @subject)",
  );

  const listStmt = db.prepare("SELECT * FROM api_scopes ORDER BY module, subject");

  const findStmt = db.prepare<{ module: string; subject: string }>(
    "SELECT * FROM api_scopes WHERE module = @module AND subject = @subject",
  );

  const seedAll = db.transaction((scopes: readonly string[]) => {
    let added = 0;
    for (const scope of scopes) {
      const { module, subject } = parseScope(scope);
      added += insertStmt.run({ module, subject }).changes;
    }
    return added;
  });

  return {
    seed(scopes) {
      return seedAll(scopes);
    },

    list() {
      return (listStmt.all() as RawRow[]).map(rowToScope);
    },

    findByFullName(fullScopeName) {
      const [module, subject, ...rest] = fullScopeName.split(".");
      if (subject === undefined || rest.length > 0) return undefined;
      const row = findStmt.get({ module, subject }) as RawRow | undefined;
      return row ? rowToScope(row) : undefined;
    },
  };
}
