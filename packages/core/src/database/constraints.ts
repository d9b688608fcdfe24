import Database from "better-sqlite3";
import { IntegrityError } from "../errors/catalog.js";

export function isConstraintError(err: unknown): err is Database.SqliteError {
  return err instanceof Database.SqliteError && err.code.startsWith("SQLITE_CONSTRAINT");
}

/** Runs `fn`, turning SQLite constraint failures into IntegrityError. */
export function withIntegrity<T>(message: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (isConstraintError(err)) {
      throw new IntegrityError(message, { cause: err });
    }
    throw err;
  }
}
