import type Database from "better-sqlite3";
import { defineEntity } from "@my-app/rest-api";
import { NotFoundError } from "../errors/catalog.js";
import { withIntegrity } from "./constraints.js";
import { TAG_ENTITY, type IdFilter, type RequestingUser, type Tag } from "./types.js";

export interface TagManager {
  create(reqUser: RequestingUser, input: { title: string }): Tag;
  list(reqUser: RequestingUser, filter?: IdFilter): Tag[];
  get(reqUser: RequestingUser, id: number): Tag;
  update(reqUser: RequestingUser, id: number, changes: { title: string }): Tag;
  /** Fails with IntegrityError while date tags still use the tag. */
  delete(reqUser: RequestingUser, id: number): void;
}

interface RawRow {
  id: number;
  user_id: number;
  title: string;
}

function rowToTag(row: RawRow): Tag {
  return defineEntity(TAG_ENTITY, {
    id: row.id,
    userId: row.user_id,
    title: row.title,
  });
}

export function createTagManager(db: Database.Database): TagManager {
  const insertStmt = db.prepare<{ user_id: number; title: string }>(
    "INSERT INTO tags (user_id, title) VALUES (@user_id, @title)",
  );

  const listStmt = db.prepare<{ user_id: number }>(
    "SELECT * FROM tags WHERE user_id = @user_id ORDER BY id",
  );

  const findStmt = db.prepare<{ user_id: number; id: number }>(
    "SELECT * FROM tags WHERE user_id = @user_id AND id = @id",
  );

  const updateStmt = db.prepare<{ id: number; title: string }>(
    "UPDATE tags SET title = @title WHERE id = @id",
  );

  const deleteStmt = db.prepare<{ id: number }>("DELETE FROM tags WHERE id = @id");

  const manager: TagManager = {
    create(reqUser, input) {
      const result = withIntegrity("Tag already exists", () =>
        insertStmt.run({ user_id: reqUser.id, title: input.title }),
      );
      return manager.get(reqUser, Number(result.lastInsertRowid));
    },

    list(reqUser, filter = {}) {
      const rows =
        filter.id !== undefined
          ? (findStmt.all({ user_id: reqUser.id, id: filter.id }) as RawRow[])
          : (listStmt.all({ user_id: reqUser.id }) as RawRow[]);
      return rows.map(rowToTag);
    },

    get(reqUser, id) {
      const row = findStmt.get({ user_id: reqUser.id, id }) as RawRow | undefined;
      if (!row) {
        throw new NotFoundError(`Tag with ID ${id} is not found.`, { id });
      }
      return rowToTag(row);
    },

    update(reqUser, id, changes) {
      manager.get(reqUser, id);
      withIntegrity("Tag already exists", () => updateStmt.run({ id, title: changes.title }));
      return manager.get(reqUser, id);
    },

    delete(reqUser, id) {
      manager.get(reqUser, id);
      withIntegrity(
        "Tag couldn't be deleted because it still has date tags connected to it",
        () => deleteStmt.run({ id }),
      );
    },
  };

  return manager;
}
