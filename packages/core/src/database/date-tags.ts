import type Database from "better-sqlite3";
import { CalendarDate, defineEntity } from "@my-app/rest-api";
import { NotFoundError } from "../errors/catalog.js";
import { withIntegrity } from "./constraints.js";
import { DATE_TAG_ENTITY, type DateTag, type RequestingUser } from "./types.js";

export interface DateTagFilter {
  id?: number;
  date?: CalendarDate;
}

export interface DateTagManager {
  /** The tag must belong to the requesting user. */
  create(reqUser: RequestingUser, input: { date: CalendarDate; tagId: number }): DateTag;
  list(reqUser: RequestingUser, filter?: DateTagFilter): DateTag[];
  delete(reqUser: RequestingUser, id: number): void;
}

interface RawRow {
  id: number;
  date: string;
  tag_id: number;
  tag_title: string;
}

function rowToDateTag(row: RawRow): DateTag {
  return defineEntity(DATE_TAG_ENTITY, {
    id: row.id,
    date: CalendarDate.parse(row.date),
    tagId: row.tag_id,
    tagTitle: row.tag_title,
  });
}

const SELECT_SQL = `SELECT date_tags.id, date_tags.date, date_tags.tag_id, tags.title AS tag_title
  FROM date_tags JOIN tags ON tags.id = date_tags.tag_id
  WHERE tags.user_id = @user_id`;

export function createDateTagManager(db: Database.Database): DateTagManager {
  const insertStmt = db.prepare<{ date: string; tag_id: number }>(
    "INSERT INTO date_tags (date, tag_id) VALUES (@date, @tag_id)",
  );

  const tagOwnedStmt = db.prepare<{ user_id: number; id: number }>(
    "SELECT id FROM tags WHERE user_id = @user_id AND id = @id",
  );

  const findStmt = db.prepare<{ user_id: number; id: number }>(
    `${SELECT_SQL} AND date_tags.id = @id`,
  );

  const deleteStmt = db.prepare<{ id: number }>("DELETE FROM date_tags WHERE id = @id");

  function find(reqUser: RequestingUser, id: number): DateTag {
    const row = findStmt.get({ user_id: reqUser.id, id }) as RawRow | undefined;
    if (!row) {
      throw new NotFoundError(`Date tag with ID ${id} is not found.`, { id });
    }
    return rowToDateTag(row);
  }

  return {
    create(reqUser, input) {
      if (tagOwnedStmt.get({ user_id: reqUser.id, id: input.tagId }) === undefined) {
        throw new NotFoundError(`Tag with ID ${input.tagId} is not found.`, {
          id: input.tagId,
        });
      }
      const result = withIntegrity("Date tag already exists", () =>
        insertStmt.run({ date: input.date.toString(), tag_id: input.tagId }),
      );
      return find(reqUser, Number(result.lastInsertRowid));
    },

    list(reqUser, filter = {}) {
      let sql = SELECT_SQL;
      const params: Record<string, unknown> = { user_id: reqUser.id };

      if (filter.id !== undefined) {
        sql += " AND date_tags.id = @id";
        params.id = filter.id;
      }
      if (filter.date !== undefined) {
        sql += " AND date_tags.date = @date";
        params.date = filter.date.toString();
      }
      sql += " ORDER BY date_tags.date, date_tags.id";

      const rows = db.prepare(sql).all(params) as RawRow[];
      return rows.map(rowToDateTag);
    },

    delete(reqUser, id) {
      find(reqUser, id);
      deleteStmt.run({ id });
    },
  };
}
