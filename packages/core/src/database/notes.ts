import type Database from "better-sqlite3";
import { defineEntity } from "@my-app/rest-api";
import { NotFoundError } from "../errors/catalog.js";
import { nowIso, toDate } from "./columns.js";
import {
  NOTE_ENTITY,
  type IdFilter,
  type Note,
  type NoteType,
  type RequestingUser,
} from "./types.js";

export interface CreateNoteInput {
  type: NoteType;
  title: string;
  body: string;
}

export interface NoteManager {
  create(reqUser: RequestingUser, input: CreateNoteInput): Note;
  list(reqUser: RequestingUser, filter?: IdFilter): Note[];
  get(reqUser: RequestingUser, id: number): Note;
  update(reqUser: RequestingUser, id: number, changes: Partial<CreateNoteInput>): Note;
  delete(reqUser: RequestingUser, id: number): void;
}

interface RawRow {
  id: number;
  created: string;
  user_id: number;
  type: NoteType;
  title: string;
  body: string;
}

function rowToNote(row: RawRow): Note {
  return defineEntity(NOTE_ENTITY, {
    id: row.id,
    created: toDate(row.created),
    userId: row.user_id,
    type: row.type,
    title: row.title,
    body: row.body,
  });
}

export function createNoteManager(db: Database.Database): NoteManager {
  const insertStmt = db.prepare<{
    created: string;
    user_id: number;
    type: NoteType;
    title: string;
    body: string;
  }>(
    `INSERT INTO notes (created, user_id, type, title, body)
     VALUES (@created, @user_id, @type, @title, @body)`,
  );

  const listStmt = db.prepare<{ user_id: number }>(
    "SELECT * FROM notes WHERE user_id = @user_id ORDER BY created DESC, id DESC",
  );

  const findStmt = db.prepare<{ user_id: number; id: number }>(
    "SELECT * FROM notes WHERE user_id = @user_id AND id = @id",
  );

  const updateStmt = db.prepare<{ id: number; type: NoteType; title: string; body: string }>(
    "UPDATE notes SET type = @type, title = @title, body = @body WHERE id = @id",
  );

  const deleteStmt = db.prepare<{ id: number }>("DELETE FROM notes WHERE id = @id");

  const manager: NoteManager = {
    create(reqUser, input) {
      const result = insertStmt.run({
        created: nowIso(),
        user_id: reqUser.id,
        type: input.type,
        title: input.title,
        body: input.body,
      });
      return manager.get(reqUser, Number(result.lastInsertRowid));
    },

    list(reqUser, filter = {}) {
      const rows =
        filter.id !== undefined
          ? (findStmt.all({ user_id: reqUser.id, id: filter.id }) as RawRow[])
          : (listStmt.all({ user_id: reqUser.id }) as RawRow[]);
      return rows.map(rowToNote);
    },

    get(reqUser, id) {
      const row = findStmt.get({ user_id: reqUser.id, id }) as RawRow | undefined;
      if (!row) {
        throw new NotFoundError(`Note with ID ${id} is not found.`, { id });
      }
      return rowToNote(row);
    },

    update(reqUser, id, changes) {
      const current = manager.get(reqUser, id);
      updateStmt.run({
        id,
        type: changes.type ?? current.type,
        title: changes.title ?? current.title,
        body: changes.body ?? current.body,
      });
      return manager.get(reqUser, id);
    },

    delete(reqUser, id) {
      manager.get(reqUser, id);
      deleteStmt.run({ id });
    },
  };

  return manager;
}
