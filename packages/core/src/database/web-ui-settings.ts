import type Database from "better-sqlite3";
import { defineEntity } from "@my-app/rest-api";
import { NotFoundError } from "../errors/catalog.js";
import {
  WEB_UI_SETTING_ENTITY,
  type RequestingUser,
  type WebUiSetting,
} from "./types.js";

export interface WebUiSettingManager {
  list(reqUser: RequestingUser, filter?: { setting?: string }): WebUiSetting[];
  /** Creates the setting, or replaces its value. */
  set(reqUser: RequestingUser, setting: string, value: string): WebUiSetting;
}

interface RawRow {
  id: number;
  user_id: number;
  setting: string;
  value: string;
}

function rowToSetting(row: RawRow): WebUiSetting {
  return defineEntity(WEB_UI_SETTING_ENTITY, {
    id: row.id,
    userId: row.user_id,
    setting: row.setting,
    value: row.value,
  });
}

export function createWebUiSettingManager(db: Database.Database): WebUiSettingManager {
  const listStmt = db.prepare<{ user_id: number }>(
    "SELECT * FROM web_ui_settings WHERE user_id = @user_id ORDER BY setting",
  );

  const findStmt = db.prepare<{ user_id: number; setting: string }>(
    "SELECT * FROM web_ui_settings WHERE user_id = @user_id AND setting = @setting",
  );

  const upsertStmt = db.prepare<{ user_id: number; setting: string; value: string }>(
    `INSERT INTO web_ui_settings (user_id, setting, value) VALUES (@user_id, @setting, @value)
     ON CONFLICT (user_id, setting) DO UPDATE SET value = excluded.value`,
  );

  return {
    list(reqUser, filter = {}) {
      const rows =
        filter.setting !== undefined
          ? (findStmt.all({ user_id: reqUser.id, setting: filter.setting }) as RawRow[])
          : (listStmt.all({ user_id: reqUser.id }) as RawRow[]);
      return rows.map(rowToSetting);
    },

    set(reqUser, setting, value) {
      upsertStmt.run({ user_id: reqUser.id, setting, value });
      const row = findStmt.get({ user_id: reqUser.id, setting }) as RawRow | undefined;
      if (!row) {
        throw new NotFoundError(`Setting "${setting}" is not found.`);
      }
      return rowToSetting(row);
    },
  };
}
