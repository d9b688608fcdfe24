import type { CalendarDate, Entity, EntityDescriptor } from "@my-app/rest-api";

export const USER_ROLES = ["root", "admin", "user"] as const;
export type UserRole = (typeof USER_ROLES)[number];

export const NOTE_TYPES = ["plain", "markdown"] as const;
export type NoteType = (typeof NOTE_TYPES)[number];

/** The part of a user that decides what it may see and change. */
export interface RequestingUser {
  id: number;
  role: UserRole;
}

export interface UserRecord {
  id: number;
  created: Date;
  fullname: string;
  username: string;
  email: string;
  role: UserRole;
  password: string;
  passwordDate: Date | null;
  secondFactor: string | null;
}

export const USER_ENTITY: EntityDescriptor<UserRecord> = {
  columns: [
    "id",
    "created",
    "fullname",
    "username",
    "email",
    "role",
    "password",
    "passwordDate",
    "secondFactor",
  ],
  hide: ["password"],
  mask: ["secondFactor"],
};

export type User = Entity<UserRecord>;

export interface ApiClientRecord {
  id: number;
  created: Date;
  expires: Date | null;
  userId: number;
  enabled: boolean;
  appName: string;
  appPublisher: string;
  token: string;
}

export const API_CLIENT_ENTITY: EntityDescriptor<ApiClientRecord> = {
  columns: ["id", "created", "expires", "userId", "enabled", "appName", "appPublisher", "token"],
};

export type ApiClient = Entity<ApiClientRecord>;

export interface ApiTokenRecord {
  id: number;
  created: Date;
  expires: Date | null;
  clientId: number;
  userId: number;
  enabled: boolean;
  token: string;
  /** Full names of the scopes granted to the token. */
  scopes: string[];
}

const API_TOKEN_COLUMNS = [
  "id",
  "created",
  "expires",
  "clientId",
  "userId",
  "enabled",
  "token",
] as const;

/** Listings never show the token itself. */
export const API_TOKEN_ENTITY: EntityDescriptor<ApiTokenRecord> = {
  columns: API_TOKEN_COLUMNS,
  hide: ["token"],
  extra: ["scopes"],
};

/** Shown once, when the token is created. */
export const CREATED_API_TOKEN_ENTITY: EntityDescriptor<ApiTokenRecord> = {
  columns: API_TOKEN_COLUMNS,
  extra: ["scopes"],
};

export type ApiToken = Entity<ApiTokenRecord>;

export interface ApiScopeRecord {
  id: number;
  module: string;
  subject: string;
  fullScopeName: string;
}

export const API_SCOPE_ENTITY: EntityDescriptor<ApiScopeRecord> = {
  columns: ["id", "module", "subject"],
  extra: ["fullScopeName"],
};

export type ApiScope = Entity<ApiScopeRecord>;

export interface TagRecord {
  id: number;
  userId: number;
  title: string;
}

export const TAG_ENTITY: EntityDescriptor<TagRecord> = {
  columns: ["id", "userId", "title"],
};

export type Tag = Entity<TagRecord>;

export interface DateTagRecord {
  id: number;
  date: CalendarDate;
  tagId: number;
  tagTitle: string;
}

export const DATE_TAG_ENTITY: EntityDescriptor<DateTagRecord> = {
  columns: ["id", "date", "tagId"],
  extra: ["tagTitle"],
};

export type DateTag = Entity<DateTagRecord>;

export interface NoteRecord {
  id: number;
  created: Date;
  userId: number;
  type: NoteType;
  title: string;
  body: string;
}

export const NOTE_ENTITY: EntityDescriptor<NoteRecord> = {
  columns: ["id", "created", "userId", "type", "title", "body"],
};

export type Note = Entity<NoteRecord>;

export interface WebUiSettingRecord {
  id: number;
  userId: number;
  setting: string;
  value: string;
}

export const WEB_UI_SETTING_ENTITY: EntityDescriptor<WebUiSettingRecord> = {
  columns: ["id", "userId", "setting", "value"],
};

export type WebUiSetting = Entity<WebUiSettingRecord>;

export interface IdFilter {
  id?: number;
}
