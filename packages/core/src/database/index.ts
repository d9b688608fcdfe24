import type Database from "better-sqlite3";
import { createApiClientManager, type ApiClientManager } from "./api-clients.js";
import { createApiScopeManager, type ApiScopeManager } from "./api-scopes.js";
import { createApiTokenManager, type ApiTokenManager } from "./api-tokens.js";
import { createDateTagManager, type DateTagManager } from "./date-tags.js";
import { createNoteManager, type NoteManager } from "./notes.js";
import { createTagManager, type TagManager } from "./tags.js";
import { createUserManager, type UserManager } from "./users.js";
import { createWebUiSettingManager, type WebUiSettingManager } from "./web-ui-settings.js";

export * from "./types.js";
export { initializeDatabase, TABLE_NAMES } from "./schema.js";
export { isConstraintError, withIntegrity } from "./constraints.js";
export { isExpired } from "./columns.js";
export { generatePassword, hashPassword, verifyPassword } from "./passwords.js";
export type {
  ApiClientManager,
  CreateApiClientInput,
  UpdateApiClientInput,
} from "./api-clients.js";
export type { ApiScopeManager } from "./api-scopes.js";
export type {
  ApiTokenManager,
  CreateApiTokenInput,
  TokenGrant,
  UpdateApiTokenInput,
} from "./api-tokens.js";
export type { DateTagFilter, DateTagManager } from "./date-tags.js";
export type { CreateNoteInput, NoteManager } from "./notes.js";
export type { TagManager } from "./tags.js";
export type { CreatedUser, CreateUserInput, UpdateUserInput, UserManager } from "./users.js";
export type { WebUiSettingManager } from "./web-ui-settings.js";

export interface Managers {
  users: UserManager;
  apiClients: ApiClientManager;
  apiScopes: ApiScopeManager;
  apiTokens: ApiTokenManager;
  tags: TagManager;
  dateTags: DateTagManager;
  notes: NoteManager;
  webUiSettings: WebUiSettingManager;
}

export function createManagers(db: Database.Database): Managers {
  const users = createUserManager(db);
  const apiClients = createApiClientManager(db);
  const apiScopes = createApiScopeManager(db);

  return {
    users,
    apiClients,
    apiScopes,
    apiTokens: createApiTokenManager(db, {
      clients: apiClients,
      scopes: apiScopes,
      users,
    }),
    tags: createTagManager(db),
    dateTags: createDateTagManager(db),
    notes: createNoteManager(db),
    webUiSettings: createWebUiSettingManager(db),
  };
}
