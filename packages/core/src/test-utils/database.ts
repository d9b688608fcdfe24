/**
 * In-memory database with one user of each role, for tests of the data
 * layer and of the HTTP layer above it.
 */

import type Database from "better-sqlite3";
import { createManagers, initializeDatabase, type Managers, type User } from "../database/index.js";

export interface TestDatabase {
  db: Database.Database;
  managers: Managers;
  root: User;
  admin: User;
  user: User;
  /** Generated passwords, by username. */
  passwords: { root: string; admin: string; user: string };
  close(): void;
}

export function createTestDatabase(): TestDatabase {
  const db = initializeDatabase(":memory:");
  const managers = createManagers(db);

  const { user: root, password: rootPassword } = managers.users.createRoot({
    fullname: "Root User",
    username: "root",
    email: "root@example.com",
  });
  const { user: admin, password: adminPassword } = managers.users.create(root, {
    fullname: "Admin User",
    username: "admin",
    email: "admin@example.com",
    role: "admin",
  });
  const { user, password: userPassword } = managers.users.create(root, {
    fullname: "Normal User",
    username: "user",
    email: "user@example.com",
    role: "user",
  });

  return {
    db,
    managers,
    root,
    admin,
    user,
    passwords: { root: rootPassword, admin: adminPassword, user: userPassword },
    close: () => db.close(),
  };
}
