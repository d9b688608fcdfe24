import type Database from "better-sqlite3";
import { defineEntity } from "@my-app/rest-api";
import {
  FilterNotValidError,
  NotFoundError,
  PermissionDeniedError,
} from "../errors/catalog.js";
import { nowIso, toDate } from "./columns.js";
import { withIntegrity } from "./constraints.js";
import { generatePassword, hashPassword, verifyPassword } from "./passwords.js";
import {
  USER_ENTITY,
  type IdFilter,
  type RequestingUser,
  type User,
  type UserRole,
} from "./types.js";

export interface CreateUserInput {
  fullname: string;
  username: string;
  email: string;
  role: UserRole;
}

export type UpdateUserInput = Partial<CreateUserInput>;

export interface CreatedUser {
  user: User;
  /** Generated password, returned only here. */
  password: string;
}

export interface UserManager {
  /** Creates a user with a generated password. */
  create(reqUser: RequestingUser, input: CreateUserInput): CreatedUser;
  /** Creates the first root user, without a requesting user. */
  createRoot(input: Omit<CreateUserInput, "role">): CreatedUser;
  list(reqUser: RequestingUser, filter?: IdFilter): User[];
  get(reqUser: RequestingUser, id: number): User;
  update(reqUser: RequestingUser, id: number, changes: UpdateUserInput): User;
  delete(reqUser: RequestingUser, id: number): void;
  /** Replaces the requesting user's own password once the current one checks out. */
  changePassword(reqUser: RequestingUser, currentPassword: string, newPassword: string): void;
  findById(id: number): User | undefined;
  findByUsername(username: string): User | undefined;
  count(): number;
}

interface RawRow {
  id: number;
  created: string;
  fullname: string;
  username: string;
  email: string;
  role: UserRole;
  password: string;
  password_date: string | null;
  second_factor: string | null;
}

function rowToUser(row: RawRow): User {
  return defineEntity(USER_ENTITY, {
    id: row.id,
    created: toDate(row.created),
    fullname: row.fullname,
    username: row.username,
    email: row.email,
    role: row.role,
    password: row.password,
    passwordDate: toDate(row.password_date),
    secondFactor: row.second_factor,
  });
}

const UPDATABLE_FIELDS = new Set(["fullname", "username", "email", "role"]);

type UserAction = "create" | "change" | "delete";

/**
 * Root may manage anyone. Admins manage normal users only, and may only
 * hand out the "user" role. Normal users manage nobody.
 */
function assertMayManage(
  reqUser: RequestingUser,
  action: UserAction,
  targetRole: UserRole,
  newRole?: UserRole,
): void {
  if (reqUser.role === "user") {
    throw new PermissionDeniedError(`A user with role "user" cannot ${action} users`);
  }
  if (
    reqUser.role === "admin" &&
    (targetRole !== "user" || (newRole !== undefined && newRole !== "user"))
  ) {
    throw new PermissionDeniedError(
      `A user with role "admin" can only ${action} normal users`,
    );
  }
}

export function createUserManager(db: Database.Database): UserManager {
  const insertStmt = db.prepare<{
    created: string;
    fullname: string;
    username: string;
    email: string;
    role: UserRole;
    password: string;
    password_date: string;
  }>(
    `INSERT INTO users (created, fullname, username, email, role, password, password_date)
     VALUES (@created, @fullname, @username, @email, @role, @password, @password_date)`,
  );

  const findByIdStmt = db.prepare<{ id: number }>("SELECT * FROM users WHERE id = @id");

  const findByUsernameStmt = db.prepare<{ username: string }>(
    "SELECT * FROM users WHERE username = @username",
  );

  const updateStmt = db.prepare<{
    id: number;
    fullname: string;
    username: string;
    email: string;
    role: UserRole;
  }>(
    `UPDATE users SET fullname = @fullname, username = @username, email = @email, role = @role
     WHERE id = @id`,
  );

  const setPasswordStmt = db.prepare<{ id: number; password: string; password_date: string }>(
    "UPDATE users SET password = @password, password_date = @password_date WHERE id = @id",
  );

  const deleteStmt = db.prepare<{ id: number }>("DELETE FROM users WHERE id = @id");

  const countStmt = db.prepare("SELECT COUNT(*) AS cnt FROM users");

  function findById(id: number): User | undefined {
    const row = findByIdStmt.get({ id }) as RawRow | undefined;
    return row ? rowToUser(row) : undefined;
  }

  function insert(input: CreateUserInput): CreatedUser {
    const password = generatePassword();
    const now = nowIso();
    const result = withIntegrity("User already exists", () =>
      insertStmt.run({
        ...input,
        created: now,
        password: hashPassword(password),
        password_date: now,
      }),
    );
    const user = findById(Number(result.lastInsertRowid));
    if (!user) {
      throw new NotFoundError("Created user could not be read back");
    }
    return { user, password };
  }

  const manager: UserManager = {
    create(reqUser, input) {
      assertMayManage(reqUser, "create", input.role);
      return insert(input);
    },

    createRoot(input) {
      return insert({ ...input, role: "root" });
    },

    list(reqUser, filter = {}) {
      let sql = "SELECT * FROM users";
      const clauses: string[] = [];
      const params: Record<string, unknown> = {};

      if (reqUser.role === "admin") {
        clauses.push("role != 'root'");
      } else if (reqUser.role === "user") {
        if (filter.id !== undefined && filter.id !== reqUser.id) return [];
        clauses.push("id = @self");
        params.self = reqUser.id;
      }

      if (filter.id !== undefined) {
        clauses.push("id = @id");
        params.id = filter.id;
      }

      if (clauses.length > 0) {
        sql += ` WHERE ${clauses.join(" AND ")}`;
      }
      sql += " ORDER BY id";

      const rows = db.prepare(sql).all(params) as RawRow[];
      return rows.map(rowToUser);
    },

    get(reqUser, id) {
      const [user] = manager.list(reqUser, { id });
      if (!user) {
        throw new NotFoundError(`User with ID ${id} is not found.`, { id });
      }
      return user;
    },

    update(reqUser, id, changes) {
      for (const field of Object.keys(changes)) {
        if (!UPDATABLE_FIELDS.has(field)) {
          throw new FilterNotValidError(`Field ${field} is not a valid field`);
        }
      }

      const target = manager.get(reqUser, id);

      // Anyone may edit their own name and e-mail address.
      const ownProfileOnly =
        target.id === reqUser.id &&
        changes.username === undefined &&
        changes.role === undefined;
      if (!ownProfileOnly) {
        assertMayManage(reqUser, "change", target.role, changes.role);
      }

      withIntegrity("User already exists", () =>
        updateStmt.run({
          id,
          fullname: changes.fullname ?? target.fullname,
          username: changes.username ?? target.username,
          email: changes.email ?? target.email,
          role: changes.role ?? target.role,
        }),
      );

      return manager.get(reqUser, id);
    },

    delete(reqUser, id) {
      if (reqUser.role === "user") {
        throw new PermissionDeniedError("A normal user cannot delete users");
      }

      const target = findById(id);
      if (!target) {
        throw new NotFoundError(`User with ID ${id} is not found.`, { id });
      }
      assertMayManage(reqUser, "delete", target.role);
      if (target.id === reqUser.id) {
        throw new PermissionDeniedError("You cannot remove your own user account");
      }

      withIntegrity(
        "User couldn't be deleted because it still has resources connected to it",
        () => deleteStmt.run({ id }),
      );
    },

    changePassword(reqUser, currentPassword, newPassword) {
      const row = findByIdStmt.get({ id: reqUser.id }) as RawRow | undefined;
      if (!row) {
        throw new NotFoundError(`User with ID ${reqUser.id} is not found.`, { id: reqUser.id });
      }
      if (!verifyPassword(currentPassword, row.password)) {
        throw new PermissionDeniedError("Current password is not correct");
      }
      setPasswordStmt.run({
        id: reqUser.id,
        password: hashPassword(newPassword),
        password_date: nowIso(),
      });
    },

    findById,

    findByUsername(username) {
      const row = findByUsernameStmt.get({ username }) as RawRow | undefined;
      return row ? rowToUser(row) : undefined;
    },

    count() {
      const row = countStmt.get() as { cnt: number };
      return row.cnt;
    },
  };

  return manager;
}
