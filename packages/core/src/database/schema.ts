import Database from 'better-sqlite3'

const CREATE_TABLES_SQL = [
  `CREATE TABLE IF NOT EXISTS users (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  created TEXT NOT NULL,
  fullname TEXT NOT NULL,
  username TEXT NOT NULL UNIQUE,
  email TEXT NOT NULL UNIQUE,
  role TEXT NOT NULL CHECK (role IN ('root', 'admin', 'user')),
  password TEXT NOT NULL,
  password_date TEXT,
  second_factor TEXT
)`,
  `CREATE TABLE IF NOT EXISTS api_clients (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  created TEXT NOT NULL,
  expires TEXT,
  user_id INTEGER NOT NULL REFERENCES users (id),
  enabled INTEGER NOT NULL DEFAULT 1,
  app_name TEXT NOT NULL,
  app_publisher TEXT NOT NULL,
  token TEXT NOT NULL UNIQUE,
  UNIQUE (app_name, app_publisher)
)`,
  `CREATE TABLE IF NOT EXISTS api_tokens (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  created TEXT NOT NULL,
  expires TEXT,
  client_id INTEGER NOT NULL REFERENCES api_clients (id) ON DELETE CASCADE,
  user_id INTEGER NOT NULL REFERENCES users (id),
  enabled INTEGER NOT NULL DEFAULT 1,
  token TEXT NOT NULL UNIQUE
)`,
  `CREATE TABLE IF NOT EXISTS api_scopes (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  module TEXT NOT NULL,
  subject TEXT NOT NULL,
  UNIQUE (module, subject)
)`,
  `CREATE TABLE IF NOT EXISTS api_token_scopes (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  token_id INTEGER NOT NULL REFERENCES api_tokens (id) ON DELETE CASCADE,
  scope_id INTEGER NOT NULL REFERENCES api_scopes (id),
  UNIQUE (token_id, scope_id)
)`,
  `CREATE TABLE IF NOT EXISTS tags (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id INTEGER NOT NULL REFERENCES users (id),
  title TEXT NOT NULL,
  UNIQUE (user_id, title)
)`,
  `CREATE TABLE IF NOT EXISTS date_tags (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  date TEXT NOT NULL,
  tag_id INTEGER NOT NULL REFERENCES tags (id),
  UNIQUE (date, tag_id)
)`,
  `CREATE TABLE IF NOT EXISTS notes (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  created TEXT NOT NULL,
  user_id INTEGER NOT NULL REFERENCES users (id),
  type TEXT NOT NULL CHECK (type IN ('plain', 'markdown')),
  title TEXT NOT NULL,
  body TEXT NOT NULL
)`,
  `CREATE TABLE IF NOT EXISTS web_ui_settings (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id INTEGER NOT NULL REFERENCES users (id),
  setting TEXT NOT NULL,
  value TEXT NOT NULL,
  UNIQUE (user_id, setting)
)`,
]

const CREATE_INDEXES_SQL = [
  'CREATE INDEX IF NOT EXISTS idx_api_tokens_user_id ON api_tokens (user_id)',
  'CREATE INDEX IF NOT EXISTS idx_tags_user_id ON tags (user_id)',
  'CREATE INDEX IF NOT EXISTS idx_date_tags_date ON date_tags (date)',
  'CREATE INDEX IF NOT EXISTS idx_notes_user_id ON notes (user_id)',
]

export const TABLE_NAMES = [
  'users',
  'api_clients',
  'api_tokens',
  'api_scopes',
  'api_token_scopes',
  'tags',
  'date_tags',
  'notes',
  'web_ui_settings',
] as const

/** Open/create SQLite database, enforce foreign keys, set WAL, create tables */
export function initializeDatabase(dbPath: string): Database.Database {
  const db = new Database(dbPath)

  db.pragma('journal_mode = WAL')
  db.pragma('foreign_keys = ON')

  for (const sql of [...CREATE_TABLES_SQL, ...CREATE_INDEXES_SQL]) {
    db.exec(sql)
  }

  return db
}
