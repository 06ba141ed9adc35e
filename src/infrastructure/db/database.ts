import Database from "better-sqlite3";

export type Connection = Database.Database;

export interface DatabaseOptions {
  path: string;
  busyTimeoutMs?: number;
}

export const CREATE_TASKS_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    description TEXT NOT NULL,
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
    is_completed INTEGER NOT NULL DEFAULT 0
);
`;

/**
 * Opens a connection with the pragmas every connection needs.
 * Callers own the connection; prefer `withConnection`.
 */
export function openConnection(options: DatabaseOptions): Connection {
  const db = new Database(options.path);
  try {
    db.pragma("foreign_keys = ON");
    db.pragma(`busy_timeout = ${Math.trunc(options.busyTimeoutMs ?? 5000)}`);
  } catch (err) {
    db.close();
    throw err;
  }
  return db;
}

/** Runs `fn` on a fresh connection and always closes it afterwards. */
export function withConnection<T>(options: DatabaseOptions, fn: (db: Connection) => T): T {
  const db = openConnection(options);
  try {
    return fn(db);
  } finally {
    db.close();
  }
}

/** Column names of the tasks table; empty when the table does not exist. */
export function getTaskColumns(db: Connection): Set<string> {
  const rows = db
    .prepare<[], { name: string }>("SELECT name FROM pragma_table_info('tasks')")
    .all();
  return new Set(rows.map((row) => row.name));
}

/**
 * Creates the tasks table when missing and brings older tables forward.
 * `created_at` cannot be added later (SQLite refuses a non-constant default
 * in ALTER TABLE), so tables without it keep working without ordering.
 */
export function initSchema(options: DatabaseOptions & { reset?: boolean }): void {
  withConnection(options, (db) => {
    if (options.reset) {
      db.exec("DROP TABLE IF EXISTS tasks");
    }
    db.exec(CREATE_TASKS_TABLE_SQL);

    if (!getTaskColumns(db).has("is_completed")) {
      db.exec("ALTER TABLE tasks ADD COLUMN is_completed INTEGER NOT NULL DEFAULT 0");
    }
  });
}
