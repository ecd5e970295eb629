import { mkdirSync } from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import {
  type BetterSQLite3Database,
  drizzle,
} from "drizzle-orm/better-sqlite3";
import {
  ACTIVITY_LOG_TABLE,
  APP_USAGE_TABLE,
  SETTINGS_TABLE,
  WORK_SESSIONS_TABLE,
  schema,
} from "./schema";

export type WorktallyDatabase = BetterSQLite3Database<typeof schema>;

export const IN_MEMORY_DATABASE = ":memory:";

let database: WorktallyDatabase | null = null;
let connection: Database.Database | null = null;

const createTables = (sqlite: Database.Database): void => {
  sqlite
    .prepare(
      `
        CREATE TABLE IF NOT EXISTS ${WORK_SESSIONS_TABLE} (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          punch_in INTEGER NOT NULL,
          punch_out INTEGER,
          is_active INTEGER NOT NULL DEFAULT 1,
          total_productive_sec INTEGER NOT NULL DEFAULT 0,
          total_unproductive_sec INTEGER NOT NULL DEFAULT 0
        )
      `,
    )
    .run();
  sqlite
    .prepare(
      `
        CREATE INDEX IF NOT EXISTS work_sessions_active_idx
        ON ${WORK_SESSIONS_TABLE}(is_active)
      `,
    )
    .run();

  sqlite
    .prepare(
      `
        CREATE TABLE IF NOT EXISTS ${APP_USAGE_TABLE} (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          session_id INTEGER NOT NULL REFERENCES ${WORK_SESSIONS_TABLE}(id),
          app_name TEXT NOT NULL,
          window_title TEXT NOT NULL,
          category TEXT NOT NULL,
          productive INTEGER NOT NULL,
          start_time INTEGER NOT NULL,
          end_time INTEGER,
          duration_sec INTEGER
        )
      `,
    )
    .run();
  sqlite
    .prepare(
      `
        CREATE INDEX IF NOT EXISTS app_usage_session_idx
        ON ${APP_USAGE_TABLE}(session_id)
      `,
    )
    .run();

  sqlite
    .prepare(
      `
        CREATE TABLE IF NOT EXISTS ${ACTIVITY_LOG_TABLE} (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          session_id INTEGER NOT NULL REFERENCES ${WORK_SESSIONS_TABLE}(id),
          timestamp INTEGER NOT NULL,
          face_present INTEGER NOT NULL,
          input_active INTEGER NOT NULL,
          screen_category TEXT NOT NULL,
          productive INTEGER NOT NULL,
          timer_state TEXT NOT NULL,
          elapsed_productive_sec REAL NOT NULL
        )
      `,
    )
    .run();

  sqlite
    .prepare(
      `
        CREATE TABLE IF NOT EXISTS ${SETTINGS_TABLE} (
          key TEXT PRIMARY KEY NOT NULL,
          value TEXT NOT NULL
        )
      `,
    )
    .run();
};

const createDatabase = (databasePath: string): WorktallyDatabase => {
  if (databasePath !== IN_MEMORY_DATABASE) {
    mkdirSync(path.dirname(databasePath), { recursive: true });
  }

  const sqlite = new Database(databasePath);
  if (databasePath !== IN_MEMORY_DATABASE) {
    sqlite.pragma("journal_mode = WAL");
  }
  sqlite.pragma("foreign_keys = ON");
  createTables(sqlite);

  connection = sqlite;
  return drizzle(sqlite, {
    schema,
  });
};

/**
 * Opens the database on first call; later calls return the same handle and
 * ignore `databasePath`.
 */
export const initializeDatabase = (
  databasePath: string = IN_MEMORY_DATABASE,
): WorktallyDatabase => {
  if (database) {
    return database;
  }
  database = createDatabase(databasePath);
  return database;
};

export const getDatabase = (): WorktallyDatabase => {
  if (!database) {
    throw new Error("Database has not been initialized");
  }
  return database;
};

export const closeDatabase = (): void => {
  connection?.close();
  connection = null;
  database = null;
};
