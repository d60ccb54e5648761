import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import Database from "better-sqlite3";

export type SqliteDb = Database.Database;

const MIGRATIONS_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../migrations");

export function openDb(sqlitePath: string): SqliteDb {
  if (sqlitePath !== ":memory:") {
    fs.mkdirSync(path.dirname(path.resolve(sqlitePath)), { recursive: true });
  }
  const db = new Database(sqlitePath);
  db.pragma("journal_mode = WAL");
  return db;
}

/** Applies every migration in order. Each file is written to be re-runnable. */
export function applyMigrations(db: SqliteDb, migrationsDir: string = MIGRATIONS_DIR): string[] {
  const files = fs
    .readdirSync(migrationsDir)
    .filter((f) => f.endsWith(".sql"))
    .sort();
  for (const file of files) {
    db.exec(fs.readFileSync(path.join(migrationsDir, file), "utf8"));
  }
  return files;
}
