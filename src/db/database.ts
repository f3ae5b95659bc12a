import Database from "better-sqlite3";
import { mkdirSync, readdirSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { logger } from "../logger.js";

const MIGRATION_DIR = resolve(__dirname, "../../migrations");

let _db: Database.Database | null = null;

/** Open a database at `path` (or ":memory:") and bring its schema up to date. */
export function openDatabase(path: string): Database.Database {
  const inMemory = path === ":memory:";
  const dbPath = inMemory ? path : resolve(path);
  if (!inMemory) mkdirSync(dirname(dbPath), { recursive: true });

  const db = new Database(dbPath);
  if (!inMemory) db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  runMigrations(db);
  logger.info({ dbPath }, "Database opened");
  return db;
}

/** Process-wide handle, opened on first use. */
export function getDb(path: string): Database.Database {
  if (!_db) _db = openDatabase(path);
  return _db;
}

function runMigrations(db: Database.Database): void {
  db.exec("CREATE TABLE IF NOT EXISTS schema_migrations (name TEXT PRIMARY KEY, applied_at INTEGER NOT NULL)");
  const applied = new Set(
    db
      .prepare("SELECT name FROM schema_migrations")
      .pluck()
      .all()
      .filter((name): name is string => typeof name === "string"),
  );

  // Files run in name order: 001_…, 002_…
  const files = readdirSync(MIGRATION_DIR)
    .filter((f) => f.endsWith(".sql"))
    .sort();

  for (const file of files) {
    if (applied.has(file)) continue;
    const sql = readFileSync(join(MIGRATION_DIR, file), "utf-8");
    db.transaction(() => {
      db.exec(sql);
      db.prepare("INSERT INTO schema_migrations (name, applied_at) VALUES (?, ?)").run(file, Date.now());
    })();
    logger.info({ migration: file }, "Migration applied");
  }

  logger.debug("Database migrations applied");
}

export function closeDb(): void {
  if (_db) {
    _db.close();
    _db = null;
    logger.info("Database closed");
  }
}
