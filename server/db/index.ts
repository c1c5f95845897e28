/**
 * Mapping database
 *
 * A single SQLite file holds the saved friendly names. Its path comes from
 * BAC_DB_PATH; the directory is created on first run.
 */

import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { runMigrations } from "./migrations.js";

const IN_MEMORY = ":memory:";

let db: Database.Database | null = null;

export function getDbPath(env: NodeJS.ProcessEnv = process.env): string {
  const dbPath = env.BAC_DB_PATH?.trim();
  if (!dbPath) {
    throw new Error("BAC_DB_PATH environment variable is not set");
  }
  return dbPath;
}

/**
 * Open a mapping database and bring its schema up to date
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath === IN_MEMORY) {
    const memory = new Database(IN_MEMORY);
    runMigrations(memory);
    return memory;
  }

  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  console.log(`${fs.existsSync(dbPath) ? "Using" : "Creating"} mapping database at ${dbPath}`);

  const database = new Database(dbPath);
  database.pragma("journal_mode = WAL");
  runMigrations(database);
  return database;
}

/**
 * Open the database named by BAC_DB_PATH once per process
 */
export function initializeDatabase(): Database.Database {
  if (!db) {
    db = openDatabase(getDbPath());
  }
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}
