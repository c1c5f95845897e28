import type Database from "better-sqlite3";

interface Migration {
  version: number;
  name: string;
  up: string;
}

const migrations: Migration[] = [
  {
    version: 1,
    name: "create_account_mapping_tables",
    up: `
      -- Friendly names for BAC-to-BAC (TEF) destination accounts
      CREATE TABLE IF NOT EXISTS account_mapping (
        account_number TEXT PRIMARY KEY,
        friendly_name TEXT NOT NULL,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        last_used TEXT NOT NULL DEFAULT (datetime('now'))
      );

      -- Friendly names for SINPE (interbank) destination accounts
      CREATE TABLE IF NOT EXISTS sinpe_account_mapping (
        account_number TEXT PRIMARY KEY,
        friendly_name TEXT NOT NULL,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        last_used TEXT NOT NULL DEFAULT (datetime('now'))
      );
    `,
  },
];

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

function getAppliedMigrations(db: Database.Database): Set<number> {
  const rows = db.prepare<[], { version: number }>("SELECT version FROM schema_migrations").all();
  return new Set(rows.map((row) => row.version));
}

export function runMigrations(db: Database.Database): void {
  ensureMigrationsTable(db);

  const applied = getAppliedMigrations(db);
  const pending = migrations.filter((m) => !applied.has(m.version));

  if (pending.length === 0) {
    console.log("No pending migrations");
    return;
  }

  for (const migration of pending) {
    console.log(`Running migration ${migration.version}: ${migration.name}`);

    db.transaction(() => {
      db.exec(migration.up);
      db.prepare("INSERT INTO schema_migrations (version, name) VALUES (?, ?)").run(
        migration.version,
        migration.name
      );
    })();

    console.log(`Migration ${migration.version} completed`);
  }
}
