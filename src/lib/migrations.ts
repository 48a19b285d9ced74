import { type DatabaseConnection, numberColumn } from "./db";
import * as migration001 from "./migrations/001_initial_schema";

interface Migration {
  version: number;
  name: string;
  up: (db: DatabaseConnection) => void;
}

const migrations: Migration[] = [migration001];

export function runMigrations(db: DatabaseConnection): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const applied = db.all("SELECT version FROM _migrations ORDER BY version");
  const appliedVersions = new Set(applied.map((row) => numberColumn(row, "version")));

  for (const migration of migrations) {
    if (!appliedVersions.has(migration.version)) {
      db.transaction(() => {
        migration.up(db);
        db.run("INSERT INTO _migrations (version, name) VALUES (?, ?)", [
          migration.version,
          migration.name,
        ]);
      });
    }
  }
}
