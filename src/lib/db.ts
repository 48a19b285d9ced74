import { existsSync, readFileSync, writeFileSync } from "node:fs";
import initSqlJs, {
  type BindParams,
  type Database,
  type ParamsObject,
  type SqlJsStatic,
  type SqlValue,
} from "sql.js";

export type Row = ParamsObject;

let _sqlJs: Promise<SqlJsStatic> | null = null;

function loadSqlJs(): Promise<SqlJsStatic> {
  if (!_sqlJs) _sqlJs = initSqlJs();
  return _sqlJs;
}

/** SQLite connection on sql.js. A file-backed connection writes the whole
 * database back to `path` after every write outside a transaction.
 */
export class DatabaseConnection {
  private depth = 0;

  constructor(
    private db: Database,
    readonly path: string | null = null,
  ) {
    this.db.run("PRAGMA foreign_keys = ON");
  }

  exec(sql: string): void {
    this.db.exec(sql);
    this.persist();
  }

  /** Run a write statement; returns the number of changed rows */
  run(sql: string, params: BindParams = []): number {
    this.db.run(sql, params);
    const changes = this.db.getRowsModified();
    this.persist();
    return changes;
  }

  all(sql: string, params: BindParams = []): Row[] {
    const stmt = this.db.prepare(sql);
    try {
      stmt.bind(params);
      const rows: Row[] = [];
      while (stmt.step()) rows.push(stmt.getAsObject());
      return rows;
    } finally {
      stmt.free();
    }
  }

  get(sql: string, params: BindParams = []): Row | null {
    return this.all(sql, params)[0] ?? null;
  }

  /** Run `fn` inside BEGIN/COMMIT, rolling back if it throws */
  transaction<T>(fn: () => T): T {
    this.db.exec("BEGIN");
    this.depth++;
    let result: T;
    try {
      result = fn();
    } catch (err) {
      this.db.exec("ROLLBACK");
      throw err;
    } finally {
      this.depth--;
    }
    this.db.exec("COMMIT");
    this.persist();
    return result;
  }

  close(): void {
    this.persist();
    this.db.close();
  }

  private persist(): void {
    if (!this.path || this.depth > 0) return;
    writeFileSync(this.path, this.db.export());
    // export() reopens the database, which resets pragmas
    this.db.run("PRAGMA foreign_keys = ON");
  }
}

let _db: DatabaseConnection | null = null;

export async function getDatabase(path?: string): Promise<DatabaseConnection> {
  if (!_db) {
    const file = path ?? "adaptest.db";
    const SQL = await loadSqlJs();
    const data = existsSync(file) ? readFileSync(file) : null;
    _db = new DatabaseConnection(new SQL.Database(data), file);
  }
  return _db;
}

export function closeDatabase(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}

export async function createTestDatabase(): Promise<DatabaseConnection> {
  const SQL = await loadSqlJs();
  return new DatabaseConnection(new SQL.Database());
}

function column(row: Row, name: string): SqlValue {
  if (!(name in row)) throw new Error(`Missing column ${name}`);
  return row[name];
}

export function textColumn(row: Row, name: string): string {
  const value = column(row, name);
  if (typeof value !== "string") throw new Error(`Column ${name} is not text`);
  return value;
}

export function nullableTextColumn(row: Row, name: string): string | null {
  const value = column(row, name);
  return value === null ? null : textColumn(row, name);
}

export function numberColumn(row: Row, name: string): number {
  const value = column(row, name);
  if (typeof value !== "number") throw new Error(`Column ${name} is not numeric`);
  return value;
}

export function nullableNumberColumn(row: Row, name: string): number | null {
  const value = column(row, name);
  return value === null ? null : numberColumn(row, name);
}
