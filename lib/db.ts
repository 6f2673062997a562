import path from "node:path";
import fs from "node:fs";
import { createRequire } from "node:module";
import type { Database as SqlJsRawDatabase, SqlJsStatic } from "sql.js";
import { getDatabasePath } from "./config";

const esmRequire = createRequire(import.meta.url);
const initSqlJs = esmRequire("sql.js") as (config?: Record<string, unknown>) => Promise<SqlJsStatic>;
const SQL = await initSqlJs();

export const SCHEMA_VERSION = 1;

export class SchemaMismatchError extends Error {
  constructor(
    public readonly found: number,
    public readonly expected: number
  ) {
    super(
      `Database schema version mismatch: found v${found}, expected v${expected}. Delete the database file to recreate it.`
    );
    this.name = "SchemaMismatchError";
  }
}

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS schema_version (version INTEGER NOT NULL);

CREATE TABLE IF NOT EXISTS extractions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  PDFFileName TEXT NOT NULL,
  JSONContent TEXT NOT NULL,
  CreatedAt TEXT NOT NULL
);
`;

// ---------------------------------------------------------------------------
// sql.js wrapper — provides the same API surface as better-sqlite3
// ---------------------------------------------------------------------------

type SqlParams = Parameters<SqlJsRawDatabase["run"]>[1];

export class SqlJsDatabase {
  private db: SqlJsRawDatabase;
  private dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = dbPath;
    if (fs.existsSync(dbPath)) {
      const buffer = fs.readFileSync(dbPath);
      this.db = new SQL.Database(buffer);
    } else {
      this.db = new SQL.Database();
    }
  }

  prepare(sql: string) {
    const self = this;
    return {
      run(...params: unknown[]) {
        self.db.run(sql, params as SqlParams);
        const changes = self.db.getRowsModified();
        self.persist();
        return { changes };
      },
      get(...params: unknown[]): Record<string, unknown> | undefined {
        const stmt = self.db.prepare(sql);
        if (params.length > 0) {
          stmt.bind(params as SqlParams);
        }
        if (stmt.step()) {
          const row = stmt.getAsObject();
          stmt.free();
          return row;
        }
        stmt.free();
        return undefined;
      },
      all(...params: unknown[]): Record<string, unknown>[] {
        const stmt = self.db.prepare(sql);
        if (params.length > 0) {
          stmt.bind(params as SqlParams);
        }
        const rows: Record<string, unknown>[] = [];
        while (stmt.step()) {
          rows.push(stmt.getAsObject());
        }
        stmt.free();
        return rows;
      },
    };
  }

  exec(sql: string): void {
    this.db.exec(sql);
    this.persist();
  }

  close(): void {
    this.persist();
    this.db.close();
  }

  private persist(): void {
    const data = this.db.export();
    const dir = path.dirname(this.dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.dbPath, Buffer.from(data));
  }
}

// ---------------------------------------------------------------------------
// Connection cache, keyed by resolved file path
// ---------------------------------------------------------------------------

const globalForDb = globalThis as unknown as {
  __dbConnections?: Map<string, SqlJsDatabase>;
};
const connections = globalForDb.__dbConnections ?? new Map<string, SqlJsDatabase>();
globalForDb.__dbConnections = connections;

export function getDb(dbPath = getDatabasePath()): SqlJsDatabase {
  const resolved = path.resolve(dbPath);
  const existing = connections.get(resolved);
  if (existing) return existing;

  const db = new SqlJsDatabase(resolved);
  initSchema(db);
  connections.set(resolved, db);
  return db;
}

function initSchema(db: SqlJsDatabase): void {
  const hasVersionTable = db
    .prepare(
      "SELECT name FROM sqlite_master WHERE type='table' AND name='schema_version'"
    )
    .get() as { name: string } | undefined;

  if (!hasVersionTable) {
    // Fresh DB — create everything
    db.exec(SCHEMA_SQL);
    db.prepare("INSERT INTO schema_version (version) VALUES (?)").run(
      SCHEMA_VERSION
    );
    return;
  }

  // Existing DB — check version matches exactly
  const row = db
    .prepare("SELECT version FROM schema_version LIMIT 1")
    .get() as { version: number } | undefined;
  const existing = row?.version ?? 0;

  if (existing !== SCHEMA_VERSION) {
    db.close();
    throw new SchemaMismatchError(existing, SCHEMA_VERSION);
  }
}

export function closeAllDbs(): void {
  for (const [dbPath, db] of connections) {
    db.close();
    connections.delete(dbPath);
  }
}
