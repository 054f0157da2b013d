import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import BetterSqlite3 from "better-sqlite3";
import { SCHEMA_VERSION } from "./constants.js";

export type Database = BetterSqlite3.Database;

const WRITER_PRAGMAS = [
  "busy_timeout = 5000",
  "journal_mode = WAL",
  // FULL: a commit is on disk before it is acknowledged
  "synchronous = FULL",
  "temp_store = DEFAULT",
  "foreign_keys = ON",
];

type Migration = { version: number; up: (db: Database) => void };

const MIGRATIONS: Migration[] = [
  {
    version: 1,
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS file_records (
          path             TEXT PRIMARY KEY NOT NULL,
          size             INTEGER NOT NULL DEFAULT 0,
          mtime            REAL NOT NULL DEFAULT 0,
          fingerprint      TEXT NOT NULL DEFAULT '',
          metadata         TEXT NOT NULL DEFAULT '{}',
          scan_state       TEXT NOT NULL DEFAULT 'unscanned',
          last_scanned_at  INTEGER,
          last_error       TEXT,
          failure_count    INTEGER NOT NULL DEFAULT 0,
          updated_at       INTEGER NOT NULL DEFAULT 0
        );
        CREATE INDEX IF NOT EXISTS file_records_state_idx
          ON file_records(scan_state, path);
      `);
    },
  },
  {
    // denormalized search columns, backfilled from the metadata blob
    version: 2,
    up: (db) => {
      addColumn(db, "file_records", "series TEXT");
      addColumn(db, "file_records", "title TEXT");
      addColumn(db, "file_records", "issue_number TEXT");
      addColumn(db, "file_records", "publisher TEXT");
      db.exec(`
        UPDATE file_records SET
          series = json_extract(metadata, '$.series.value'),
          title = json_extract(metadata, '$.title.value'),
          issue_number = json_extract(metadata, '$.number.value'),
          publisher = json_extract(metadata, '$.publisher.value')
        WHERE json_valid(metadata);
        CREATE INDEX IF NOT EXISTS file_records_series_idx
          ON file_records(series COLLATE NOCASE);
        CREATE INDEX IF NOT EXISTS file_records_publisher_idx
          ON file_records(publisher COLLATE NOCASE);
      `);
    },
  },
];

function addColumn(db: Database, table: string, columnDef: string) {
  const name = columnDef.split(/\s+/)[0];
  const cols = db.prepare(`PRAGMA table_info(${table})`).all() as {
    name: string;
  }[];
  if (cols.some((c) => c.name === name)) return;
  db.exec(`ALTER TABLE ${table} ADD COLUMN ${columnDef}`);
}

export function getSchemaVersion(db: Database): number {
  const row = db
    .prepare(`SELECT value FROM meta WHERE key = 'schema_version'`)
    .get() as { value: string } | undefined;
  const n = Number(row?.value ?? 0);
  return Number.isFinite(n) ? n : 0;
}

function migrate(db: Database, target: number) {
  db.exec(`
    CREATE TABLE IF NOT EXISTS meta (
      key   TEXT PRIMARY KEY NOT NULL,
      value TEXT
    );
  `);
  const current = getSchemaVersion(db);
  const pending = MIGRATIONS.filter(
    (m) => m.version > current && m.version <= target,
  );
  if (!pending.length) return;
  const apply = db.transaction(() => {
    for (const m of pending) {
      m.up(db);
    }
    db.prepare(
      `INSERT INTO meta(key, value) VALUES('schema_version', ?)
       ON CONFLICT(key) DO UPDATE SET value = excluded.value`,
    ).run(String(pending[pending.length - 1].version));
  });
  apply.immediate();
}

/**
 * Open the index for writing and bring the schema up to date. Exactly one
 * handle of this kind should exist per database file; it belongs to the
 * index writer.
 */
export function openWriteDb(
  dbPath: string,
  { schemaVersion = SCHEMA_VERSION }: { schemaVersion?: number } = {},
): Database {
  mkdirSync(dirname(dbPath), { recursive: true });
  const db = new BetterSqlite3(dbPath);
  for (const pragma of WRITER_PRAGMAS) {
    db.pragma(pragma);
  }
  migrate(db, schemaVersion);
  return db;
}

/**
 * Read-only handle. Under WAL a reader sees the last committed state at the
 * start of each statement and never waits for the writer.
 */
export function openReadDb(dbPath: string): Database {
  const db = new BetterSqlite3(dbPath, { readonly: true, fileMustExist: true });
  db.pragma("busy_timeout = 5000");
  return db;
}
