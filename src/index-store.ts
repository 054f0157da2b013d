// src/index-store.ts
//
// Read side of the index.

import type { Database } from "./db.js";
import { openReadDb } from "./db.js";
import { decodeMetadata } from "./metadata.js";
import {
  parseScanState,
  type FileRecord,
  type FileStatus,
  type ScanState,
} from "./model.js";

export interface RecordRow {
  path: string;
  size: number;
  mtime: number;
  fingerprint: string;
  metadata: string | null;
  scan_state: string;
  last_scanned_at: number | null;
  last_error: string | null;
  failure_count: number | null;
}

export const RECORD_COLUMNS = `path, size, mtime, fingerprint, metadata, scan_state,
  last_scanned_at, last_error, failure_count`;

export function rowToRecord(row: RecordRow): FileRecord {
  return {
    path: row.path,
    size: Number(row.size ?? 0),
    mtime: Number(row.mtime ?? 0),
    contentFingerprint: row.fingerprint ?? "",
    metadata: decodeMetadata(row.metadata),
    scanState: parseScanState(row.scan_state),
    lastScannedAt: row.last_scanned_at ?? null,
    lastError: row.last_error ?? null,
    failureCount: Number(row.failure_count ?? 0),
  };
}

export interface QueryFilter {
  pathPrefix?: string;
  scanState?: ScanState | ScanState[];
  series?: string;
  publisher?: string;
  /** case-insensitive substring match */
  title?: string;
  tag?: string;
  minFailures?: number;
  /** rows fetched per round trip */
  pageSize?: number;
}

function escapeLike(s: string): string {
  return s.replace(/[\\%_]/g, (c) => `\\${c}`);
}

function buildWhere(filter: QueryFilter): { sql: string; params: unknown[] } {
  const clauses: string[] = [];
  const params: unknown[] = [];
  if (filter.pathPrefix) {
    // instr() is case-sensitive, unlike LIKE
    clauses.push(`instr(path, ?) = 1`);
    params.push(filter.pathPrefix);
  }
  if (filter.scanState) {
    const states = Array.isArray(filter.scanState)
      ? filter.scanState
      : [filter.scanState];
    clauses.push(`scan_state IN (${states.map(() => "?").join(",")})`);
    params.push(...states);
  }
  if (filter.series) {
    clauses.push(`series = ? COLLATE NOCASE`);
    params.push(filter.series);
  }
  if (filter.publisher) {
    clauses.push(`publisher = ? COLLATE NOCASE`);
    params.push(filter.publisher);
  }
  if (filter.title) {
    clauses.push(`title LIKE ? ESCAPE '\\'`);
    params.push(`%${escapeLike(filter.title)}%`);
  }
  if (filter.tag) {
    clauses.push(
      `EXISTS (SELECT 1 FROM json_each(
                  CASE WHEN json_valid(metadata) THEN metadata ELSE '{}' END,
                  '$.tags.value') t
                WHERE t.value = ? COLLATE NOCASE)`,
    );
    params.push(filter.tag);
  }
  if (filter.minFailures != null) {
    clauses.push(`failure_count >= ?`);
    params.push(filter.minFailures);
  }
  return { sql: clauses.join(" AND "), params };
}

export class IndexStore {
  private constructor(private readonly db: Database) {}

  static open(dbPath: string): IndexStore {
    return new IndexStore(openReadDb(dbPath));
  }

  get(path: string): FileRecord | null {
    const row = this.db
      .prepare(`SELECT ${RECORD_COLUMNS} FROM file_records WHERE path = ?`)
      .get(path) as RecordRow | undefined;
    return row ? rowToRecord(row) : null;
  }

  /**
   * Lazily page through matching records in path order. Each page is a fresh
   * statement, so a long iteration never pins an old snapshot and calling
   * query() again always starts from the latest committed state.
   */
  *query(filter: QueryFilter = {}): Generator<FileRecord, void, undefined> {
    const pageSize = Math.max(1, filter.pageSize ?? 500);
    const where = buildWhere(filter);
    const stmt = this.db.prepare(
      `SELECT ${RECORD_COLUMNS} FROM file_records
        WHERE path > ? ${where.sql ? `AND ${where.sql}` : ""}
        ORDER BY path
        LIMIT ?`,
    );
    let after = "";
    while (true) {
      const rows = stmt.all(after, ...where.params, pageSize) as RecordRow[];
      for (const row of rows) {
        yield rowToRecord(row);
      }
      if (rows.length < pageSize) return;
      after = rows[rows.length - 1].path;
    }
  }

  status(path: string): FileStatus | null {
    const row = this.db
      .prepare(
        `SELECT path, scan_state, last_error, last_scanned_at, failure_count
           FROM file_records WHERE path = ?`,
      )
      .get(path) as
      | Pick<
          RecordRow,
          | "path"
          | "scan_state"
          | "last_error"
          | "last_scanned_at"
          | "failure_count"
        >
      | undefined;
    if (!row) return null;
    return {
      path: row.path,
      scanState: parseScanState(row.scan_state),
      lastError: row.last_error ?? null,
      lastScannedAt: row.last_scanned_at ?? null,
      failureCount: Number(row.failure_count ?? 0),
    };
  }

  countByState(): Record<ScanState, number> {
    const out: Record<ScanState, number> = {
      unscanned: 0,
      queued: 0,
      scanning: 0,
      clean: 0,
      failed: 0,
    };
    const rows = this.db
      .prepare(
        `SELECT scan_state, COUNT(*) AS n FROM file_records GROUP BY scan_state`,
      )
      .all() as { scan_state: string; n: number }[];
    for (const row of rows) {
      out[parseScanState(row.scan_state)] += row.n;
    }
    return out;
  }

  *listPaths(prefix?: string): Generator<string, void, undefined> {
    for (const rec of this.query({ pathPrefix: prefix, pageSize: 1000 })) {
      yield rec.path;
    }
  }

  close(): void {
    if (this.db.open) this.db.close();
  }
}
