// src/index-writer.ts
//
// The only component that writes to the index. Intents arrive on an
// in-memory channel and are applied one at a time, in submission order, each
// inside its own IMMEDIATE transaction on the single write connection.

import type { Database } from "./db.js";
import { openWriteDb } from "./db.js";
import {
  describeError,
  errorCode,
  ScanStateError,
  StoreTransactionError,
} from "./errors.js";
import type { HealthState } from "./health.js";
import { RECORD_COLUMNS, rowToRecord, type RecordRow } from "./index-store.js";
import { NullLogger, type Logger } from "./logger.js";
import { encodeMetadata, getString, type MetadataMap } from "./metadata.js";
import {
  canTransition,
  type FileRecord,
  type FileStats,
  type ScanState,
} from "./model.js";

export type WriteIntent =
  | { kind: "markQueued"; path: string }
  | { kind: "beginScan"; path: string }
  /** hand an uncommitted scan back to the queue (scanning -> queued) */
  | { kind: "releaseScan"; path: string }
  | {
      kind: "commitScan";
      path: string;
      stats: FileStats;
      fingerprint: string;
      metadata: MetadataMap;
      scannedAt: number;
      /** fingerprint matched: keep stored metadata and lastScannedAt */
      unchanged?: boolean;
    }
  | {
      kind: "commitFailure";
      path: string;
      error: string;
      stats?: FileStats;
      fingerprint?: string;
    }
  | { kind: "upsert"; record: FileRecord }
  | { kind: "delete"; path: string }
  | { kind: "rename"; from: string; to: string }
  | { kind: "recoverInterrupted" };

export type WriteOutcome =
  | { ok: true; applied: boolean; record: FileRecord | null; count?: number }
  | { ok: false; error: StoreTransactionError | ScanStateError };

type Applied = { applied: boolean; record: FileRecord | null; count?: number };

type Pending = {
  intent: WriteIntent;
  resolve: (outcome: WriteOutcome) => void;
};

const FATAL_CODES = new Set(["SQLITE_CORRUPT", "SQLITE_NOTADB"]);

export interface IndexWriterOptions {
  logger?: Logger;
  health?: HealthState;
  /** extra attempts after a failed transaction */
  retries?: number;
  /** test seam: runs inside the transaction before the intent is applied */
  beforeApply?: (intent: WriteIntent, attempt: number) => void;
}

function intentLabel(intent: WriteIntent): string {
  switch (intent.kind) {
    case "upsert":
      return `upsert ${intent.record.path}`;
    case "rename":
      return `rename ${intent.from} -> ${intent.to}`;
    case "recoverInterrupted":
      return "recoverInterrupted";
    default:
      return `${intent.kind} ${intent.path}`;
  }
}

export class IndexWriter {
  private readonly db: Database;
  private readonly logger: Logger;
  private readonly health?: HealthState;
  private readonly retries: number;
  private readonly beforeApply?: IndexWriterOptions["beforeApply"];

  private readonly pending: Pending[] = [];
  private wake: (() => void) | null = null;
  private closing = false;
  private readonly loop: Promise<void>;
  private degraded = false;

  private readonly selectStmt;
  private readonly insertStmt;
  private readonly setStateStmt;
  private readonly commitScanStmt;
  private readonly commitUnchangedStmt;
  private readonly commitFailureStmt;
  private readonly deleteStmt;
  private readonly renameStmt;
  private readonly recoverStmt;

  constructor(dbPath: string, opts: IndexWriterOptions = {}) {
    this.db = openWriteDb(dbPath);
    this.logger = opts.logger ?? new NullLogger();
    this.health = opts.health;
    this.retries = Math.max(0, opts.retries ?? 1);
    this.beforeApply = opts.beforeApply;

    this.selectStmt = this.db.prepare(
      `SELECT ${RECORD_COLUMNS} FROM file_records WHERE path = ?`,
    );
    this.insertStmt = this.db.prepare(
      `INSERT INTO file_records(path, size, mtime, fingerprint, metadata, scan_state,
         last_scanned_at, last_error, failure_count, updated_at,
         series, title, issue_number, publisher)
       VALUES (@path, @size, @mtime, @fingerprint, @metadata, @scan_state,
         @last_scanned_at, @last_error, @failure_count, @updated_at,
         @series, @title, @issue_number, @publisher)
       ON CONFLICT(path) DO UPDATE SET
         size = excluded.size,
         mtime = excluded.mtime,
         fingerprint = excluded.fingerprint,
         metadata = excluded.metadata,
         scan_state = excluded.scan_state,
         last_scanned_at = excluded.last_scanned_at,
         last_error = excluded.last_error,
         failure_count = excluded.failure_count,
         updated_at = excluded.updated_at,
         series = excluded.series,
         title = excluded.title,
         issue_number = excluded.issue_number,
         publisher = excluded.publisher`,
    );
    this.setStateStmt = this.db.prepare(
      `UPDATE file_records SET scan_state = ?, updated_at = ? WHERE path = ?`,
    );
    this.commitScanStmt = this.db.prepare(
      `UPDATE file_records SET
         size = @size, mtime = @mtime, fingerprint = @fingerprint,
         metadata = @metadata, series = @series, title = @title,
         issue_number = @issue_number, publisher = @publisher,
         scan_state = 'clean', last_scanned_at = @scanned_at,
         last_error = NULL, failure_count = 0, updated_at = @updated_at
       WHERE path = @path`,
    );
    this.commitUnchangedStmt = this.db.prepare(
      `UPDATE file_records SET
         scan_state = 'clean', last_error = NULL, failure_count = 0,
         updated_at = ?
       WHERE path = ?`,
    );
    this.commitFailureStmt = this.db.prepare(
      `UPDATE file_records SET
         size = COALESCE(@size, size), mtime = COALESCE(@mtime, mtime),
         fingerprint = COALESCE(@fingerprint, fingerprint),
         scan_state = 'failed', last_error = @error,
         failure_count = failure_count + 1, updated_at = @updated_at
       WHERE path = @path`,
    );
    this.deleteStmt = this.db.prepare(`DELETE FROM file_records WHERE path = ?`);
    this.renameStmt = this.db.prepare(
      `UPDATE file_records SET path = ?, updated_at = ? WHERE path = ?`,
    );
    this.recoverStmt = this.db.prepare(
      `UPDATE file_records SET scan_state = 'failed',
         last_error = 'scan interrupted', updated_at = ?
       WHERE scan_state = 'scanning'`,
    );

    this.loop = this.run();
  }

  /**
   * Queue an intent. The promise settles after its transaction committed, or
   * with `ok: false` once retries are exhausted; it never rejects.
   */
  submit(intent: WriteIntent): Promise<WriteOutcome> {
    if (this.closing) {
      return Promise.resolve({
        ok: false,
        error: new StoreTransactionError(
          "index writer is closed",
          intentLabel(intent),
        ),
      });
    }
    return new Promise((resolve) => {
      this.pending.push({ intent, resolve });
      const wake = this.wake;
      this.wake = null;
      wake?.();
    });
  }

  get backlog(): number {
    return this.pending.length;
  }

  /** Finish everything already submitted, then release the connection. */
  async close(): Promise<void> {
    if (!this.closing) {
      this.closing = true;
      const wake = this.wake;
      this.wake = null;
      wake?.();
    }
    await this.loop;
    if (this.db.open) this.db.close();
  }

  private async run(): Promise<void> {
    while (true) {
      const next = this.pending.shift();
      if (!next) {
        if (this.closing) return;
        await new Promise<void>((resolve) => {
          this.wake = resolve;
        });
        continue;
      }
      next.resolve(this.applyWithRetry(next.intent));
      // let readers and extraction run between commits
      await new Promise<void>((resolve) => setImmediate(resolve));
    }
  }

  private applyWithRetry(intent: WriteIntent): WriteOutcome {
    const label = intentLabel(intent);
    let lastErr: unknown;
    for (let attempt = 0; attempt <= this.retries; attempt++) {
      try {
        const result = this.db
          .transaction(() => {
            this.beforeApply?.(intent, attempt);
            return this.apply(intent);
          })
          .immediate();
        if (this.degraded) {
          this.degraded = false;
          this.health?.ok("store");
        }
        return { ok: true, ...result };
      } catch (err) {
        if (err instanceof ScanStateError) {
          this.logger.warn("rejected state transition", {
            path: err.path,
            from: err.from,
            to: err.to,
          });
          return { ok: false, error: err };
        }
        lastErr = err;
        const code = errorCode(err);
        if (code && FATAL_CODES.has(code)) {
          this.logger.error("index database is corrupt", {
            intent: label,
            code,
            error: describeError(err),
          });
          this.health?.set("store", "fatal", describeError(err));
          break;
        }
        if (attempt < this.retries) {
          this.logger.warn("transaction failed; retrying", {
            intent: label,
            error: describeError(err),
          });
        }
      }
    }
    const error = new StoreTransactionError(
      `commit failed: ${describeError(lastErr)}`,
      label,
      { cause: lastErr },
    );
    this.logger.error("transaction failed", {
      intent: label,
      error: error.message,
    });
    if (this.health?.get("store").level !== "fatal") {
      this.degraded = true;
      this.health?.set("store", "degraded", error.message);
    }
    return { ok: false, error };
  }

  private current(path: string): FileRecord | null {
    const row = this.selectStmt.get(path) as RecordRow | undefined;
    return row ? rowToRecord(row) : null;
  }

  private transition(path: string, from: ScanState, to: ScanState) {
    if (!canTransition(from, to)) {
      throw new ScanStateError(path, from, to);
    }
    this.setStateStmt.run(to, Date.now(), path);
  }

  private writeRecord(record: FileRecord) {
    const md = record.metadata;
    this.insertStmt.run({
      path: record.path,
      size: record.size,
      mtime: record.mtime,
      fingerprint: record.contentFingerprint,
      metadata: encodeMetadata(md),
      scan_state: record.scanState,
      last_scanned_at: record.lastScannedAt,
      last_error: record.lastError,
      failure_count: record.failureCount,
      updated_at: Date.now(),
      ...searchColumns(md),
    });
  }

  private apply(intent: WriteIntent): Applied {
    switch (intent.kind) {
      case "markQueued": {
        const cur = this.current(intent.path);
        if (!cur) {
          this.writeRecord(emptyRecord(intent.path, "queued"));
          return { applied: true, record: this.current(intent.path) };
        }
        // an in-flight scan keeps its state; the follow-up job is parked
        if (!canTransition(cur.scanState, "queued")) {
          return { applied: false, record: cur };
        }
        this.transition(intent.path, cur.scanState, "queued");
        return { applied: true, record: this.current(intent.path) };
      }
      case "beginScan": {
        const cur = this.current(intent.path);
        if (!cur) {
          this.writeRecord(emptyRecord(intent.path, "scanning"));
          return { applied: true, record: this.current(intent.path) };
        }
        if (cur.scanState !== "queued") {
          this.transition(intent.path, cur.scanState, "queued");
        }
        this.transition(intent.path, "queued", "scanning");
        return { applied: true, record: this.current(intent.path) };
      }
      case "releaseScan": {
        const cur = this.current(intent.path);
        if (!cur || cur.scanState !== "scanning") {
          throw new ScanStateError(
            intent.path,
            cur?.scanState ?? "missing",
            "queued",
          );
        }
        // not an edge of the state table: nothing was committed
        this.setStateStmt.run("queued", Date.now(), intent.path);
        return { applied: true, record: this.current(intent.path) };
      }
      case "commitScan": {
        const cur = this.current(intent.path);
        if (!cur || cur.scanState !== "scanning") {
          throw new ScanStateError(
            intent.path,
            cur?.scanState ?? "missing",
            "clean",
          );
        }
        if (intent.unchanged) {
          this.commitUnchangedStmt.run(Date.now(), intent.path);
        } else {
          this.commitScanStmt.run({
            path: intent.path,
            size: intent.stats.size,
            mtime: intent.stats.mtime,
            fingerprint: intent.fingerprint,
            metadata: encodeMetadata(intent.metadata),
            scanned_at: intent.scannedAt,
            updated_at: Date.now(),
            ...searchColumns(intent.metadata),
          });
        }
        return { applied: true, record: this.current(intent.path) };
      }
      case "commitFailure": {
        const cur = this.current(intent.path);
        if (!cur || cur.scanState !== "scanning") {
          throw new ScanStateError(
            intent.path,
            cur?.scanState ?? "missing",
            "failed",
          );
        }
        this.commitFailureStmt.run({
          path: intent.path,
          size: intent.stats?.size ?? null,
          mtime: intent.stats?.mtime ?? null,
          fingerprint: intent.fingerprint ?? null,
          error: intent.error,
          updated_at: Date.now(),
        });
        return { applied: true, record: this.current(intent.path) };
      }
      case "upsert": {
        const { record } = intent;
        const cur = this.current(record.path);
        if (
          cur &&
          cur.scanState !== record.scanState &&
          !canTransition(cur.scanState, record.scanState)
        ) {
          throw new ScanStateError(record.path, cur.scanState, record.scanState);
        }
        this.writeRecord(record);
        return { applied: true, record: this.current(record.path) };
      }
      case "delete": {
        const res = this.deleteStmt.run(intent.path);
        return { applied: res.changes > 0, record: null };
      }
      case "rename": {
        if (intent.from === intent.to) {
          return { applied: false, record: this.current(intent.to) };
        }
        const cur = this.current(intent.from);
        if (!cur) {
          return { applied: false, record: null };
        }
        this.deleteStmt.run(intent.to);
        this.renameStmt.run(intent.to, Date.now(), intent.from);
        return { applied: true, record: this.current(intent.to) };
      }
      case "recoverInterrupted": {
        const res = this.recoverStmt.run(Date.now());
        return { applied: res.changes > 0, record: null, count: res.changes };
      }
    }
  }
}

function searchColumns(md: MetadataMap) {
  return {
    series: getString(md, "series"),
    title: getString(md, "title"),
    issue_number: getString(md, "number"),
    publisher: getString(md, "publisher"),
  };
}

function emptyRecord(path: string, scanState: ScanState): FileRecord {
  return {
    path,
    size: 0,
    mtime: 0,
    contentFingerprint: "",
    metadata: {},
    scanState,
    lastScannedAt: null,
    lastError: null,
    failureCount: 0,
  };
}
