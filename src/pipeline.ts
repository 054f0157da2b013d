// src/pipeline.ts
//
// Wires the indexer together: watch sources -> change detector -> queue ->
// scanner pool -> index writer, with the memory monitor throttling the pool.
// Everything is owned by one IndexPipeline instance; nothing is global.

import * as walk from "@nodelib/fs.walk";
import { stat } from "node:fs/promises";
import path from "node:path";
import type { ArchiveReader } from "./archive.js";
import { ChangeDetector } from "./change-detector.js";
import { rootFor, type IndexerConfig } from "./config.js";
import { POISON_FAILURE_THRESHOLD } from "./constants.js";
import { describeError, WatchError } from "./errors.js";
import { FsWatchSource } from "./fs-watch.js";
import { HealthState, type HealthSnapshot } from "./health.js";
import { createIgnorer, type Ignorer } from "./ignore.js";
import { IndexStore, type QueryFilter } from "./index-store.js";
import { IndexWriter } from "./index-writer.js";
import { NullLogger, type Logger } from "./logger.js";
import {
  MemoryMonitor,
  type MemorySampler,
  type MemoryTier,
} from "./memory.js";
import {
  isContentReason,
  makeJob,
  type FileRecord,
  type FileStatus,
  type ScanJob,
  type ScanState,
} from "./model.js";
import { OperationRegistry, type Operation } from "./operations.js";
import { ScanQueue } from "./queue.js";
import {
  ScannerPool,
  type InvalidateEvent,
  type JobOutcome,
} from "./scanner.js";
import { isHiddenRel, isWithin, relUnder } from "./util.js";

export interface PipelineOptions {
  config: IndexerConfig;
  logger?: Logger;
  /** false for one-shot runs that only sweep or rescan */
  watch?: boolean;
  memorySampler?: MemorySampler;
  /** replaces the sampled monitor, e.g. with a fixed tier */
  memory?: MemoryMonitor;
  readArchive?: ArchiveReader;
}

export interface PipelineSummary {
  counts: Record<ScanState, number>;
  total: number;
  queueDepth: number;
  inFlight: number;
  parked: number;
  deferred: number;
  pendingEvents: number;
  memoryTier: MemoryTier;
  health: HealthSnapshot;
  operations: Operation[];
}

type SweepTracker = {
  opId: string;
  pending: Set<string>;
  done: number;
  walking: boolean;
};

type WalkResult = {
  files: string[];
  // directories the walk could not read; what is under them is unknown
  unreadable: string[];
};

function dirPrefix(dir: string): string {
  return dir.endsWith(path.sep) ? dir : dir + path.sep;
}

export class IndexPipeline {
  readonly health: HealthState;
  readonly operations = new OperationRegistry();

  private readonly config: IndexerConfig;
  private readonly logger: Logger;
  private readonly queue: ScanQueue;
  private readonly writer: IndexWriter;
  private readonly store: IndexStore;
  private readonly memory: MemoryMonitor;
  private readonly detector: ChangeDetector;
  private readonly source: FsWatchSource | null;
  private readonly pool: ScannerPool;
  private readonly ignorer: Ignorer;
  private readonly invalidateHooks = new Set<(e: InvalidateEvent) => void>();
  private readonly sweeps = new Set<SweepTracker>();
  private state: "idle" | "running" | "stopped" = "idle";

  constructor(opts: PipelineOptions) {
    const { config } = opts;
    this.config = config;
    this.logger = opts.logger ?? new NullLogger();
    this.health = new HealthState();
    this.health.onChange((component, h) => {
      const meta = { component, level: h.level, message: h.message };
      if (h.level === "ok") this.logger.info("health restored", meta);
      else this.logger.warn("health changed", meta);
    });
    this.ignorer = createIgnorer(config.ignoreRules);

    this.queue = new ScanQueue({ logger: this.logger.child("queue") });
    // the writer opens (and migrates) the database before any reader
    this.writer = new IndexWriter(config.dbPath, {
      logger: this.logger.child("writer"),
      health: this.health,
    });
    this.store = IndexStore.open(config.dbPath);
    this.memory =
      opts.memory ??
      new MemoryMonitor({
        thresholds: config.memory,
        sampleIntervalMs: config.sampleIntervalMs,
        sampler: opts.memorySampler,
        logger: this.logger.child("memory"),
        health: this.health,
      });
    this.detector = new ChangeDetector({
      roots: config.roots,
      ignoreRules: config.ignoreRules,
      quietPeriodMs: config.quietPeriodMs,
      flushIntervalMs: config.flushIntervalMs,
      onJob: (job) => this.enqueue(job),
      onDirectoryRemoved: (dir) => this.removeDirectory(dir),
      logger: this.logger.child("detector"),
    });
    this.source =
      opts.watch === false
        ? null
        : new FsWatchSource({
            roots: config.roots,
            moveWindowMs: config.moveWindowMs,
            retryMinMs: config.watchRetryMinMs,
            retryMaxMs: config.watchRetryMaxMs,
            onEvent: (event) => this.detector.observe(event),
            onRecovered: (root) => this.sweepAfterRecovery(root),
            health: this.health,
            logger: this.logger.child("watch"),
          });
    this.pool = new ScannerPool({
      queue: this.queue,
      writer: this.writer,
      store: this.store,
      memory: this.memory,
      config,
      health: this.health,
      readArchive: opts.readArchive,
      logger: this.logger.child("scanner"),
      onInvalidate: (event) => this.emitInvalidate(event),
      onJobDone: (job, outcome) => this.jobDone(job, outcome),
      onFollowUp: (job) => this.markQueued(job.path),
    });
  }

  async start(): Promise<void> {
    if (this.state !== "idle") {
      throw new Error(`pipeline cannot start from state '${this.state}'`);
    }
    this.state = "running";
    const recovered = await this.writer.submit({ kind: "recoverInterrupted" });
    if (recovered.ok && recovered.count) {
      this.logger.warn("marked interrupted scans as failed", {
        count: recovered.count,
      });
    }
    this.memory.start();
    this.pool.start();
    this.detector.start();
    if (this.source) {
      await this.source.start();
    }
    this.logger.info("pipeline started", {
      roots: this.config.roots,
      db: this.config.dbPath,
      watch: this.source !== null,
    });
  }

  /** Stop accepting work, let running jobs commit, then release everything. */
  async stop(): Promise<void> {
    if (this.state === "stopped") return;
    const wasRunning = this.state === "running";
    this.state = "stopped";
    this.detector.stop();
    if (this.source) await this.source.stop();
    this.queue.shutdown();
    if (wasRunning) await this.pool.stop();
    this.memory.stop();
    await this.writer.close();
    this.store.close();
    for (const sweep of this.sweeps) {
      this.operations.complete(sweep.opId, { error: true });
    }
    this.sweeps.clear();
    this.logger.info("pipeline stopped");
  }

  /** Queue a manual rescan. Returns false for paths we do not index. */
  requestRescan(file: string): boolean {
    const abs = path.resolve(file);
    if (!this.detector.accepts(abs)) {
      this.logger.warn("rescan ignored: not an indexed archive path", {
        path: abs,
      });
      return false;
    }
    return this.enqueue(makeJob(abs, "manual"));
  }

  /**
   * Queue a background scan of every tracked file under `root` (default: all
   * roots), plus files on disk the index does not know yet and deletes for
   * tracked files that are gone. Returns the operation id.
   */
  async fullSweep(root?: string): Promise<string> {
    const roots = root ? [path.resolve(root)] : [...this.config.roots];
    for (const r of roots) {
      if (rootFor(this.config.roots, r) === null) {
        throw new Error(`${r} is not inside a library root`);
      }
    }
    const opId = this.operations.register(
      "sweep",
      roots.length === 1 ? roots[0] : `${roots.length} roots`,
    );
    const tracker: SweepTracker = {
      opId,
      pending: new Set(),
      done: 0,
      walking: true,
    };
    this.sweeps.add(tracker);
    try {
      for (const r of roots) {
        await this.sweepRoot(r, tracker);
      }
    } catch (err) {
      this.sweeps.delete(tracker);
      this.operations.update(opId, { detail: describeError(err) });
      this.operations.complete(opId, { error: true });
      throw err;
    }
    tracker.walking = false;
    this.operations.update(opId, {
      total: tracker.pending.size + tracker.done,
      current: tracker.done,
      detail: "Scanning...",
    });
    this.maybeFinishSweep(tracker);
    return opId;
  }

  private async sweepRoot(root: string, tracker: SweepTracker) {
    // an unmounted or renamed root walks as empty; that is not a mass delete
    try {
      const st = await stat(root);
      if (!st.isDirectory()) {
        throw new WatchError("root is not a directory", root);
      }
    } catch (err) {
      if (err instanceof WatchError) throw err;
      throw new WatchError(
        `root is not reachable: ${describeError(err)}`,
        root,
        { cause: err },
      );
    }
    const { files, unreadable } = await this.walkRoot(root);
    const onDisk = new Set(files);
    if (unreadable.length) {
      this.logger.warn("sweep could not read some directories", {
        root,
        dirs: unreadable,
      });
    }

    const known = new Set<string>();
    for (const rec of this.store.query({ pathPrefix: dirPrefix(root) })) {
      known.add(rec.path);
      if (!onDisk.has(rec.path)) {
        if (unreadable.some((dir) => isWithin(dir, rec.path))) continue;
        this.enqueueForSweep(makeJob(rec.path, "delete"), tracker);
      } else if (
        rec.scanState === "failed" &&
        rec.failureCount >= POISON_FAILURE_THRESHOLD
      ) {
        this.logger.debug("sweep skips repeatedly failing file", {
          path: rec.path,
          failures: rec.failureCount,
        });
      } else {
        this.enqueueForSweep(makeJob(rec.path, "sweep"), tracker);
      }
    }
    for (const file of onDisk) {
      if (!known.has(file)) {
        this.enqueueForSweep(makeJob(file, "sweep"), tracker);
      }
    }
  }

  private walkRoot(root: string): Promise<WalkResult> {
    const unreadable: string[] = [];
    return new Promise((resolve, reject) => {
      walk.walk(
        root,
        {
          followSymbolicLinks: false,
          deepFilter: (e) => !this.skipDir(e.path),
          entryFilter: (e) =>
            e.dirent.isFile() && this.detector.accepts(e.path),
          errorFilter: (err) => {
            unreadable.push(err.path ?? root);
            return true;
          },
        },
        (err, entries) => {
          if (err) {
            reject(err);
            return;
          }
          resolve({ files: entries.map((e) => e.path), unreadable });
        },
      );
    });
  }

  private skipDir(dir: string): boolean {
    const root = rootFor(this.config.roots, dir);
    if (root === null) return true;
    const rel = relUnder(root, dir);
    if (!rel) return false;
    return isHiddenRel(rel) || this.ignorer.ignoresDir(rel);
  }

  private enqueueForSweep(job: ScanJob, tracker: SweepTracker) {
    if (this.enqueue(job)) tracker.pending.add(job.path);
  }

  private sweepAfterRecovery(root: string) {
    this.fullSweep(root).catch((err) =>
      this.logger.error("sweep after watch recovery failed", {
        root,
        error: describeError(err),
      }),
    );
  }

  private jobDone(job: ScanJob, outcome: JobOutcome) {
    if (outcome === "deferred") return;
    for (const tracker of this.sweeps) {
      if (!tracker.pending.delete(job.path)) continue;
      tracker.done++;
      this.operations.update(tracker.opId, {
        current: tracker.done,
        detail: path.basename(job.path),
      });
      this.maybeFinishSweep(tracker);
    }
  }

  private maybeFinishSweep(tracker: SweepTracker) {
    // while walking the total is not known yet
    if (tracker.walking || tracker.pending.size) return;
    this.sweeps.delete(tracker);
    this.operations.complete(tracker.opId);
  }

  private removeDirectory(dir: string) {
    let n = 0;
    for (const p of this.store.listPaths(dirPrefix(dir))) {
      this.enqueue(makeJob(p, "delete"));
      n++;
    }
    this.logger.debug("directory removed", { dir, records: n });
  }

  private enqueue(job: ScanJob): boolean {
    if (this.state === "stopped") return false;
    if (isContentReason(job.reason) || job.reason === "sweep") {
      this.markQueued(job.path);
    }
    return this.queue.enqueue(job);
  }

  private markQueued(file: string) {
    this.writer.submit({ kind: "markQueued", path: file }).then(
      (res) => {
        if (!res.ok) {
          this.logger.debug("could not mark queued", {
            path: file,
            error: res.error.message,
          });
        }
      },
      (err: unknown) =>
        this.logger.error("markQueued failed", {
          path: file,
          error: describeError(err),
        }),
    );
  }

  private emitInvalidate(event: InvalidateEvent) {
    for (const hook of this.invalidateHooks) {
      hook(event);
    }
  }

  onInvalidate(hook: (event: InvalidateEvent) => void): () => void {
    this.invalidateHooks.add(hook);
    return () => {
      this.invalidateHooks.delete(hook);
    };
  }

  onCacheDrop(hook: () => void): () => void {
    return this.memory.onCacheDrop(hook);
  }

  get(file: string): FileRecord | null {
    return this.store.get(path.resolve(file));
  }

  query(filter: QueryFilter = {}): Generator<FileRecord, void, undefined> {
    return this.store.query(filter);
  }

  status(file: string): FileStatus | null {
    return this.store.status(path.resolve(file));
  }

  summary(): PipelineSummary {
    const counts = this.store.countByState();
    return {
      counts,
      total: Object.values(counts).reduce((a, b) => a + b, 0),
      queueDepth: this.queue.size,
      inFlight: this.pool.activeCount,
      parked: this.pool.parkedCount,
      deferred: this.pool.deferredCount,
      pendingEvents: this.detector.pendingCount,
      memoryTier: this.memory.currentTier(),
      health: this.health.snapshot(),
      operations: this.operations.list(),
    };
  }

  /**
   * Resolves when the queue is empty and no job is running, parked or
   * deferred. With `flushEvents`, debounced events are emitted first.
   */
  async drain({ flushEvents = false }: { flushEvents?: boolean } = {}) {
    if (flushEvents) this.detector.flushAll();
    await this.pool.idle();
  }

  /** Feed an event as if it came from the watcher. */
  observe(...args: Parameters<ChangeDetector["observe"]>): void {
    this.detector.observe(...args);
  }
}
