// src/scanner.ts
//
// Extraction pool.
//
// `concurrency` async loops pull jobs from the queue. A path (or the source of
// a move) is handled by at most one loop at a time; a job that arrives for a
// busy path is parked and queued again once the running job has committed.

import { readArchive, type ArchiveReader } from "./archive.js";
import type { IndexerConfig } from "./config.js";
import { POISON_FAILURE_THRESHOLD } from "./constants.js";
import { emptyDescriptor, parseDescriptor } from "./descriptor.js";
import { describeError } from "./errors.js";
import { computeFingerprint, statFile } from "./fingerprint.js";
import type { HealthState } from "./health.js";
import type { IndexStore } from "./index-store.js";
import type { IndexWriter, WriteIntent, WriteOutcome } from "./index-writer.js";
import { NullLogger, type Logger } from "./logger.js";
import type { MemoryTier } from "./memory.js";
import { makeJob, type FileStats, type ScanJob } from "./model.js";
import { mergeJobs, type ScanQueue } from "./queue.js";

export type InvalidateEvent =
  | { kind: "removed"; path: string }
  | { kind: "moved"; from: string; path: string }
  | { kind: "rescanned"; path: string };

export type JobOutcome =
  | "clean"
  | "unchanged"
  | "failed"
  | "deleted"
  | "moved"
  | "deferred"
  | "error";

export type ScannerConfig = Pick<
  IndexerConfig,
  | "concurrency"
  | "deferDelayMs"
  | "archiveTimeoutMs"
  | "maxDescriptorBytes"
  | "fingerprint"
>;

export interface ScannerPoolOptions {
  queue: ScanQueue;
  writer: IndexWriter;
  store: IndexStore;
  memory: { currentTier(): MemoryTier };
  config: ScannerConfig;
  health?: HealthState;
  /** defaults to the zip reader */
  readArchive?: ArchiveReader;
  logger?: Logger;
  onInvalidate?: (event: InvalidateEvent) => void;
  /** also called for queued jobs a move made moot, with outcome "moved" */
  onJobDone?: (job: ScanJob, outcome: JobOutcome) => void;
  /** called for jobs the pool queues itself (follow-up scans) */
  onFollowUp?: (job: ScanJob) => void;
}

function jobKeys(job: ScanJob): string[] {
  return job.fromPath ? [job.path, job.fromPath] : [job.path];
}

export class ScannerPool {
  private readonly inFlight = new Set<string>();
  private readonly parked = new Map<string, ScanJob>();
  private readonly deferred = new Set<NodeJS.Timeout>();
  private readonly idleWaiters: (() => void)[] = [];
  private loops: Promise<void>[] = [];
  private active = 0;
  private idleCheck: NodeJS.Immediate | null = null;
  private readonly logger: Logger;
  private readonly read: ArchiveReader;

  constructor(private readonly opts: ScannerPoolOptions) {
    this.logger = opts.logger ?? new NullLogger();
    this.read = opts.readArchive ?? readArchive;
  }

  get activeCount(): number {
    return this.active;
  }

  get parkedCount(): number {
    return this.parked.size;
  }

  get deferredCount(): number {
    return this.deferred.size;
  }

  start(): void {
    if (this.loops.length) return;
    const n = Math.max(1, this.opts.config.concurrency);
    this.loops = Array.from({ length: n }, (_, i) => this.loop(i));
  }

  /**
   * Wait for the loops to exit. The owner shuts the queue down first; jobs
   * already being processed run to their commit.
   */
  async stop(): Promise<void> {
    for (const t of this.deferred) clearTimeout(t);
    this.deferred.clear();
    this.parked.clear();
    await Promise.all(this.loops);
    this.loops = [];
    this.scheduleIdleCheck();
  }

  /** Resolves when no job is queued, running, parked or deferred. */
  idle(): Promise<void> {
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
      this.scheduleIdleCheck();
    });
  }

  private isIdle(): boolean {
    return (
      this.opts.queue.size === 0 &&
      this.active === 0 &&
      this.parked.size === 0 &&
      this.deferred.size === 0
    );
  }

  // checked on the next turn so a job handed to a waiting loop is counted
  private scheduleIdleCheck() {
    if (this.idleCheck || !this.idleWaiters.length) return;
    this.idleCheck = setImmediate(() => {
      this.idleCheck = null;
      if (!this.isIdle() && !this.opts.queue.isShutdown) return;
      const waiters = this.idleWaiters.splice(0);
      for (const w of waiters) w();
    });
  }

  private async loop(id: number): Promise<void> {
    const logger = this.logger.child(`worker-${id}`);
    while (true) {
      const job = await this.opts.queue.dequeue();
      if (!job) return;
      const keys = jobKeys(job);
      if (keys.some((k) => this.inFlight.has(k))) {
        this.park(job);
        continue;
      }
      for (const k of keys) this.inFlight.add(k);
      this.active++;
      let outcome: JobOutcome = "error";
      try {
        outcome = await this.process(job, logger);
        if (outcome === "error") {
          this.opts.health?.set(
            "scanner",
            "degraded",
            `could not record ${job.reason} of ${job.path}`,
          );
        } else if (outcome !== "deferred") {
          this.opts.health?.ok("scanner");
        }
      } catch (err) {
        logger.error("job crashed", {
          path: job.path,
          reason: job.reason,
          error: describeError(err),
        });
        this.opts.health?.set(
          "scanner",
          "degraded",
          `job crashed: ${describeError(err)}`,
        );
      } finally {
        for (const k of keys) this.inFlight.delete(k);
        this.active--;
        this.releaseParked(keys);
      }
      this.opts.onJobDone?.(job, outcome);
      this.scheduleIdleCheck();
    }
  }

  private park(job: ScanJob) {
    const prev = this.parked.get(job.path);
    const next = prev ? mergeJobs(prev, job).job : job;
    this.parked.set(job.path, next);
    this.logger.debug("parked job for busy path", {
      path: job.path,
      reason: next.reason,
    });
  }

  private releaseParked(keys: string[]) {
    for (const [path, job] of [...this.parked]) {
      if (!jobKeys(job).some((k) => keys.includes(k))) continue;
      this.parked.delete(path);
      if (!this.opts.queue.enqueue(job)) {
        this.logger.debug("dropping parked job after shutdown", { path });
      }
    }
  }

  private async submit(intent: WriteIntent): Promise<WriteOutcome> {
    const outcome = await this.opts.writer.submit(intent);
    if (!outcome.ok) {
      this.logger.debug("write rejected", {
        kind: intent.kind,
        error: outcome.error.message,
      });
    }
    return outcome;
  }

  private invalidate(event: InvalidateEvent) {
    try {
      this.opts.onInvalidate?.(event);
    } catch (err) {
      this.logger.warn("invalidate hook failed", { error: describeError(err) });
    }
  }

  private followUp(job: ScanJob) {
    this.opts.onFollowUp?.(job);
    this.opts.queue.enqueue(job);
  }

  private process(job: ScanJob, logger: Logger): Promise<JobOutcome> {
    switch (job.reason) {
      case "delete":
        return this.applyDelete(job, logger);
      case "move":
        return this.applyMove(job, logger);
      default:
        return this.scan(job, logger);
    }
  }

  private async remove(path: string): Promise<boolean> {
    const res = await this.submit({ kind: "delete", path });
    if (res.ok && res.applied) {
      this.invalidate({ kind: "removed", path });
    }
    return res.ok;
  }

  private async applyDelete(job: ScanJob, logger: Logger): Promise<JobOutcome> {
    if (job.fromPath) await this.remove(job.fromPath);
    if (await statFile(job.path)) {
      // the file is back; index what is there now
      logger.debug("deleted path reappeared", { path: job.path });
      return this.scan({ ...job, reason: "create" }, logger);
    }
    const ok = await this.remove(job.path);
    return ok ? "deleted" : "error";
  }

  private async applyMove(job: ScanJob, logger: Logger): Promise<JobOutcome> {
    const from = job.fromPath;
    const prev = from ? this.opts.store.get(from) : null;
    if (!from || !prev) {
      logger.debug("move source not indexed; scanning destination", {
        from,
        path: job.path,
      });
      return this.scan({ ...job, reason: "create" }, logger);
    }
    // a scan still queued for the old name is moot now
    const moot = this.opts.queue.get(from);
    if (moot && this.opts.queue.remove(from)) {
      this.opts.onJobDone?.(moot, "moved");
    }

    const res = await this.submit({ kind: "rename", from, to: job.path });
    if (!res.ok) return "error";
    this.invalidate({ kind: "moved", from, path: job.path });

    const stats = await statFile(job.path);
    if (!stats) {
      await this.remove(job.path);
      return "deleted";
    }
    let fingerprint: string | null = null;
    try {
      fingerprint = await computeFingerprint(
        job.path,
        stats,
        this.opts.config.fingerprint,
      );
    } catch (err) {
      logger.warn("fingerprint failed after move", {
        path: job.path,
        error: describeError(err),
      });
    }
    if (fingerprint !== prev.contentFingerprint || prev.scanState !== "clean") {
      this.followUp(makeJob(job.path, "modify"));
    }
    return "moved";
  }

  private async scan(job: ScanJob, logger: Logger): Promise<JobOutcome> {
    const { path } = job;
    if (job.fromPath) {
      // merged from a move whose file came back under a new reason
      await this.remove(job.fromPath);
    }

    if (
      job.reason !== "manual" &&
      this.opts.memory.currentTier() === "critical"
    ) {
      this.defer(job, logger);
      return "deferred";
    }

    const stats = await statFile(path);
    if (!stats) {
      logger.debug("file vanished before scan", { path });
      const ok = await this.remove(path);
      return ok ? "deleted" : "error";
    }

    const begin = await this.submit({ kind: "beginScan", path });
    if (!begin.ok) return "error";
    const prev = begin.record;

    let fingerprint: string | undefined;
    try {
      fingerprint = await computeFingerprint(
        path,
        stats,
        this.opts.config.fingerprint,
      );
      // last scan succeeded and the content has not changed since
      if (
        job.reason !== "manual" &&
        prev?.lastScannedAt != null &&
        prev.lastError == null &&
        prev.contentFingerprint === fingerprint
      ) {
        const res = await this.submit({
          kind: "commitScan",
          path,
          stats,
          fingerprint,
          metadata: prev.metadata,
          scannedAt: prev.lastScannedAt,
          unchanged: true,
        });
        return res.ok ? "unchanged" : "error";
      }

      // the tier may have changed while we were stat-ing and hashing
      if (
        job.reason !== "manual" &&
        this.opts.memory.currentTier() === "critical"
      ) {
        const released = await this.submit({ kind: "releaseScan", path });
        if (!released.ok) return "error";
        this.defer(job, logger);
        return "deferred";
      }

      const contents = await this.read(path, {
        maxDescriptorBytes: this.opts.config.maxDescriptorBytes,
        timeoutMs: this.opts.config.archiveTimeoutMs,
      });
      const metadata = contents.descriptor
        ? parseDescriptor(contents.descriptor, {
            path,
            pageCount: contents.pageCount,
          })
        : emptyDescriptor(contents.pageCount);
      const res = await this.submit({
        kind: "commitScan",
        path,
        stats,
        fingerprint,
        metadata,
        scannedAt: Date.now(),
      });
      if (!res.ok) return "error";
      this.invalidate({ kind: "rescanned", path });
      logger.debug("scanned", {
        path,
        format: contents.format,
        fields: Object.keys(metadata).length,
      });
      return "clean";
    } catch (err) {
      return this.fail(path, err, stats, fingerprint, logger);
    }
  }

  private async fail(
    path: string,
    err: unknown,
    stats: FileStats,
    fingerprint: string | undefined,
    logger: Logger,
  ): Promise<JobOutcome> {
    const message = describeError(err);
    const res = await this.submit({
      kind: "commitFailure",
      path,
      error: message,
      stats,
      fingerprint,
    });
    if (!(await statFile(path))) {
      // gone while we were reading it
      await this.remove(path);
      return "deleted";
    }
    const failures = res.ok ? (res.record?.failureCount ?? 0) : 0;
    logger.warn("scan failed", { path, error: message, failures });
    if (failures >= POISON_FAILURE_THRESHOLD) {
      logger.warn("automatic rescans suspended for path", { path, failures });
    }
    return res.ok ? "failed" : "error";
  }

  private defer(job: ScanJob, logger: Logger) {
    logger.debug("memory critical; deferring scan", { path: job.path });
    const timer = setTimeout(() => {
      this.deferred.delete(timer);
      if (!this.opts.queue.enqueue(job)) {
        logger.debug("dropping deferred job after shutdown", {
          path: job.path,
        });
      }
      this.scheduleIdleCheck();
    }, this.opts.config.deferDelayMs);
    this.deferred.add(timer);
  }
}
