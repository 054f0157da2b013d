// src/change-detector.ts
//
// Turns raw watch events into scan jobs. Content changes are coalesced per
// path until the path has been quiet for `quietPeriodMs`; destructive events
// go straight through.

import { createIgnorer, type Ignorer } from "./ignore.js";
import { rootFor } from "./config.js";
import { NullLogger, type Logger } from "./logger.js";
import { makeJob, type ScanJob } from "./model.js";
import { isArchivePath, isHiddenRel, isWithin, relUnder } from "./util.js";

export type WatchEvent =
  | { kind: "create" | "modify" | "delete"; path: string }
  | { kind: "move" | "rename"; from: string; path: string }
  | { kind: "deleteDir"; path: string };

type Bucket = {
  kind: "create" | "modify";
  sawCreate: boolean;
  deadline: number;
  events: number;
};

export interface ChangeDetectorOptions {
  roots: readonly string[];
  ignoreRules?: readonly string[];
  quietPeriodMs: number;
  flushIntervalMs: number;
  onJob: (job: ScanJob) => void;
  onDirectoryRemoved?: (dir: string) => void;
  clock?: () => number;
  logger?: Logger;
}

export class ChangeDetector {
  private readonly buckets = new Map<string, Bucket>();
  private readonly ignorer: Ignorer;
  private readonly clock: () => number;
  private readonly logger: Logger;
  private timer: NodeJS.Timeout | null = null;

  constructor(private readonly opts: ChangeDetectorOptions) {
    this.ignorer = createIgnorer(opts.ignoreRules ?? []);
    this.clock = opts.clock ?? Date.now;
    this.logger = opts.logger ?? new NullLogger();
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.flushDue(), this.opts.flushIntervalMs);
    this.timer.unref();
  }

  /** Stop the flush loop. Pending buckets are dropped unless flushed first. */
  stop({ flush = false }: { flush?: boolean } = {}): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (flush) this.flushAll();
    this.buckets.clear();
  }

  get pendingCount(): number {
    return this.buckets.size;
  }

  /** True when a file at `abs` is something we index. */
  accepts(abs: string): boolean {
    const root = rootFor(this.opts.roots, abs);
    if (root === null) return false;
    const rel = relUnder(root, abs);
    if (!rel) return false;
    if (isHiddenRel(rel)) return false;
    if (!isArchivePath(abs)) return false;
    return !this.ignorer.ignoresFile(rel);
  }

  observe(event: WatchEvent): void {
    const now = this.clock();
    switch (event.kind) {
      case "create":
      case "modify": {
        if (!this.accepts(event.path)) return;
        const prev = this.buckets.get(event.path);
        this.buckets.set(event.path, {
          kind: event.kind,
          sawCreate: (prev?.sawCreate ?? false) || event.kind === "create",
          deadline: now + this.opts.quietPeriodMs,
          events: (prev?.events ?? 0) + 1,
        });
        return;
      }
      case "delete": {
        this.buckets.delete(event.path);
        if (!this.accepts(event.path)) return;
        this.emit(makeJob(event.path, "delete", { now }));
        return;
      }
      case "move":
      case "rename": {
        this.buckets.delete(event.from);
        const fromOk = this.accepts(event.from);
        const toOk = this.accepts(event.path);
        if (fromOk && toOk) {
          this.buckets.delete(event.path);
          this.emit(makeJob(event.path, "move", { fromPath: event.from, now }));
        } else if (fromOk) {
          // renamed to something we do not index
          this.emit(makeJob(event.from, "delete", { now }));
        } else if (toOk) {
          // e.g. a temp file renamed into place
          this.observe({ kind: "create", path: event.path });
        }
        return;
      }
      case "deleteDir": {
        if (rootFor(this.opts.roots, event.path) === null) return;
        for (const p of [...this.buckets.keys()]) {
          if (isWithin(event.path, p)) this.buckets.delete(p);
        }
        this.opts.onDirectoryRemoved?.(event.path);
        return;
      }
    }
  }

  /** Emit a job for every bucket whose deadline has passed. */
  flushDue(now = this.clock()): number {
    let n = 0;
    for (const [path, bucket] of [...this.buckets]) {
      if (bucket.deadline > now) continue;
      this.buckets.delete(path);
      this.emitBucket(path, bucket, now);
      n++;
    }
    return n;
  }

  flushAll(): number {
    return this.flushDue(Number.POSITIVE_INFINITY);
  }

  private emitBucket(path: string, bucket: Bucket, now: number) {
    const reason = bucket.sawCreate ? "create" : "modify";
    if (bucket.events > 1) {
      this.logger.debug("coalesced events", { path, events: bucket.events });
    }
    this.emit(
      makeJob(path, reason, { now: Number.isFinite(now) ? now : this.clock() }),
    );
  }

  private emit(job: ScanJob) {
    this.opts.onJob(job);
  }
}
