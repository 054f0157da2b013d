// src/queue.ts
//
// Priority scan queue.
//
// Binary heap keyed on (priority desc, seq asc). Replacing a queued job pushes
// a new heap entry and makes it the live one for its path; stale entries are
// discarded when they surface.

import type { Logger } from "./logger.js";
import { NullLogger } from "./logger.js";
import { isContentReason, type ScanJob } from "./model.js";

type HeapEntry = { job: ScanJob; seq: number };

function before(a: HeapEntry, b: HeapEntry): boolean {
  if (a.job.priority !== b.job.priority) {
    return a.job.priority > b.job.priority;
  }
  return a.seq < b.seq;
}

/**
 * Combine an incoming job with the one already pending for its path. The
 * pending tier is never lowered; a pending delete that meets a content change
 * keeps its tier but takes the new reason, since the file is back.
 */
export function mergeJobs(
  kept: ScanJob,
  incoming: ScanJob,
): { job: ScanJob; replaced: boolean } {
  if (incoming.priority < kept.priority) {
    if (kept.reason === "delete" && isContentReason(incoming.reason)) {
      return { job: { ...kept, reason: incoming.reason }, replaced: false };
    }
    return { job: kept, replaced: false };
  }
  const job: ScanJob = {
    ...incoming,
    enqueuedAt: Math.min(kept.enqueuedAt, incoming.enqueuedAt),
  };
  if (kept.reason === "move" && incoming.reason === "delete" && kept.fromPath) {
    // the moved file is gone again; its old record must go too
    job.fromPath = kept.fromPath;
  }
  return { job, replaced: true };
}

export class ScanQueue {
  private heap: HeapEntry[] = [];
  // path -> live heap entry
  private live = new Map<string, HeapEntry>();
  private seq = 0;
  private waiters: ((job: ScanJob | null) => void)[] = [];
  private closed = false;
  private readonly logger: Logger;

  constructor(opts: { logger?: Logger } = {}) {
    this.logger = opts.logger ?? new NullLogger();
  }

  get size(): number {
    return this.live.size;
  }

  get isShutdown(): boolean {
    return this.closed;
  }

  has(path: string): boolean {
    return this.live.has(path);
  }

  get(path: string): ScanJob | undefined {
    const entry = this.live.get(path);
    return entry ? { ...entry.job } : undefined;
  }

  /**
   * Add a job, or merge it into the one already queued for the same path.
   * Returns false when the queue is shut down.
   */
  enqueue(job: ScanJob): boolean {
    if (this.closed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      // someone is idle: hand the job over without touching the heap
      waiter({ ...job });
      return true;
    }

    const existing = this.live.get(job.path);
    let seq = this.seq++;
    let next: ScanJob = { ...job };
    if (existing) {
      const merged = mergeJobs(existing.job, job);
      if (!merged.replaced) {
        if (merged.job.reason !== existing.job.reason) {
          this.logger.debug("queued delete superseded by content change", {
            path: job.path,
            reason: merged.job.reason,
          });
        }
        // same tier, same heap position
        existing.job = merged.job;
        return true;
      }
      next = merged.job;
      if (job.priority === existing.job.priority) {
        seq = existing.seq;
      }
    }

    const entry: HeapEntry = { job: next, seq };
    this.live.set(next.path, entry);
    this.push(entry);
    return true;
  }

  /** Highest priority, then oldest; null once the queue is shut down. */
  dequeue(): Promise<ScanJob | null> {
    const job = this.pop();
    if (job) return Promise.resolve(job);
    if (this.closed) return Promise.resolve(null);
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  /** Non-suspending variant used by the pool and tests. */
  tryDequeue(): ScanJob | null {
    return this.pop();
  }

  remove(path: string): boolean {
    // the heap entry becomes stale and is skipped by pop()
    return this.live.delete(path);
  }

  snapshot(): ScanJob[] {
    return Array.from(this.live.values())
      .sort((a, b) => (before(a, b) ? -1 : 1))
      .map((e) => ({ ...e.job }));
  }

  shutdown(): void {
    if (this.closed) return;
    this.closed = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const w of waiters) w(null);
  }

  private pop(): ScanJob | null {
    while (this.heap.length) {
      const top = this.heap[0];
      const last = this.heap.pop();
      if (last && this.heap.length) {
        this.heap[0] = last;
        this.siftDown(0);
      }
      if (this.live.get(top.job.path) === top) {
        this.live.delete(top.job.path);
        return { ...top.job };
      }
    }
    return null;
  }

  private push(entry: HeapEntry) {
    this.heap.push(entry);
    let i = this.heap.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!before(this.heap[i], this.heap[parent])) break;
      [this.heap[i], this.heap[parent]] = [this.heap[parent], this.heap[i]];
      i = parent;
    }
  }

  private siftDown(i: number) {
    const n = this.heap.length;
    while (true) {
      const l = 2 * i + 1;
      const r = l + 1;
      let best = i;
      if (l < n && before(this.heap[l], this.heap[best])) best = l;
      if (r < n && before(this.heap[r], this.heap[best])) best = r;
      if (best === i) return;
      [this.heap[i], this.heap[best]] = [this.heap[best], this.heap[i]];
      i = best;
    }
  }
}
