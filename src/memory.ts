// src/memory.ts
//
// Memory pressure monitor.

import type { MemoryThresholds } from "./config.js";
import { describeError, MemorySampleError } from "./errors.js";
import type { HealthState } from "./health.js";
import { NullLogger, type Logger } from "./logger.js";

export type MemoryTier = "normal" | "elevated" | "critical";

export interface MemorySample {
  rssBytes: number;
  heapUsedBytes: number;
  tier: MemoryTier;
  sampledAt: number;
}

export type MemorySampler = () => { rssBytes: number; heapUsedBytes: number };

export const processSampler: MemorySampler = () => {
  const usage = process.memoryUsage();
  return { rssBytes: usage.rss, heapUsedBytes: usage.heapUsed };
};

const RANK: Record<MemoryTier, number> = { normal: 0, elevated: 1, critical: 2 };

/**
 * Classify `bytes` given the previous tier. Moving up happens at the
 * threshold; moving down needs usage below `threshold - hysteresis`.
 */
export function classify(
  bytes: number,
  prev: MemoryTier,
  t: MemoryThresholds,
): MemoryTier {
  const raw: MemoryTier =
    bytes >= t.criticalBytes
      ? "critical"
      : bytes >= t.elevatedBytes
        ? "elevated"
        : "normal";
  if (RANK[raw] >= RANK[prev]) return raw;

  // downgrade: step down only as far as the hysteresis band allows
  if (prev === "critical" && bytes >= t.criticalBytes - t.hysteresisBytes) {
    return "critical";
  }
  if (raw === "normal" && bytes >= t.elevatedBytes - t.hysteresisBytes) {
    return "elevated";
  }
  return raw;
}

export interface MemoryMonitorOptions {
  thresholds: MemoryThresholds;
  sampleIntervalMs: number;
  sampler?: MemorySampler;
  clock?: () => number;
  logger?: Logger;
  health?: HealthState;
}

export class MemoryMonitor {
  private tier: MemoryTier = "normal";
  private last: MemorySample | null = null;
  private timer: NodeJS.Timeout | null = null;
  private readonly cacheDropHooks = new Set<() => void>();
  private readonly tierHooks = new Set<
    (tier: MemoryTier, prev: MemoryTier) => void
  >();
  private readonly sampler: MemorySampler;
  private readonly clock: () => number;
  private readonly logger: Logger;

  constructor(private readonly opts: MemoryMonitorOptions) {
    this.sampler = opts.sampler ?? processSampler;
    this.clock = opts.clock ?? Date.now;
    this.logger = opts.logger ?? new NullLogger();
  }

  /** Last classified tier; never samples. */
  currentTier(): MemoryTier {
    return this.tier;
  }

  lastSample(): MemorySample | null {
    return this.last ? { ...this.last } : null;
  }

  start(): void {
    if (this.timer) return;
    this.sampleNow();
    this.timer = setInterval(() => this.sampleNow(), this.opts.sampleIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  sampleNow(): MemorySample {
    let rssBytes = 0;
    let heapUsedBytes = 0;
    let tier: MemoryTier;
    try {
      const usage = this.sampler();
      if (!Number.isFinite(usage.rssBytes) || usage.rssBytes < 0) {
        throw new MemorySampleError(`invalid rss reading: ${usage.rssBytes}`);
      }
      rssBytes = usage.rssBytes;
      heapUsedBytes = usage.heapUsedBytes;
      tier = classify(rssBytes, this.tier, this.opts.thresholds);
    } catch (err) {
      const error =
        err instanceof MemorySampleError
          ? err
          : new MemorySampleError(describeError(err), { cause: err });
      this.logger.warn("memory sample failed; assuming normal", {
        error: error.message,
      });
      tier = "normal";
    }
    const sample: MemorySample = {
      rssBytes,
      heapUsedBytes,
      tier,
      sampledAt: this.clock(),
    };
    this.last = sample;
    this.setTier(tier);
    return sample;
  }

  onCacheDrop(hook: () => void): () => void {
    this.cacheDropHooks.add(hook);
    return () => {
      this.cacheDropHooks.delete(hook);
    };
  }

  onTierChange(hook: (tier: MemoryTier, prev: MemoryTier) => void): () => void {
    this.tierHooks.add(hook);
    return () => {
      this.tierHooks.delete(hook);
    };
  }

  private setTier(next: MemoryTier) {
    const prev = this.tier;
    if (prev === next) return;
    this.tier = next;
    this.logger.info("memory tier changed", { from: prev, to: next });
    if (next === "critical") {
      this.opts.health?.set("memory", "degraded", "memory usage is critical");
    } else if (prev === "critical") {
      this.opts.health?.ok("memory");
    }
    for (const hook of this.tierHooks) {
      this.runHook(() => hook(next, prev));
    }
    if (next === "critical") {
      for (const hook of this.cacheDropHooks) {
        this.runHook(hook);
      }
    }
  }

  private runHook(fn: () => void) {
    try {
      fn();
    } catch (err) {
      this.logger.warn("memory hook failed", { error: describeError(err) });
    }
  }
}
