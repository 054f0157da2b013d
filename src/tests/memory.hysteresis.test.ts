import { HealthState } from "../health";
import { MemoryLogger } from "../logger";
import { classify, MemoryMonitor, type MemoryTier } from "../memory";

const MiB = 1024 * 1024;
const thresholds = {
  elevatedBytes: 100 * MiB,
  criticalBytes: 200 * MiB,
  hysteresisBytes: 10 * MiB,
};

describe("classify", () => {
  test("moves up as soon as a threshold is crossed", () => {
    expect(classify(99 * MiB, "normal", thresholds)).toBe("normal");
    expect(classify(100 * MiB, "normal", thresholds)).toBe("elevated");
    expect(classify(200 * MiB, "normal", thresholds)).toBe("critical");
  });

  test("moves down only past the hysteresis band", () => {
    expect(classify(195 * MiB, "critical", thresholds)).toBe("critical");
    expect(classify(190 * MiB, "critical", thresholds)).toBe("critical");
    expect(classify(189 * MiB, "critical", thresholds)).toBe("elevated");
    expect(classify(95 * MiB, "elevated", thresholds)).toBe("elevated");
    expect(classify(89 * MiB, "elevated", thresholds)).toBe("normal");
    expect(classify(50 * MiB, "critical", thresholds)).toBe("normal");
  });
});

describe("MemoryMonitor", () => {
  test("reports tier changes and fires cache-drop hooks on critical", () => {
    let rss = 50 * MiB;
    const health = new HealthState();
    const monitor = new MemoryMonitor({
      thresholds,
      sampleIntervalMs: 60_000,
      sampler: () => ({ rssBytes: rss, heapUsedBytes: 1 }),
      clock: () => 42,
      health,
    });
    const changes: [MemoryTier, MemoryTier][] = [];
    let drops = 0;
    monitor.onTierChange((tier, prev) => changes.push([tier, prev]));
    const unsubscribe = monitor.onCacheDrop(() => {
      drops++;
    });

    expect(monitor.sampleNow()).toEqual({
      rssBytes: 50 * MiB,
      heapUsedBytes: 1,
      tier: "normal",
      sampledAt: 42,
    });
    rss = 250 * MiB;
    monitor.sampleNow();
    expect(monitor.currentTier()).toBe("critical");
    expect(health.get("memory").level).toBe("degraded");
    expect(drops).toBe(1);

    rss = 150 * MiB;
    monitor.sampleNow();
    expect(monitor.currentTier()).toBe("elevated");
    expect(health.get("memory").level).toBe("ok");

    unsubscribe();
    rss = 300 * MiB;
    monitor.sampleNow();
    expect(drops).toBe(1);
    expect(changes).toEqual([
      ["critical", "normal"],
      ["elevated", "critical"],
      ["critical", "elevated"],
    ]);
  });

  test("a failing sampler is treated as normal and logged", () => {
    const logger = new MemoryLogger();
    let fail = false;
    const monitor = new MemoryMonitor({
      thresholds,
      sampleIntervalMs: 60_000,
      sampler: () => {
        if (fail) throw new Error("procfs unavailable");
        return { rssBytes: 300 * MiB, heapUsedBytes: 0 };
      },
      logger,
    });
    monitor.sampleNow();
    expect(monitor.currentTier()).toBe("critical");
    fail = true;
    const sample = monitor.sampleNow();
    expect(sample.tier).toBe("normal");
    expect(sample.rssBytes).toBe(0);
    expect(monitor.currentTier()).toBe("normal");
    expect(logger.messages("warn")).toEqual([
      "memory sample failed; assuming normal",
    ]);
  });

  test("an invalid reading is a sample failure", () => {
    const logger = new MemoryLogger();
    const monitor = new MemoryMonitor({
      thresholds,
      sampleIntervalMs: 60_000,
      sampler: () => ({ rssBytes: Number.NaN, heapUsedBytes: 0 }),
      logger,
    });
    expect(monitor.sampleNow().tier).toBe("normal");
    expect(logger.entries[0].meta).toEqual({ error: "invalid rss reading: NaN" });
  });

  test("start samples immediately and stop is idempotent", () => {
    const monitor = new MemoryMonitor({
      thresholds,
      sampleIntervalMs: 60_000,
      sampler: () => ({ rssBytes: 120 * MiB, heapUsedBytes: 0 }),
    });
    monitor.start();
    expect(monitor.currentTier()).toBe("elevated");
    expect(monitor.lastSample()?.rssBytes).toBe(120 * MiB);
    monitor.stop();
    monitor.stop();
  });
});
