// src/config.ts
import fs from "node:fs";
import os from "node:os";
import path, { join } from "node:path";
import { CLI_NAME } from "./constants.js";
import { envNumber, isWithin } from "./util.js";

export type FingerprintMode = "stat" | "sample";

export interface MemoryThresholds {
  elevatedBytes: number;
  criticalBytes: number;
  hysteresisBytes: number;
}

export interface IndexerConfig {
  roots: string[];
  dbPath: string;
  ignoreRules: string[];

  quietPeriodMs: number;
  flushIntervalMs: number;
  moveWindowMs: number;

  concurrency: number;
  deferDelayMs: number;
  archiveTimeoutMs: number;
  maxDescriptorBytes: number;
  fingerprint: FingerprintMode;

  sampleIntervalMs: number;
  memory: MemoryThresholds;

  watchRetryMinMs: number;
  watchRetryMaxMs: number;
}

const MiB = 1024 * 1024;

export function defaultConfig(): Omit<IndexerConfig, "roots" | "dbPath"> {
  return {
    ignoreRules: [],
    quietPeriodMs: envNumber("SHELFWATCH_QUIET_MS", 2000),
    flushIntervalMs: envNumber("SHELFWATCH_FLUSH_INTERVAL_MS", 250),
    moveWindowMs: envNumber("SHELFWATCH_MOVE_WINDOW_MS", 300),
    concurrency: envNumber("SHELFWATCH_CONCURRENCY", 2),
    deferDelayMs: envNumber("SHELFWATCH_DEFER_MS", 1000),
    archiveTimeoutMs: envNumber("SHELFWATCH_ARCHIVE_TIMEOUT_MS", 30_000),
    maxDescriptorBytes: envNumber("SHELFWATCH_MAX_DESCRIPTOR_BYTES", MiB),
    fingerprint: "stat",
    sampleIntervalMs: envNumber("SHELFWATCH_MEMORY_SAMPLE_MS", 1000),
    memory: {
      elevatedBytes: envNumber("SHELFWATCH_MEMORY_ELEVATED_MB", 768) * MiB,
      criticalBytes: envNumber("SHELFWATCH_MEMORY_CRITICAL_MB", 1024) * MiB,
      hysteresisBytes: envNumber("SHELFWATCH_MEMORY_HYSTERESIS_MB", 64) * MiB,
    },
    watchRetryMinMs: 1000,
    watchRetryMaxMs: 60_000,
  };
}

export function resolveConfig(
  input: Partial<IndexerConfig> & { roots: string[] },
): IndexerConfig {
  const base = defaultConfig();
  const roots = normalizeRoots(input.roots);
  if (!roots.length) {
    throw new Error("at least one library root is required");
  }
  const memory = { ...base.memory, ...(input.memory ?? {}) };
  if (memory.criticalBytes < memory.elevatedBytes) {
    throw new Error(
      `critical memory threshold (${memory.criticalBytes}) is below the elevated one (${memory.elevatedBytes})`,
    );
  }
  return {
    roots,
    dbPath: input.dbPath ?? getDefaultDbPath(),
    ignoreRules: input.ignoreRules ?? base.ignoreRules,
    quietPeriodMs: input.quietPeriodMs ?? base.quietPeriodMs,
    flushIntervalMs: input.flushIntervalMs ?? base.flushIntervalMs,
    moveWindowMs: input.moveWindowMs ?? base.moveWindowMs,
    concurrency: Math.max(1, Math.floor(input.concurrency ?? base.concurrency)),
    deferDelayMs: input.deferDelayMs ?? base.deferDelayMs,
    archiveTimeoutMs: input.archiveTimeoutMs ?? base.archiveTimeoutMs,
    maxDescriptorBytes: input.maxDescriptorBytes ?? base.maxDescriptorBytes,
    fingerprint: input.fingerprint ?? base.fingerprint,
    sampleIntervalMs: input.sampleIntervalMs ?? base.sampleIntervalMs,
    memory,
    watchRetryMinMs: input.watchRetryMinMs ?? base.watchRetryMinMs,
    watchRetryMaxMs: input.watchRetryMaxMs ?? base.watchRetryMaxMs,
  };
}

// Canonical absolute roots; nested duplicates collapse into their parent.
export function normalizeRoots(roots: readonly string[]): string[] {
  const resolved = Array.from(
    new Set(roots.filter(Boolean).map((r) => path.resolve(expandHome(r)))),
  ).sort((a, b) => a.length - b.length);
  const out: string[] = [];
  for (const r of resolved) {
    if (!out.some((p) => isWithin(p, r))) out.push(r);
  }
  return out;
}

export function rootFor(roots: readonly string[], abs: string): string | null {
  for (const root of roots) {
    if (isWithin(root, abs)) return root;
  }
  return null;
}


// Paths & Home

export function getShelfwatchHome(): string {
  const explicit = process.env.SHELFWATCH_HOME?.trim();
  if (explicit) {
    return ensureDir(expandHome(explicit));
  }

  const xdg = process.env.XDG_DATA_HOME;
  if (xdg && xdg.trim()) {
    return ensureDir(join(expandHome(xdg), CLI_NAME));
  }

  const home = os.homedir();
  if (process.platform === "darwin") {
    return ensureDir(join(home, "Library", "Application Support", CLI_NAME));
  }
  if (process.platform === "win32") {
    const appData = process.env.APPDATA || join(home, "AppData", "Roaming");
    return ensureDir(join(appData, CLI_NAME));
  }
  return ensureDir(join(home, ".local", "share", CLI_NAME));
}

export function getDefaultDbPath(home = getShelfwatchHome()): string {
  return join(home, "index.db");
}

function ensureDir(p: string): string {
  fs.mkdirSync(p, { recursive: true });
  return p;
}

export function expandHome(p: string): string {
  if (p === "~" || p.startsWith("~/")) {
    return join(os.homedir(), p.slice(1));
  }
  return p;
}
