// src/model.ts
//
// Records, jobs and the scan state machine.

import type { MetadataMap } from "./metadata.js";

export type ScanState = "unscanned" | "queued" | "scanning" | "clean" | "failed";

export const SCAN_STATES: ScanState[] = [
  "unscanned",
  "queued",
  "scanning",
  "clean",
  "failed",
];

const TRANSITIONS: Record<ScanState, readonly ScanState[]> = {
  unscanned: ["queued"],
  queued: ["scanning"],
  scanning: ["clean", "failed"],
  clean: ["queued"],
  failed: ["queued"],
};

export function canTransition(from: ScanState, to: ScanState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function parseScanState(raw: unknown): ScanState {
  return SCAN_STATES.find((s) => s === raw) ?? "unscanned";
}

export interface FileStats {
  size: number;
  mtime: number;
}

export interface FileRecord extends FileStats {
  path: string;
  contentFingerprint: string;
  metadata: MetadataMap;
  scanState: ScanState;
  lastScannedAt: number | null;
  lastError: string | null;
  failureCount: number;
}

export interface FileStatus {
  path: string;
  scanState: ScanState;
  lastError: string | null;
  lastScannedAt: number | null;
  failureCount: number;
}

export type ScanReason =
  | "create"
  | "modify"
  | "delete"
  | "move"
  | "manual"
  | "sweep";

/**
 * Priority tiers. Destructive events outrank explicit requests so the index
 * never keeps serving a path that is gone.
 */
export const PRIORITY = {
  sweep: 0,
  change: 1,
  manual: 2,
  destructive: 3,
} as const;

export type Priority = (typeof PRIORITY)[keyof typeof PRIORITY];

export function priorityFor(reason: ScanReason): Priority {
  switch (reason) {
    case "delete":
    case "move":
      return PRIORITY.destructive;
    case "manual":
      return PRIORITY.manual;
    case "create":
    case "modify":
      return PRIORITY.change;
    case "sweep":
      return PRIORITY.sweep;
  }
}

export interface ScanJob {
  path: string;
  priority: Priority;
  enqueuedAt: number;
  reason: ScanReason;
  /** source path of a move; `path` is the destination */
  fromPath?: string;
}

export function makeJob(
  path: string,
  reason: ScanReason,
  opts: { fromPath?: string; now?: number } = {},
): ScanJob {
  const job: ScanJob = {
    path,
    reason,
    priority: priorityFor(reason),
    enqueuedAt: opts.now ?? Date.now(),
  };
  if (opts.fromPath) job.fromPath = opts.fromPath;
  return job;
}

export function isContentReason(reason: ScanReason): boolean {
  return reason === "create" || reason === "modify" || reason === "manual";
}
