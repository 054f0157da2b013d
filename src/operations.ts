// src/operations.ts
//
// Registry of long-running operations (sweeps, rescans).

import { randomUUID } from "node:crypto";

export type OperationStatus = "running" | "completed" | "error";

export interface Operation {
  id: string;
  type: string;
  label: string;
  status: OperationStatus;
  current: number;
  total: number;
  detail: string;
  startedAt: number;
  updatedAt: number;
  completedAt: number | null;
}

export interface OperationRegistryOptions {
  completedTtlMs?: number;
  staleTimeoutMs?: number;
  clock?: () => number;
}

export const COMPLETED_TTL_MS = 10 * 60_000;
export const STALE_TIMEOUT_MS = 30 * 60_000;

export class OperationRegistry {
  private readonly ops = new Map<string, Operation>();
  private readonly completedTtlMs: number;
  private readonly staleTimeoutMs: number;
  private readonly clock: () => number;

  constructor(opts: OperationRegistryOptions = {}) {
    this.completedTtlMs = opts.completedTtlMs ?? COMPLETED_TTL_MS;
    this.staleTimeoutMs = opts.staleTimeoutMs ?? STALE_TIMEOUT_MS;
    this.clock = opts.clock ?? Date.now;
  }

  register(type: string, label: string, total = 0): string {
    const now = this.clock();
    const id = randomUUID();
    this.ops.set(id, {
      id,
      type,
      label,
      status: "running",
      current: 0,
      total,
      detail: "Starting...",
      startedAt: now,
      updatedAt: now,
      completedAt: null,
    });
    return id;
  }

  update(
    id: string,
    patch: { current?: number; total?: number; detail?: string },
  ): void {
    const op = this.ops.get(id);
    if (!op || op.status !== "running") return;
    if (patch.current != null) op.current = patch.current;
    if (patch.total != null) op.total = patch.total;
    if (patch.detail != null) op.detail = patch.detail;
    op.updatedAt = this.clock();
  }

  complete(id: string, { error = false }: { error?: boolean } = {}): void {
    const op = this.ops.get(id);
    if (!op) return;
    const now = this.clock();
    op.status = error ? "error" : "completed";
    if (!error) op.current = op.total;
    op.updatedAt = now;
    op.completedAt = now;
  }

  get(id: string): Operation | undefined {
    this.sweep();
    const op = this.ops.get(id);
    return op ? { ...op } : undefined;
  }

  /** Live and recently finished operations, oldest first. */
  list(): Operation[] {
    this.sweep();
    return Array.from(this.ops.values(), (op) => ({ ...op })).sort(
      (a, b) => a.startedAt - b.startedAt,
    );
  }

  private sweep() {
    const now = this.clock();
    for (const [id, op] of this.ops) {
      if (op.completedAt != null) {
        if (now - op.completedAt > this.completedTtlMs) this.ops.delete(id);
        continue;
      }
      if (now - op.updatedAt > this.staleTimeoutMs) {
        op.status = "error";
        op.detail = "Operation stalled";
        op.completedAt = now;
      }
    }
  }
}
