// src/health.ts
//
// Subsystem health surface.

export type HealthLevel = "ok" | "degraded" | "fatal";

export type HealthComponent = "watch" | "store" | "memory" | "scanner";

export interface ComponentHealth {
  level: HealthLevel;
  message: string | null;
  since: number;
}

export type HealthSnapshot = Record<HealthComponent, ComponentHealth> & {
  overall: HealthLevel;
};

const RANK: Record<HealthLevel, number> = { ok: 0, degraded: 1, fatal: 2 };

export class HealthState {
  private readonly components = new Map<HealthComponent, ComponentHealth>();
  private readonly listeners = new Set<
    (component: HealthComponent, health: ComponentHealth) => void
  >();

  constructor(private readonly clock: () => number = Date.now) {}

  set(component: HealthComponent, level: HealthLevel, message?: string) {
    const prev = this.components.get(component);
    if (prev && prev.level === level && prev.message === (message ?? null)) {
      return;
    }
    const next: ComponentHealth = {
      level,
      message: message ?? null,
      since: this.clock(),
    };
    this.components.set(component, next);
    for (const fn of this.listeners) fn(component, next);
  }

  ok(component: HealthComponent) {
    this.set(component, "ok");
  }

  get(component: HealthComponent): ComponentHealth {
    return (
      this.components.get(component) ?? { level: "ok", message: null, since: 0 }
    );
  }

  onChange(
    fn: (component: HealthComponent, health: ComponentHealth) => void,
  ): () => void {
    this.listeners.add(fn);
    return () => this.listeners.delete(fn);
  }

  snapshot(): HealthSnapshot {
    const watch = this.get("watch");
    const store = this.get("store");
    const memory = this.get("memory");
    const scanner = this.get("scanner");
    const worst = [watch, store, memory, scanner].reduce<HealthLevel>(
      (acc, h) => (RANK[h.level] > RANK[acc] ? h.level : acc),
      "ok",
    );
    return { watch, store, memory, scanner, overall: worst };
  }
}
