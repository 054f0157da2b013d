// src/fs-watch.ts
//
// Chokidar adapter feeding the change detector.

import { watch, type FSWatcher } from "chokidar";
import type { Stats } from "node:fs";
import { stat } from "node:fs/promises";
import type { WatchEvent } from "./change-detector.js";
import { describeError, errorCode, WatchError } from "./errors.js";
import type { HealthState } from "./health.js";
import { NullLogger, type Logger } from "./logger.js";
import { MovePairer } from "./move-pairing.js";
import { isHiddenRel, relUnder } from "./util.js";

export interface FsWatchSourceOptions {
  roots: readonly string[];
  moveWindowMs: number;
  retryMinMs: number;
  retryMaxMs: number;
  onEvent: (event: WatchEvent) => void;
  /** called once a lost root is being watched again */
  onRecovered?: (root: string) => void;
  health?: HealthState;
  logger?: Logger;
}

type RootWatch = {
  root: string;
  watcher: FSWatcher | null;
  pairer: MovePairer | null;
  retryTimer: NodeJS.Timeout | null;
  attempt: number;
  failed: boolean;
  // resolves a pending wait for "ready" when the watcher is torn down early
  abortReady: (() => void) | null;
};

export function retryDelay(attempt: number, minMs: number, maxMs: number) {
  return Math.min(maxMs, minMs * 2 ** Math.max(0, attempt));
}

export class FsWatchSource {
  private readonly watches = new Map<string, RootWatch>();
  private readonly logger: Logger;
  private closed = false;

  constructor(private readonly opts: FsWatchSourceOptions) {
    this.logger = opts.logger ?? new NullLogger();
    for (const root of opts.roots) {
      this.watches.set(root, {
        root,
        watcher: null,
        pairer: null,
        retryTimer: null,
        attempt: 0,
        failed: false,
        abortReady: null,
      });
    }
  }

  /** Resolves once every root is either watched or scheduled for retry. */
  async start(): Promise<void> {
    await Promise.all(
      Array.from(this.watches.values(), (w) => this.startRoot(w)),
    );
  }

  failedRoots(): string[] {
    return Array.from(this.watches.values())
      .filter((w) => w.failed)
      .map((w) => w.root);
  }

  async stop(): Promise<void> {
    this.closed = true;
    await Promise.all(
      Array.from(this.watches.values(), async (w) => {
        if (w.retryTimer) {
          clearTimeout(w.retryTimer);
          w.retryTimer = null;
        }
        await this.closeRoot(w);
      }),
    );
  }

  private async startRoot(w: RootWatch): Promise<boolean> {
    let st: Stats;
    try {
      st = await stat(w.root);
    } catch (err) {
      this.fail(
        w,
        new WatchError("root is not reachable", w.root, { cause: err }),
      );
      return false;
    }
    if (!st.isDirectory()) {
      this.fail(w, new WatchError("root is not a directory", w.root));
      return false;
    }
    if (this.closed) return false;

    const pairer = new MovePairer({
      windowMs: this.opts.moveWindowMs,
      emit: (event) => this.opts.onEvent(event),
    });
    const watcher = watch(w.root, {
      persistent: true,
      // the initial pass only seeds inodes for move pairing
      ignoreInitial: false,
      alwaysStat: true,
      followSymlinks: false,
      ignored: (p: string) => {
        const rel = relUnder(w.root, p);
        return rel !== null && isHiddenRel(rel);
      },
    });
    w.watcher = watcher;
    w.pairer = pairer;

    let ready = false;
    watcher.on("add", (p: string, stats?: Stats) => {
      if (ready) pairer.add(p, stats?.ino);
      else pairer.seed(p, stats?.ino);
    });
    watcher.on("change", (p: string, stats?: Stats) => {
      if (ready) pairer.change(p, stats?.ino);
    });
    watcher.on("unlink", (p: string) => {
      if (ready) pairer.unlink(p);
    });
    watcher.on("unlinkDir", (p: string) => {
      if (p === w.root) {
        this.fail(w, new WatchError("root was removed", w.root));
      } else if (ready) {
        pairer.unlinkDir(p);
      }
    });
    // the root's own deletion or rename arrives as a raw rename; chokidar
    // does not always follow it with an unlinkDir for the root
    watcher.on("raw", (event: string) => {
      if (event === "rename") this.checkRoot(w, watcher);
    });
    watcher.on("error", (err: unknown) => {
      if (errorCode(err) === "ELOOP") {
        // symlink loops are skipped, not fatal
        this.logger.debug("symlink loop", { root: w.root });
        return;
      }
      this.fail(
        w,
        new WatchError(`watcher failed: ${describeError(err)}`, w.root, {
          cause: err,
        }),
      );
    });

    await new Promise<void>((resolve) => {
      w.abortReady = resolve;
      watcher.once("ready", () => resolve());
    });
    w.abortReady = null;
    ready = true;
    if (w.watcher !== watcher) {
      // failed while the initial pass was running
      return false;
    }
    this.logger.info("watching", { root: w.root });
    return true;
  }

  private checkRoot(w: RootWatch, watcher: FSWatcher) {
    stat(w.root).then(
      (st) => {
        if (!st.isDirectory() && w.watcher === watcher) {
          this.fail(w, new WatchError("root is not a directory", w.root));
        }
      },
      (err: unknown) => {
        if (w.watcher !== watcher) return;
        this.fail(
          w,
          new WatchError("root was removed", w.root, { cause: err }),
        );
      },
    );
  }

  private fail(w: RootWatch, err: WatchError) {
    if (this.closed || w.failed) return;
    w.failed = true;
    this.logger.warn("watch lost", { root: w.root, error: err.message });
    this.updateHealth();
    this.closeRoot(w).catch((closeErr) =>
      this.logger.debug("closing failed watcher", {
        root: w.root,
        error: describeError(closeErr),
      }),
    );
    this.scheduleRetry(w);
  }

  private scheduleRetry(w: RootWatch) {
    if (this.closed) return;
    const delay = retryDelay(
      w.attempt,
      this.opts.retryMinMs,
      this.opts.retryMaxMs,
    );
    w.attempt++;
    w.retryTimer = setTimeout(() => {
      w.retryTimer = null;
      this.retry(w).catch((err) => {
        this.logger.warn("watch retry failed", {
          root: w.root,
          error: describeError(err),
        });
        this.scheduleRetry(w);
      });
    }, delay);
    w.retryTimer.unref();
  }

  private async retry(w: RootWatch) {
    if (this.closed) return;
    w.failed = false;
    const ok = await this.startRoot(w);
    if (!ok || w.failed) return;
    w.attempt = 0;
    this.updateHealth();
    this.logger.info("watch recovered", { root: w.root });
    this.opts.onRecovered?.(w.root);
  }

  private async closeRoot(w: RootWatch) {
    const watcher = w.watcher;
    w.watcher = null;
    w.abortReady?.();
    w.abortReady = null;
    w.pairer?.close();
    w.pairer = null;
    if (watcher) await watcher.close();
  }

  private updateHealth() {
    const failed = this.failedRoots();
    if (failed.length) {
      this.opts.health?.set(
        "watch",
        "fatal",
        `not watching: ${failed.join(", ")}`,
      );
    } else {
      this.opts.health?.ok("watch");
    }
  }
}
