// src/move-pairing.ts
//
// chokidar reports a rename as an unlink plus an add. Both halves carry the
// same inode, so we hold each half for a short window and merge them into a
// single move when the other half shows up.

import type { WatchEvent } from "./change-detector.js";

type Held = { path: string; ino: number; timer: NodeJS.Timeout };

export interface MovePairerOptions {
  windowMs: number;
  emit: (event: WatchEvent) => void;
}

export class MovePairer {
  private readonly inodeByPath = new Map<string, number>();
  private readonly pathsByInode = new Map<number, Set<string>>();
  // unlinks waiting for an add with the same inode
  private readonly unlinks = new Map<number, Held>();
  // adds whose inode still belongs to a live path, waiting for its unlink
  private readonly adds = new Map<number, Held>();
  private readonly dirs = new Map<string, NodeJS.Timeout>();
  private closed = false;

  constructor(private readonly opts: MovePairerOptions) {}

  /** Remember a file's inode without emitting anything (initial scan). */
  seed(path: string, ino?: number) {
    if (validIno(ino)) this.track(path, ino);
  }

  add(path: string, ino?: number) {
    if (this.closed) return;
    if (!validIno(ino)) {
      this.opts.emit({ kind: "create", path });
      return;
    }
    const pending = this.unlinks.get(ino);
    if (pending) {
      clearTimeout(pending.timer);
      this.unlinks.delete(ino);
      this.track(path, ino);
      this.opts.emit(
        pending.path === path
          ? { kind: "modify", path }
          : { kind: "move", from: pending.path, path },
      );
      return;
    }
    const owners = this.pathsByInode.get(ino);
    const other = owners && [...owners].find((p) => p !== path);
    if (other && !this.adds.has(ino)) {
      // the add arrived before the unlink of the old name
      const timer = setTimeout(() => {
        this.adds.delete(ino);
        this.track(path, ino);
        this.opts.emit({ kind: "create", path });
      }, this.opts.windowMs);
      this.adds.set(ino, { path, ino, timer });
      return;
    }
    this.track(path, ino);
    this.opts.emit({ kind: "create", path });
  }

  change(path: string, ino?: number) {
    if (this.closed) return;
    if (validIno(ino)) this.track(path, ino);
    this.opts.emit({ kind: "modify", path });
  }

  unlink(path: string) {
    if (this.closed) return;
    const ino = this.inodeByPath.get(path);
    this.untrack(path);
    if (ino === undefined) {
      this.opts.emit({ kind: "delete", path });
      return;
    }
    const early = this.adds.get(ino);
    if (early && early.path !== path) {
      clearTimeout(early.timer);
      this.adds.delete(ino);
      this.track(early.path, ino);
      this.opts.emit({ kind: "move", from: path, path: early.path });
      return;
    }
    const prev = this.unlinks.get(ino);
    if (prev) {
      // two unlinks for one inode (hard links): settle the older one now
      clearTimeout(prev.timer);
      this.opts.emit({ kind: "delete", path: prev.path });
    }
    const timer = setTimeout(() => {
      this.unlinks.delete(ino);
      this.opts.emit({ kind: "delete", path });
    }, this.opts.windowMs);
    this.unlinks.set(ino, { path, ino, timer });
  }

  /**
   * Directory removal is reported after the window so that files moved out
   * of it are paired first.
   */
  unlinkDir(dir: string) {
    if (this.closed || this.dirs.has(dir)) return;
    const timer = setTimeout(() => {
      this.dirs.delete(dir);
      this.opts.emit({ kind: "deleteDir", path: dir });
    }, this.opts.windowMs);
    this.dirs.set(dir, timer);
  }

  /** Settle every held event right away. */
  flush() {
    for (const held of this.unlinks.values()) {
      clearTimeout(held.timer);
      this.opts.emit({ kind: "delete", path: held.path });
    }
    this.unlinks.clear();
    for (const held of this.adds.values()) {
      clearTimeout(held.timer);
      this.track(held.path, held.ino);
      this.opts.emit({ kind: "create", path: held.path });
    }
    this.adds.clear();
    for (const [dir, timer] of this.dirs) {
      clearTimeout(timer);
      this.opts.emit({ kind: "deleteDir", path: dir });
    }
    this.dirs.clear();
  }

  close() {
    this.closed = true;
    for (const held of this.unlinks.values()) clearTimeout(held.timer);
    for (const held of this.adds.values()) clearTimeout(held.timer);
    for (const timer of this.dirs.values()) clearTimeout(timer);
    this.unlinks.clear();
    this.adds.clear();
    this.dirs.clear();
  }

  private track(path: string, ino: number) {
    const prev = this.inodeByPath.get(path);
    if (prev === ino) return;
    if (prev !== undefined) this.untrack(path);
    this.inodeByPath.set(path, ino);
    let owners = this.pathsByInode.get(ino);
    if (!owners) {
      owners = new Set();
      this.pathsByInode.set(ino, owners);
    }
    owners.add(path);
  }

  private untrack(path: string) {
    const ino = this.inodeByPath.get(path);
    if (ino === undefined) return;
    this.inodeByPath.delete(path);
    const owners = this.pathsByInode.get(ino);
    owners?.delete(path);
    if (owners && owners.size === 0) this.pathsByInode.delete(ino);
  }
}

function validIno(ino: number | undefined): ino is number {
  return typeof ino === "number" && ino > 0;
}
