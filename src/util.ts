import path from "node:path";
import { ARCHIVE_EXTENSIONS } from "./constants.js";

export function envNumber(key: string, fallback: number): number {
  const raw = process.env[key];
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

/**
 * Race `work` against a timer. The timer is always cleared, and `onTimeout`
 * builds the rejection so callers keep their own error taxonomy.
 */
export async function withTimeout<T>(
  work: Promise<T>,
  ms: number,
  onTimeout: () => Error,
): Promise<T> {
  if (!Number.isFinite(ms) || ms <= 0) return work;
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

export function isArchivePath(p: string): boolean {
  const ext = path.extname(p).toLowerCase();
  return ARCHIVE_EXTENSIONS.some((e) => e === ext);
}

// any segment (after the root) starting with "." counts as hidden
export function isHiddenRel(rel: string): boolean {
  if (!rel) return false;
  return rel
    .split(/[\\/]/)
    .some((seg) => seg.startsWith(".") && seg !== "." && seg !== "..");
}

// POSIX-normalize path (also makes Windows separators into '/')
export const norm = (p: string) =>
  path.sep === "/" ? p : p.split(path.sep).join("/");

export function relUnder(root: string, abs: string): string | null {
  const r = path.relative(root, abs);
  if (r === "") return "";
  if (r.startsWith("..") || path.isAbsolute(r)) return null;
  return norm(r);
}

/** true when `child` is `parent` itself or lives somewhere below it */
export function isWithin(parent: string, child: string): boolean {
  return relUnder(parent, child) !== null;
}
