import ignore from "ignore";
import path from "node:path";
import { expandHome } from "./config.js";

export type Ignorer = {
  ignoresFile: (r: string) => boolean; // file path relative to its root
  ignoresDir: (r: string) => boolean; // directory path relative to its root
};

export function normalizeR(r: string): string {
  // rpath normalization; keep empty "" for root-safe callers
  return r.replace(/\\/g, "/").replace(/^\/+/, "");
}

function cleanPattern(pattern: string): string | null {
  const trimmed = pattern.trim();
  if (!trimmed || trimmed.startsWith("#")) return null;
  return trimmed.replace(/\\/g, "/");
}

export function normalizeIgnorePatterns(patterns: readonly string[]): string[] {
  const out = new Set<string>();
  for (const raw of patterns) {
    const cleaned = cleanPattern(raw);
    if (cleaned) out.add(cleaned);
  }
  return Array.from(out);
}

// commander collector: repeatable --ignore, each value may be comma separated
export function collectIgnoreOption(
  value: string,
  previous: string[] = [],
): string[] {
  const parts = value
    .split(",")
    .map((p) => p.trim())
    .filter(Boolean);
  return [...previous, ...parts];
}

export function createIgnorer(patterns: readonly string[] = []): Ignorer {
  const cleaned = normalizeIgnorePatterns(patterns);
  if (!cleaned.length) {
    return {
      ignoresFile: () => false,
      ignoresDir: () => false,
    };
  }
  const ig = ignore().add(cleaned);
  return {
    ignoresFile: (r) => {
      const rel = normalizeR(r);
      return rel !== "" && ig.ignores(rel);
    },
    // a trailing slash lets "dir/" rules match the directory itself
    ignoresDir: (r) => {
      const rel = normalizeR(r);
      return rel !== "" && ig.ignores(rel.endsWith("/") ? rel : `${rel}/`);
    },
  };
}

/** The index lives under the data home; never watch it if a root contains it. */
export function autoIgnoreForRoot(root: string, home: string): string[] {
  if (!root || !home) return [];
  const rootAbs = path.resolve(expandHome(root));
  const homeAbs = path.resolve(home);
  const rel = path.relative(rootAbs, homeAbs);
  if (!rel || rel.startsWith("..") || path.isAbsolute(rel)) return [];
  const posix = rel.split(path.sep).join("/");
  return normalizeIgnorePatterns([`${posix}/`]);
}
