// src/fingerprint.ts
import { createHash } from "node:crypto";
import fs from "node:fs/promises";
import type { FingerprintMode } from "./config.js";
import { errorCode } from "./errors.js";
import type { FileStats } from "./model.js";

// bytes read from each end of the file in "sample" mode
export const SAMPLE_BYTES = 64 * 1024;

const ALG = "sha256";
const ENCODING = "base64";

export function statFingerprint(stats: FileStats): string {
  return `${stats.size}:${Math.trunc(stats.mtime)}`;
}

/**
 * Digest of the first and last SAMPLE_BYTES. Catches content rewrites that
 * keep size and mtime (some taggers restore the mtime after editing).
 */
export async function sampleDigest(
  path: string,
  size: number,
): Promise<string> {
  const hash = createHash(ALG);
  const fh = await fs.open(path, "r");
  try {
    const headLen = Math.min(size, SAMPLE_BYTES);
    const head = Buffer.alloc(headLen);
    const { bytesRead } = await fh.read(head, 0, headLen, 0);
    hash.update(head.subarray(0, bytesRead));
    if (size > SAMPLE_BYTES) {
      const tailLen = Math.min(SAMPLE_BYTES, size - headLen);
      const tail = Buffer.alloc(tailLen);
      const res = await fh.read(tail, 0, tailLen, size - tailLen);
      hash.update(tail.subarray(0, res.bytesRead));
    }
  } finally {
    await fh.close();
  }
  return hash.digest(ENCODING);
}

export async function computeFingerprint(
  path: string,
  stats: FileStats,
  mode: FingerprintMode,
): Promise<string> {
  const base = statFingerprint(stats);
  if (mode === "stat") return base;
  return `${base}:${await sampleDigest(path, stats.size)}`;
}

export async function statFile(path: string): Promise<FileStats | null> {
  try {
    const st = await fs.stat(path);
    if (!st.isFile()) return null;
    return { size: st.size, mtime: st.mtimeMs };
  } catch (err) {
    const code = errorCode(err);
    if (code === "ENOENT" || code === "ENOTDIR") return null;
    throw err;
  }
}
