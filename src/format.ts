// src/format.ts
//
// Small helpers for human-readable CLI output.

import os from "node:os";
import { getList, getString, type MetadataMap } from "./metadata.js";

const rtf = new Intl.RelativeTimeFormat("en", { numeric: "auto" });

export function fmtAgo(input: Date | number, now = Date.now()): string {
  const t = typeof input === "number" ? input : input.getTime();
  const diff = t - now; // negative for past, positive for future
  const units: [Intl.RelativeTimeFormatUnit, number][] = [
    ["year", 365 * 24 * 60 * 60 * 1000],
    ["month", 30 * 24 * 60 * 60 * 1000],
    ["week", 7 * 24 * 60 * 60 * 1000],
    ["day", 24 * 60 * 60 * 1000],
    ["hour", 60 * 60 * 1000],
    ["minute", 60 * 1000],
    ["second", 1000],
  ];

  for (const [unit, ms] of units) {
    const val = Math.trunc(diff / ms);
    if (Math.abs(val) >= 1) return rtf.format(val, unit);
  }
  return rtf.format(0, "second"); // "now"
}

export function fmtLocalPath(p: string, home = os.homedir()): string {
  if (!home) return p;
  if (p === home || p.startsWith(home + "/")) {
    return `~${p.slice(home.length)}`;
  }
  return p;
}

export function fmtBytes(n: number): string {
  const units = ["B", "KiB", "MiB", "GiB", "TiB"];
  let v = n;
  let i = 0;
  while (v >= 1024 && i < units.length - 1) {
    v /= 1024;
    i++;
  }
  return i === 0 ? `${v} ${units[i]}` : `${v.toFixed(1)} ${units[i]}`;
}

/** "Series #12 - Title" style label; empty string when nothing is known. */
export function fmtIssue(md: MetadataMap): string {
  const series = getString(md, "series");
  const number = getString(md, "number");
  const title = getString(md, "title");
  let out = series ?? "";
  if (number) out += out ? ` #${number}` : `#${number}`;
  if (title) out += out ? ` - ${title}` : title;
  return out;
}

export function fmtList(md: MetadataMap, key: string): string {
  return getList(md, key).join(", ");
}
