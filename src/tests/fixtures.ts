import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { ZipFile } from "yazl";
import { resolveConfig, type IndexerConfig } from "../config";

export function wait(ms: number) {
  return new Promise((r) => setTimeout(r, ms));
}

export async function mkTmp(prefix: string): Promise<string> {
  return fsp.mkdtemp(path.join(os.tmpdir(), `shelfwatch-${prefix}-`));
}

export async function waitFor(
  pred: () => boolean,
  { timeoutMs = 5000, intervalMs = 10 } = {},
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!pred()) {
    if (Date.now() > deadline) throw new Error("timed out waiting");
    await wait(intervalMs);
  }
}

export type ZipEntries = Record<string, string | Buffer>;

export async function zipBuffer(entries: ZipEntries): Promise<Buffer> {
  const zip = new ZipFile();
  for (const [name, data] of Object.entries(entries)) {
    zip.addBuffer(Buffer.isBuffer(data) ? data : Buffer.from(data), name);
  }
  zip.end();
  const chunks: Buffer[] = [];
  for await (const chunk of zip.outputStream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

export async function writeZip(file: string, entries: ZipEntries) {
  await fsp.mkdir(path.dirname(file), { recursive: true });
  await fsp.writeFile(file, await zipBuffer(entries));
}

// small stand-in for a page image; only the name matters to the indexer
export const PAGE = Buffer.from("not really a jpeg");

export function comicInfo(fields: Record<string, string>): string {
  const body = Object.entries(fields)
    .map(([k, v]) => `  <${k}>${v}</${k}>`)
    .join("\n");
  return `<?xml version="1.0" encoding="utf-8"?>
<ComicInfo xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance">
${body}
</ComicInfo>
`;
}

export function testConfig(
  root: string,
  dbPath: string,
  overrides: Partial<IndexerConfig> = {},
): IndexerConfig {
  return resolveConfig({
    roots: [root],
    dbPath,
    quietPeriodMs: 50,
    flushIntervalMs: 10,
    moveWindowMs: 20,
    concurrency: 2,
    deferDelayMs: 30,
    archiveTimeoutMs: 5000,
    sampleIntervalMs: 60_000,
    ...overrides,
  });
}
