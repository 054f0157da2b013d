// src/archive.ts
//
// Read the descriptor entry and page count from an archive.
//
// Only the central directory and the single descriptor entry are read; page
// images are counted by name and never decompressed.

import fs from "node:fs/promises";
import path from "node:path";
import type { Readable } from "node:stream";
import { open as openZip, type Entry, type ZipFile } from "yauzl";
import { DESCRIPTOR_ENTRY, PAGE_EXTENSIONS } from "./constants.js";
import {
  ArchiveOpenError,
  describeError,
  ParseError,
  ScanTimeoutError,
} from "./errors.js";
import { withTimeout } from "./util.js";

export type ArchiveFormat = "zip" | "rar";

export interface ArchiveContents {
  format: ArchiveFormat;
  /** raw descriptor bytes, or null when the archive has none */
  descriptor: Buffer | null;
  /** null when the format cannot be listed */
  pageCount: number | null;
}

export interface ReadArchiveOptions {
  maxDescriptorBytes: number;
  timeoutMs: number;
}

export type ArchiveReader = (
  file: string,
  opts: ReadArchiveOptions,
) => Promise<ArchiveContents>;

const ZIP_LOCAL = Buffer.from([0x50, 0x4b, 0x03, 0x04]);
const ZIP_EMPTY = Buffer.from([0x50, 0x4b, 0x05, 0x06]);
const RAR = Buffer.from("Rar!\x1a\x07", "latin1");

export async function sniffFormat(file: string): Promise<ArchiveFormat | null> {
  const fh = await fs.open(file, "r");
  try {
    const head = Buffer.alloc(8);
    const { bytesRead } = await fh.read(head, 0, head.length, 0);
    const magic = head.subarray(0, bytesRead);
    if (startsWith(magic, ZIP_LOCAL) || startsWith(magic, ZIP_EMPTY)) {
      return "zip";
    }
    if (startsWith(magic, RAR)) return "rar";
    return null;
  } finally {
    await fh.close();
  }
}

function startsWith(buf: Buffer, prefix: Buffer): boolean {
  return (
    buf.length >= prefix.length &&
    buf.subarray(0, prefix.length).equals(prefix)
  );
}

export function isPageEntry(name: string): boolean {
  const base = path.posix.basename(name);
  if (!base || base.startsWith(".")) return false;
  if (name.startsWith("__MACOSX/")) return false;
  const ext = path.posix.extname(base).toLowerCase();
  return PAGE_EXTENSIONS.some((e) => e === ext);
}

function isDescriptorEntry(name: string): boolean {
  return path.posix.basename(name).toLowerCase() === DESCRIPTOR_ENTRY;
}

function depth(name: string): number {
  return name.split("/").length;
}

/**
 * Open `file`, pick out the descriptor and count pages. The whole operation is
 * bounded by `timeoutMs`; the archive handle is closed on every path.
 */
export async function readArchive(
  file: string,
  opts: ReadArchiveOptions,
): Promise<ArchiveContents> {
  let zip: ZipFile | null = null;
  let finished = false;
  const work = async (): Promise<ArchiveContents> => {
    let format: ArchiveFormat | null;
    try {
      format = await sniffFormat(file);
    } catch (err) {
      throw new ArchiveOpenError(
        `cannot read archive: ${describeError(err)}`,
        file,
        { cause: err },
      );
    }
    if (format === null) {
      throw new ArchiveOpenError("not a zip or rar archive", file);
    }
    if (format === "rar") {
      // no rar reader: indexed without metadata
      return { format, descriptor: null, pageCount: null };
    }
    const zf = await openZipFile(file);
    if (finished) {
      // timed out while opening
      closeQuietly(zf);
      throw new ScanTimeoutError(file, opts.timeoutMs);
    }
    zip = zf;
    const { descriptor, pageCount } = await listEntries(zf, file);
    const bytes = descriptor
      ? await readEntry(zf, descriptor, file, opts.maxDescriptorBytes)
      : null;
    return { format, descriptor: bytes, pageCount };
  };

  try {
    return await withTimeout(
      work(),
      opts.timeoutMs,
      () => new ScanTimeoutError(file, opts.timeoutMs),
    );
  } finally {
    finished = true;
    closeQuietly(zip);
  }
}

function closeQuietly(zip: ZipFile | null) {
  if (!zip) return;
  try {
    zip.close();
  } catch {
    // already closed
  }
}

function openZipFile(file: string): Promise<ZipFile> {
  return new Promise((resolve, reject) => {
    openZip(file, { lazyEntries: true, autoClose: false }, (err, zipfile) => {
      if (err || !zipfile) {
        reject(
          new ArchiveOpenError(
            `cannot open zip: ${describeError(err)}`,
            file,
            { cause: err },
          ),
        );
        return;
      }
      resolve(zipfile);
    });
  });
}

function listEntries(
  zip: ZipFile,
  file: string,
): Promise<{ descriptor: Entry | null; pageCount: number }> {
  return new Promise((resolve, reject) => {
    let descriptor: Entry | null = null;
    let pageCount = 0;
    const cleanup = () => {
      zip.removeListener("entry", onEntry);
      zip.removeListener("end", onEnd);
      zip.removeListener("error", onError);
    };
    const onEntry = (entry: Entry) => {
      const name = entry.fileName;
      if (!name.endsWith("/")) {
        if (isPageEntry(name)) pageCount++;
        // prefer the shallowest descriptor, normally the one at the root
        if (
          isDescriptorEntry(name) &&
          (!descriptor || depth(name) < depth(descriptor.fileName))
        ) {
          descriptor = entry;
        }
      }
      zip.readEntry();
    };
    const onEnd = () => {
      cleanup();
      resolve({ descriptor, pageCount });
    };
    const onError = (err: unknown) => {
      cleanup();
      reject(
        new ArchiveOpenError(
          `corrupt zip directory: ${describeError(err)}`,
          file,
          { cause: err },
        ),
      );
    };
    zip.on("entry", onEntry);
    zip.once("end", onEnd);
    zip.once("error", onError);
    zip.readEntry();
  });
}

function readEntry(
  zip: ZipFile,
  entry: Entry,
  file: string,
  maxBytes: number,
): Promise<Buffer> {
  if (entry.uncompressedSize > maxBytes) {
    return Promise.reject(
      new ParseError(
        `${entry.fileName} is ${entry.uncompressedSize} bytes (limit ${maxBytes})`,
        file,
      ),
    );
  }
  return new Promise((resolve, reject) => {
    zip.openReadStream(entry, (err, stream) => {
      if (err || !stream) {
        reject(
          new ArchiveOpenError(
            `cannot read ${entry.fileName}: ${describeError(err)}`,
            file,
            { cause: err },
          ),
        );
        return;
      }
      collect(stream, maxBytes).then(resolve, (streamErr: unknown) =>
        reject(
          streamErr instanceof ParseError
            ? new ParseError(streamErr.message, file)
            : new ArchiveOpenError(
                `cannot read ${entry.fileName}: ${describeError(streamErr)}`,
                file,
                { cause: streamErr },
              ),
        ),
      );
    });
  });
}

async function collect(stream: Readable, maxBytes: number): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let total = 0;
  for await (const chunk of stream) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    total += buf.length;
    if (total > maxBytes) {
      stream.destroy();
      throw new ParseError(`descriptor exceeds ${maxBytes} bytes`);
    }
    chunks.push(buf);
  }
  return Buffer.concat(chunks);
}
