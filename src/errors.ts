// src/errors.ts

/** The watch root vanished or the OS watcher failed. Retried with backoff. */
export class WatchError extends Error {
  constructor(
    message: string,
    readonly root: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "WatchError";
  }
}

export class ArchiveOpenError extends Error {
  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ArchiveOpenError";
  }
}

export class ScanTimeoutError extends ArchiveOpenError {
  constructor(path: string, readonly timeoutMs: number) {
    super(`archive I/O timed out after ${timeoutMs} ms`, path);
    this.name = "ScanTimeoutError";
  }
}

/** The embedded descriptor exists but is not well-formed. */
export class ParseError extends Error {
  constructor(
    message: string,
    readonly path?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ParseError";
  }
}

export class StoreTransactionError extends Error {
  constructor(
    message: string,
    readonly intent: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "StoreTransactionError";
  }
}

export class MemorySampleError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MemorySampleError";
  }
}

export class ScanStateError extends Error {
  constructor(
    readonly path: string,
    readonly from: string,
    readonly to: string,
  ) {
    super(`illegal scan state transition ${from} -> ${to} for '${path}'`);
    this.name = "ScanStateError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) {
    return undefined;
  }
  const code = err.code;
  return typeof code === "string" ? code : undefined;
}
