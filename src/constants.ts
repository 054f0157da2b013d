// src/constants.ts

export const CLI_NAME = "shelfwatch";

// archive extensions we index; everything else is dropped by the detector
export const ARCHIVE_EXTENSIONS = [".cbz", ".zip", ".cbr", ".rar"] as const;

// name of the embedded descriptor entry (matched case-insensitively)
export const DESCRIPTOR_ENTRY = "comicinfo.xml";

export const PAGE_EXTENSIONS = [
  ".jpg",
  ".jpeg",
  ".png",
  ".gif",
  ".webp",
  ".avif",
  ".bmp",
] as const;

// consecutive failures after which sweeps stop re-queueing a path
export const POISON_FAILURE_THRESHOLD = 3;

export const SCHEMA_VERSION = 2;
