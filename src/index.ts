export {
  IndexPipeline,
  type PipelineOptions,
  type PipelineSummary,
} from "./pipeline.js";

export {
  resolveConfig,
  defaultConfig,
  normalizeRoots,
  getShelfwatchHome,
  getDefaultDbPath,
  type IndexerConfig,
  type FingerprintMode,
  type MemoryThresholds,
} from "./config.js";

export {
  IndexStore,
  type QueryFilter,
} from "./index-store.js";

export {
  IndexWriter,
  type WriteIntent,
  type WriteOutcome,
} from "./index-writer.js";

export { ScanQueue, mergeJobs } from "./queue.js";

export {
  ChangeDetector,
  type WatchEvent,
  type ChangeDetectorOptions,
} from "./change-detector.js";

export { FsWatchSource } from "./fs-watch.js";

export { MovePairer } from "./move-pairing.js";

export {
  ScannerPool,
  type InvalidateEvent,
  type JobOutcome,
} from "./scanner.js";

export {
  MemoryMonitor,
  classify as classifyMemory,
  type MemoryTier,
  type MemorySample,
  type MemorySampler,
} from "./memory.js";

export { readArchive, sniffFormat, type ArchiveContents } from "./archive.js";

export { parseDescriptor } from "./descriptor.js";

export {
  COMICINFO_FIELDS,
  getString,
  getInt,
  getList,
  normalizeIssueNumber,
  type MetadataMap,
  type MetadataValue,
} from "./metadata.js";

export {
  PRIORITY,
  makeJob,
  canTransition,
  type FileRecord,
  type FileStatus,
  type ScanJob,
  type ScanReason,
  type ScanState,
} from "./model.js";

export {
  OperationRegistry,
  type Operation,
  type OperationStatus,
} from "./operations.js";

export {
  HealthState,
  type HealthLevel,
  type HealthSnapshot,
} from "./health.js";

export {
  ArchiveOpenError,
  MemorySampleError,
  ParseError,
  ScanStateError,
  ScanTimeoutError,
  StoreTransactionError,
  WatchError,
} from "./errors.js";

export {
  ConsoleLogger,
  MemoryLogger,
  NullLogger,
  StructuredLogger,
  formatEntry,
  type Logger,
  type LogFormat,
  type LogLevel,
} from "./logger.js";
