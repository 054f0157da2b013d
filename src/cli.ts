#!/usr/bin/env node
// src/cli.ts
import path from "node:path";
import { AlignmentEnum, AsciiTable3 } from "ascii-table3";
import {
  Command,
  InvalidArgumentError,
  Option,
  type OptionValues,
} from "commander";
import {
  getDefaultDbPath,
  getShelfwatchHome,
  resolveConfig,
  type FingerprintMode,
  type IndexerConfig,
} from "./config.js";
import { CLI_NAME } from "./constants.js";
import { describeError } from "./errors.js";
import { fmtAgo, fmtBytes, fmtIssue, fmtList, fmtLocalPath } from "./format.js";
import { autoIgnoreForRoot, collectIgnoreOption } from "./ignore.js";
import { IndexStore, type QueryFilter } from "./index-store.js";
import {
  ConsoleLogger,
  LOG_FORMATS,
  LOG_LEVELS,
  parseLogFormat,
  parseLogLevel,
  type Logger,
} from "./logger.js";
import { encodeMetadata } from "./metadata.js";
import {
  parseScanState,
  SCAN_STATES,
  type FileRecord,
  type FileStatus,
  type ScanState,
} from "./model.js";
import { IndexPipeline, type PipelineSummary } from "./pipeline.js";

const VERSION = "0.1.0";

type GlobalOpts = { logLevel?: string; logFormat?: string; db?: string };

type IndexerOpts = {
  root?: string[];
  ignore?: string[];
  quietMs?: number;
  concurrency?: number;
  fingerprint?: string;
  moveWindowMs?: number;
};

function parseIntOption(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError("expected a non-negative integer");
  }
  return n;
}

function parseFingerprint(raw: string | undefined): FingerprintMode | undefined {
  return raw === "stat" || raw === "sample" ? raw : undefined;
}

function globalsOf(cmd: Command): GlobalOpts {
  return cmd.optsWithGlobals<GlobalOpts & OptionValues>();
}

function loggerFor(cmd: Command): Logger {
  const opts = globalsOf(cmd);
  return new ConsoleLogger(
    parseLogLevel(opts.logLevel, "info"),
    parseLogFormat(opts.logFormat ?? process.env.SHELFWATCH_LOG_FORMAT),
  );
}

function dbPathFor(cmd: Command): string {
  const db = globalsOf(cmd).db;
  return db ? path.resolve(db) : getDefaultDbPath();
}

function configFor(cmd: Command, opts: IndexerOpts): IndexerConfig {
  const roots = opts.root ?? [];
  const home = getShelfwatchHome();
  const ignoreRules = [
    ...(opts.ignore ?? []),
    ...roots.flatMap((r) => autoIgnoreForRoot(r, home)),
  ];
  return resolveConfig({
    roots,
    dbPath: dbPathFor(cmd),
    ignoreRules,
    quietPeriodMs: opts.quietMs,
    concurrency: opts.concurrency,
    fingerprint: parseFingerprint(opts.fingerprint),
    moveWindowMs: opts.moveWindowMs,
  });
}

function addIndexerOptions(cmd: Command, { rootRequired = true } = {}) {
  const root = new Option(
    "-r, --root <dir...>",
    "library root to index (repeatable)",
  );
  if (rootRequired) root.makeOptionMandatory();
  return cmd
    .addOption(root)
    .option(
      "--ignore <pattern>",
      "gitignore-style rule, relative to the root (repeatable)",
      collectIgnoreOption,
      [],
    )
    .option("--quiet-ms <ms>", "debounce quiet period", parseIntOption)
    .option("--move-window-ms <ms>", "rename pairing window", parseIntOption)
    .option("--concurrency <n>", "extraction workers", parseIntOption)
    .addOption(
      new Option("--fingerprint <mode>", "change detection fingerprint").choices(
        ["stat", "sample"],
      ),
    );
}

// ---------- rendering ----------

export function renderSummary(summary: PipelineSummary): string {
  const tail =
    `queue ${summary.queueDepth}, running ${summary.inFlight}, ` +
    `memory ${summary.memoryTier}, health ${summary.health.overall}`;
  return `${renderCounts(summary.counts)}\n${tail}`;
}

export function renderCounts(counts: Record<ScanState, number>): string {
  const table = new AsciiTable3("Index")
    .setHeading("State", "Files")
    .setStyle("unicode-round")
    .setAlign(2, AlignmentEnum.RIGHT);
  let total = 0;
  for (const state of SCAN_STATES) {
    table.addRow(state, counts[state]);
    total += counts[state];
  }
  table.addRow("total", total);
  return table.toString();
}

export function renderStatus(
  status: FileStatus,
  now = Date.now(),
  home?: string,
): string {
  const table = new AsciiTable3(fmtLocalPath(status.path, home))
    .setHeading("Field", "Value")
    .setStyle("unicode-round");
  table.addRow("state", status.scanState);
  table.addRow(
    "last scanned",
    status.lastScannedAt == null ? "-" : fmtAgo(status.lastScannedAt, now),
  );
  table.addRow("failures", status.failureCount);
  table.addRow("last error", status.lastError ?? "-");
  return table.toString();
}

export function renderRecords(records: FileRecord[], home?: string): string {
  const table = new AsciiTable3()
    .setHeading("Path", "State", "Size", "Issue", "Publisher", "Writers")
    .setStyle("unicode-round")
    .setAlign(3, AlignmentEnum.RIGHT);
  for (const rec of records) {
    table.addRow(
      fmtLocalPath(rec.path, home),
      rec.scanState,
      fmtBytes(rec.size),
      fmtIssue(rec.metadata) || "-",
      fmtList(rec.metadata, "publisher") || "-",
      fmtList(rec.metadata, "writer") || "-",
    );
  }
  return table.toString();
}

export function recordJson(rec: FileRecord): string {
  return JSON.stringify({
    path: rec.path,
    size: rec.size,
    mtime: rec.mtime,
    scanState: rec.scanState,
    lastScannedAt: rec.lastScannedAt,
    lastError: rec.lastError,
    failureCount: rec.failureCount,
    metadata: JSON.parse(encodeMetadata(rec.metadata)),
  });
}

// ---------- commands ----------

function waitForSignal(logger: Logger): Promise<void> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      logger.info("shutting down", { signal });
      resolve();
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  });
}

function openStore(cmd: Command): IndexStore {
  const dbPath = dbPathFor(cmd);
  try {
    return IndexStore.open(dbPath);
  } catch (err) {
    return cmd.error(`cannot open index at ${dbPath}: ${describeError(err)}`);
  }
}

export function buildProgram(): Command {
  const program = new Command()
    .name(CLI_NAME)
    .description("Keep a SQLite index of the metadata inside comic archives")
    .version(VERSION);

  program
    .option(
      "--log-level <level>",
      `log verbosity (${LOG_LEVELS.join(", ")})`,
      "info",
    )
    .addOption(
      new Option("--log-format <format>", "log line format").choices(
        LOG_FORMATS,
      ),
    )
    .option("--db <file>", "index database (default: under the data home)");

  addIndexerOptions(
    program
      .command("watch")
      .description("index the roots, then follow changes until interrupted"),
  )
    .option("--no-initial-sweep", "skip the startup sweep")
    .action(
      async (opts: IndexerOpts & { initialSweep: boolean }, cmd: Command) => {
        const logger = loggerFor(cmd);
        const pipeline = new IndexPipeline({
          config: configFor(cmd, opts),
          logger,
        });
        await pipeline.start();
        try {
          if (opts.initialSweep) await pipeline.fullSweep();
          await waitForSignal(logger);
        } finally {
          await pipeline.stop();
        }
      },
    );

  addIndexerOptions(
    program
      .command("scan")
      .description("sweep the roots once, wait for every scan, and exit"),
  ).action(async (opts: IndexerOpts, cmd: Command) => {
    const pipeline = new IndexPipeline({
      config: configFor(cmd, opts),
      logger: loggerFor(cmd),
      watch: false,
    });
    await pipeline.start();
    try {
      await pipeline.fullSweep();
      await pipeline.drain();
      console.log(renderSummary(pipeline.summary()));
    } finally {
      await pipeline.stop();
    }
  });

  addIndexerOptions(
    program
      .command("rescan")
      .description("re-extract metadata for the given archives")
      .argument("<paths...>", "archive files"),
    { rootRequired: false },
  ).action(async (paths: string[], opts: IndexerOpts, cmd: Command) => {
    const files = paths.map((p) => path.resolve(p));
    // without --root, each file's directory is its root
    const roots = opts.root?.length
      ? opts.root
      : files.map((f) => path.dirname(f));
    const pipeline = new IndexPipeline({
      config: configFor(cmd, { ...opts, root: roots }),
      logger: loggerFor(cmd),
      watch: false,
    });
    await pipeline.start();
    let rejected = 0;
    try {
      for (const file of files) {
        if (!pipeline.requestRescan(file)) rejected++;
      }
      await pipeline.drain();
      for (const file of files) {
        const status = pipeline.status(file);
        if (status) console.log(renderStatus(status));
      }
    } finally {
      await pipeline.stop();
    }
    if (rejected) process.exitCode = 1;
  });

  program
    .command("status")
    .description("show the state of one archive, or counts for the index")
    .argument("[path]", "archive file")
    .action((file: string | undefined, _opts: OptionValues, cmd: Command) => {
      const store = openStore(cmd);
      try {
        if (file) {
          const status = store.status(path.resolve(file));
          if (!status) {
            console.log(`${file}: not indexed`);
            process.exitCode = 1;
            return;
          }
          console.log(renderStatus(status));
        } else {
          console.log(renderCounts(store.countByState()));
        }
      } finally {
        store.close();
      }
    });

  program
    .command("query")
    .description("list indexed archives matching the filters")
    .option("--series <name>", "series (case-insensitive)")
    .option("--publisher <name>", "publisher (case-insensitive)")
    .option("--title <text>", "title substring")
    .option("--tag <tag>", "tag")
    .option("--prefix <dir>", "only files under this directory")
    .addOption(
      new Option("--state <state>", "scan state").choices([...SCAN_STATES]),
    )
    .option("--failures <n>", "at least this many failures", parseIntOption)
    .option("--limit <n>", "stop after n results", parseIntOption)
    .option("--json", "one JSON object per line", false)
    .action(
      (
        opts: {
          series?: string;
          publisher?: string;
          title?: string;
          tag?: string;
          prefix?: string;
          state?: string;
          failures?: number;
          limit?: number;
          json: boolean;
        },
        cmd: Command,
      ) => {
        const filter: QueryFilter = {
          series: opts.series,
          publisher: opts.publisher,
          title: opts.title,
          tag: opts.tag,
          pathPrefix: opts.prefix ? path.resolve(opts.prefix) : undefined,
          scanState: opts.state ? parseScanState(opts.state) : undefined,
          minFailures: opts.failures,
        };
        const store = openStore(cmd);
        try {
          const rows: FileRecord[] = [];
          for (const rec of store.query(filter)) {
            if (opts.limit != null && rows.length >= opts.limit) break;
            if (opts.json) console.log(recordJson(rec));
            rows.push(rec);
          }
          if (!opts.json) console.log(renderRecords(rows));
        } finally {
          store.close();
        }
      },
    );

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error(`${CLI_NAME}: ${describeError(err)}`);
      process.exit(1);
    });
}
