import fsp from "node:fs/promises";
import path from "node:path";
import { readArchive } from "../archive";
import type { IndexerConfig } from "../config";
import { IndexStore } from "../index-store";
import { MemoryMonitor } from "../memory";
import { IndexPipeline, type PipelineOptions } from "../pipeline";
import type { InvalidateEvent } from "../scanner";
import {
  comicInfo,
  mkTmp,
  PAGE,
  testConfig,
  waitFor,
  writeZip,
} from "./fixtures";

const MiB = 1024 * 1024;

describe("indexing pipeline", () => {
  let tmp: string;
  let lib: string;
  let rss: number;
  let memory: MemoryMonitor;
  let pipeline: IndexPipeline;
  let events: InvalidateEvent[];

  const rescanned = () =>
    events.filter((e) => e.kind === "rescanned").map((e) => e.path);

  beforeEach(async () => {
    tmp = await mkTmp("pipeline");
    lib = path.join(tmp, "lib");
    await fsp.mkdir(lib, { recursive: true });
    rss = 0;
    const config = testConfig(lib, path.join(tmp, "state", "index.db"));
    memory = new MemoryMonitor({
      thresholds: config.memory,
      sampleIntervalMs: config.sampleIntervalMs,
      sampler: () => ({ rssBytes: rss, heapUsedBytes: 0 }),
    });
    pipeline = new IndexPipeline({ config, watch: false, memory });
    events = [];
    pipeline.onInvalidate((e) => events.push(e));
    await pipeline.start();
  });

  afterEach(async () => {
    await pipeline.stop();
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  test("an archive without a descriptor is indexed with empty metadata", async () => {
    const file = path.join(lib, "A.cbz");
    await writeZip(file, { "readme.txt": "no pages here" });
    pipeline.observe({ kind: "create", path: file });
    await pipeline.drain({ flushEvents: true });

    const rec = pipeline.get(file);
    expect(rec?.scanState).toBe("clean");
    expect(rec?.metadata).toEqual({});
    expect(rec?.failureCount).toBe(0);
    expect(rescanned()).toEqual([file]);
  });

  test("a descriptor is extracted and searchable", async () => {
    const file = path.join(lib, "Saga", "Saga 012.cbz");
    await writeZip(file, {
      "ComicInfo.xml": comicInfo({
        Series: "Saga",
        Number: "12.0",
        Publisher: "Image",
        Writer: "Brian K. Vaughan",
      }),
      "001.jpg": PAGE,
      "002.jpg": PAGE,
    });
    pipeline.observe({ kind: "create", path: file });
    await pipeline.drain({ flushEvents: true });

    expect(pipeline.get(file)?.metadata).toEqual({
      series: { type: "string", value: "Saga" },
      number: { type: "string", value: "12" },
      publisher: { type: "string", value: "Image" },
      writer: { type: "list", value: ["Brian K. Vaughan"] },
      pageCount: { type: "int", value: 2 },
    });
    expect(Array.from(pipeline.query({ series: "saga" }), (r) => r.path)).toEqual([
      file,
    ]);
  });

  test("a burst of writes is scanned once", async () => {
    const file = path.join(lib, "burst.cbz");
    await writeZip(file, { "p1.jpg": PAGE });
    for (let i = 0; i < 5; i++) {
      pipeline.observe({ kind: "modify", path: file });
    }
    expect(pipeline.summary().pendingEvents).toBe(1);
    await pipeline.drain({ flushEvents: true });
    expect(rescanned()).toEqual([file]);
  });

  test("a deleted archive leaves the index", async () => {
    const file = path.join(lib, "gone.cbz");
    await writeZip(file, { "p1.jpg": PAGE });
    pipeline.observe({ kind: "create", path: file });
    await pipeline.drain({ flushEvents: true });
    expect(pipeline.get(file)?.scanState).toBe("clean");

    await fsp.rm(file);
    pipeline.observe({ kind: "delete", path: file });
    await pipeline.drain();
    expect(pipeline.get(file)).toBeNull();
    expect(events.at(-1)).toEqual({ kind: "removed", path: file });
  });

  test("a rename keeps metadata without rescanning", async () => {
    const from = path.join(lib, "old name.cbz");
    const to = path.join(lib, "sorted", "new name.cbz");
    await writeZip(from, {
      "ComicInfo.xml": comicInfo({ Title: "Moved" }),
      "p1.jpg": PAGE,
    });
    pipeline.observe({ kind: "create", path: from });
    await pipeline.drain({ flushEvents: true });
    const before = pipeline.get(from);

    await fsp.mkdir(path.dirname(to), { recursive: true });
    await fsp.rename(from, to);
    pipeline.observe({ kind: "move", from, path: to });
    await pipeline.drain();

    expect(pipeline.get(from)).toBeNull();
    const after = pipeline.get(to);
    expect(after?.metadata).toEqual(before?.metadata);
    expect(after?.lastScannedAt).toBe(before?.lastScannedAt);
    expect(events.at(-1)).toEqual({ kind: "moved", from, path: to });
    expect(rescanned()).toEqual([from]);
  });

  test("a rename of a rewritten file is rescanned at its new name", async () => {
    const from = path.join(lib, "a.cbz");
    const to = path.join(lib, "b.cbz");
    await writeZip(from, { "p1.jpg": PAGE });
    pipeline.observe({ kind: "create", path: from });
    await pipeline.drain({ flushEvents: true });

    await fsp.rename(from, to);
    await writeZip(to, { "p1.jpg": PAGE, "p2.jpg": PAGE });
    pipeline.observe({ kind: "move", from, path: to });
    await pipeline.drain();

    expect(rescanned()).toEqual([from, to]);
    expect(pipeline.get(to)?.metadata).toEqual({
      pageCount: { type: "int", value: 2 },
    });
  });

  test("a removed directory drops every record under it", async () => {
    const dir = path.join(lib, "Series");
    const files = [path.join(dir, "1.cbz"), path.join(dir, "2.cbz")];
    const keep = path.join(lib, "Series 2.cbz");
    for (const f of [...files, keep]) {
      await writeZip(f, { "p1.jpg": PAGE });
      pipeline.observe({ kind: "create", path: f });
    }
    await pipeline.drain({ flushEvents: true });

    await fsp.rm(dir, { recursive: true });
    pipeline.observe({ kind: "deleteDir", path: dir });
    await pipeline.drain();
    expect(pipeline.get(files[0])).toBeNull();
    expect(pipeline.get(files[1])).toBeNull();
    expect(pipeline.get(keep)?.scanState).toBe("clean");
  });

  test("repeated manual rescans of a busy path collapse into one follow-up", async () => {
    const file = path.join(lib, "manual.cbz");
    await writeZip(file, { "p1.jpg": PAGE });
    expect(pipeline.requestRescan(file)).toBe(true);
    expect(pipeline.requestRescan(file)).toBe(true);
    expect(pipeline.requestRescan(file)).toBe(true);
    await pipeline.drain();
    expect(rescanned()).toEqual([file, file]);
    expect(pipeline.status(file)?.scanState).toBe("clean");
  });

  test("rescans are idempotent and sweeps skip unchanged files", async () => {
    const file = path.join(lib, "same.cbz");
    await writeZip(file, {
      "ComicInfo.xml": comicInfo({ Series: "Same" }),
      "p1.jpg": PAGE,
    });
    pipeline.requestRescan(file);
    await pipeline.drain();
    const first = pipeline.get(file);
    pipeline.requestRescan(file);
    await pipeline.drain();
    const second = pipeline.get(file);
    expect(second?.metadata).toEqual(first?.metadata);
    expect(second?.contentFingerprint).toBe(first?.contentFingerprint);
    expect(rescanned()).toHaveLength(2);

    await pipeline.fullSweep();
    await pipeline.drain();
    const third = pipeline.get(file);
    expect(third?.scanState).toBe("clean");
    expect(third?.lastScannedAt).toBe(second?.lastScannedAt);
    expect(rescanned()).toHaveLength(2);
  });

  test("rescans outside the indexed set are refused", () => {
    expect(pipeline.requestRescan(path.join(lib, "notes.txt"))).toBe(false);
    expect(pipeline.requestRescan(path.join(tmp, "elsewhere.cbz"))).toBe(false);
    expect(pipeline.requestRescan(path.join(lib, ".trash", "a.cbz"))).toBe(false);
  });

  test("critical memory holds background scans but not manual ones", async () => {
    const background = path.join(lib, "background.cbz");
    const asked = path.join(lib, "asked.cbz");
    await writeZip(background, { "p1.jpg": PAGE });
    await writeZip(asked, { "p1.jpg": PAGE });

    rss = 4096 * MiB;
    memory.sampleNow();
    expect(pipeline.summary().memoryTier).toBe("critical");

    pipeline.observe({ kind: "create", path: background });
    pipeline.requestRescan(asked);
    await waitFor(() => pipeline.summary().deferred > 0);
    await waitFor(() => pipeline.status(asked)?.scanState === "clean");
    expect(pipeline.status(background)?.scanState).toBe("queued");
    expect(rescanned()).toEqual([asked]);

    rss = 0;
    memory.sampleNow();
    await pipeline.drain();
    expect(pipeline.status(background)?.scanState).toBe("clean");
    expect(pipeline.health.snapshot().overall).toBe("ok");
  });

  test("a broken archive is recorded as failed and later sweeps skip it", async () => {
    const bad = path.join(lib, "bad.cbz");
    await fsp.writeFile(bad, "this is not an archive");
    for (let i = 0; i < 3; i++) {
      pipeline.requestRescan(bad);
      await pipeline.drain();
    }
    expect(pipeline.status(bad)).toEqual({
      path: bad,
      scanState: "failed",
      lastError: "not a zip or rar archive",
      lastScannedAt: null,
      failureCount: 3,
    });

    const opId = await pipeline.fullSweep();
    await pipeline.drain();
    expect(pipeline.status(bad)?.failureCount).toBe(3);
    expect(pipeline.operations.get(opId)?.status).toBe("completed");
  });

  test("a full sweep indexes new files and forgets missing ones", async () => {
    const a = path.join(lib, "a.cbz");
    const b = path.join(lib, "nested", "b.cbr");
    const stale = path.join(lib, "stale.cbz");
    await writeZip(a, { "p1.jpg": PAGE });
    await writeZip(stale, { "p1.jpg": PAGE });
    await fsp.mkdir(path.dirname(b), { recursive: true });
    await fsp.writeFile(b, Buffer.concat([Buffer.from("Rar!\x1a\x07\x00", "latin1"), Buffer.alloc(16)]));
    await fsp.writeFile(path.join(lib, "notes.txt"), "skip me");
    await writeZip(path.join(lib, ".hidden", "c.cbz"), { "p1.jpg": PAGE });

    pipeline.requestRescan(stale);
    await pipeline.drain();
    await fsp.rm(stale);

    const opId = await pipeline.fullSweep();
    await pipeline.drain();

    expect(pipeline.get(stale)).toBeNull();
    expect(pipeline.status(a)?.scanState).toBe("clean");
    expect(pipeline.get(b)?.metadata).toEqual({});
    const op = pipeline.operations.get(opId);
    expect(op?.type).toBe("sweep");
    expect(op?.status).toBe("completed");
    expect(op?.total).toBe(3);
    expect(op?.current).toBe(3);

    const summary = pipeline.summary();
    expect(summary.counts.clean).toBe(2);
    expect(summary.total).toBe(2);
    expect(summary.queueDepth).toBe(0);
  });

  test("a sweep of an unreachable root keeps its records", async () => {
    const a = path.join(lib, "a.cbz");
    const b = path.join(lib, "b.cbz");
    await writeZip(a, { "p1.jpg": PAGE });
    await writeZip(b, { "p1.jpg": PAGE });
    pipeline.requestRescan(a);
    pipeline.requestRescan(b);
    await pipeline.drain();

    await fsp.rename(lib, `${lib}.offline`);
    await expect(pipeline.fullSweep()).rejects.toThrow(
      "root is not reachable",
    );
    await pipeline.drain();

    expect(pipeline.get(a)?.scanState).toBe("clean");
    expect(pipeline.get(b)?.scanState).toBe("clean");
    expect(pipeline.summary().total).toBe(2);
    const sweep = pipeline.operations.list().find((o) => o.type === "sweep");
    expect(sweep?.status).toBe("error");
  });

  test("a sweep outside the roots is refused", async () => {
    await expect(pipeline.fullSweep(tmp)).rejects.toThrow(
      `${tmp} is not inside a library root`,
    );
  });
});

describe("pipeline lifecycle", () => {
  let tmp: string;
  let lib: string;
  let dbPath: string;
  let pipeline: IndexPipeline | null = null;

  beforeEach(async () => {
    tmp = await mkTmp("lifecycle");
    lib = path.join(tmp, "lib");
    dbPath = path.join(tmp, "state", "index.db");
    await fsp.mkdir(lib, { recursive: true });
  });

  afterEach(async () => {
    await pipeline?.stop();
    pipeline = null;
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  async function open(
    config: Partial<IndexerConfig>,
    opts: Omit<PipelineOptions, "config"> = {},
  ): Promise<IndexPipeline> {
    const p = new IndexPipeline({
      config: testConfig(lib, dbPath, config),
      ...opts,
    });
    pipeline = p;
    await p.start();
    return p;
  }

  test("a move while a sweep is running still completes the sweep", async () => {
    const held = path.join(lib, "a-held.cbz");
    const from = path.join(lib, "m.cbz");
    const to = path.join(lib, "z.cbz");
    await writeZip(held, { "p1.jpg": PAGE });
    await writeZip(from, { "p1.jpg": PAGE });

    let hold = false;
    let holding = false;
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const p = await open(
      { concurrency: 1 },
      {
        watch: false,
        readArchive: async (file, o) => {
          if (hold && file === held) {
            holding = true;
            await gate;
          }
          return readArchive(file, o);
        },
      },
    );
    p.requestRescan(held);
    p.requestRescan(from);
    await p.drain();

    // changed on disk, so the sweep has to read it again
    await writeZip(held, { "p1.jpg": PAGE, "p2.jpg": PAGE });
    hold = true;
    const opId = await p.fullSweep();
    await waitFor(() => holding);

    await fsp.rename(from, to);
    p.observe({ kind: "move", from, path: to });
    release();
    await p.drain();

    const op = p.operations.get(opId);
    expect(op?.status).toBe("completed");
    expect(op?.total).toBe(2);
    expect(p.get(from)).toBeNull();
    expect(p.get(to)?.scanState).toBe("clean");
    expect(p.get(held)?.metadata).toEqual({
      pageCount: { type: "int", value: 2 },
    });
  });

  test("stop lets an in-flight scan commit", async () => {
    const file = path.join(lib, "busy.cbz");
    await writeZip(file, { "p1.jpg": PAGE });
    let started = false;
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const p = await open(
      {},
      {
        watch: false,
        readArchive: async (f, o) => {
          started = true;
          await gate;
          return readArchive(f, o);
        },
      },
    );
    p.requestRescan(file);
    await waitFor(() => started);

    const stopping = p.stop();
    release();
    await stopping;

    const store = IndexStore.open(dbPath);
    try {
      expect(store.status(file)).toMatchObject({
        scanState: "clean",
        lastError: null,
        failureCount: 0,
      });
    } finally {
      store.close();
    }
  });

  test("a watched root that disappears is swept again once it is back", async () => {
    const a = path.join(lib, "a.cbz");
    await writeZip(a, { "p1.jpg": PAGE });
    const p = await open({ watchRetryMinMs: 20, watchRetryMaxMs: 40 });
    await p.fullSweep();
    await p.drain();
    expect(p.status(a)?.scanState).toBe("clean");

    await fsp.rm(lib, { recursive: true });
    await waitFor(() => p.health.snapshot().watch.level === "fatal");

    const staging = path.join(tmp, "staging");
    await writeZip(path.join(staging, "a.cbz"), { "p1.jpg": PAGE });
    await writeZip(path.join(staging, "b.cbz"), { "p1.jpg": PAGE });
    await fsp.rename(staging, lib);

    const b = path.join(lib, "b.cbz");
    await waitFor(() => p.health.snapshot().watch.level === "ok");
    await waitFor(() => p.status(b)?.scanState === "clean");
    await p.drain();
    expect(p.status(a)?.scanState).toBe("clean");
    const sweeps = p.operations.list().filter((o) => o.type === "sweep");
    expect(sweeps).toHaveLength(2);
    expect(sweeps.every((o) => o.status === "completed")).toBe(true);
  });
});
