import fsp from "node:fs/promises";
import path from "node:path";
import type { WatchEvent } from "../change-detector";
import { FsWatchSource, retryDelay } from "../fs-watch";
import { HealthState } from "../health";
import { mkTmp, waitFor } from "./fixtures";

describe("retryDelay", () => {
  test("doubles from the minimum up to the cap", () => {
    expect(retryDelay(0, 1000, 60_000)).toBe(1000);
    expect(retryDelay(3, 1000, 60_000)).toBe(8000);
    expect(retryDelay(10, 1000, 60_000)).toBe(60_000);
  });
});

describe("FsWatchSource", () => {
  let tmp: string;
  let source: FsWatchSource | null = null;

  beforeEach(async () => {
    tmp = await mkTmp("watch");
  });

  afterEach(async () => {
    await source?.stop();
    source = null;
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  test("reports new files but not the ones present at start", async () => {
    const root = path.join(tmp, "lib");
    await fsp.mkdir(root);
    await fsp.writeFile(path.join(root, "existing.cbz"), "x");
    const events: WatchEvent[] = [];
    source = new FsWatchSource({
      roots: [root],
      moveWindowMs: 20,
      retryMinMs: 20,
      retryMaxMs: 100,
      onEvent: (e) => events.push(e),
    });
    await source.start();
    const file = path.join(root, "new.cbz");
    await fsp.writeFile(file, "y");
    await waitFor(() => events.some((e) => e.path === file));
    expect(events.find((e) => e.path === file)?.kind).toBe("create");
    expect(events.some((e) => e.path.endsWith("existing.cbz"))).toBe(false);
  });

  test("a missing root is retried until it appears", async () => {
    const root = path.join(tmp, "later");
    const health = new HealthState();
    const recovered: string[] = [];
    source = new FsWatchSource({
      roots: [root],
      moveWindowMs: 20,
      retryMinMs: 20,
      retryMaxMs: 40,
      onEvent: () => {},
      onRecovered: (r) => recovered.push(r),
      health,
    });
    await source.start();
    expect(source.failedRoots()).toEqual([root]);
    expect(health.get("watch")).toMatchObject({
      level: "fatal",
      message: `not watching: ${root}`,
    });

    await fsp.mkdir(root);
    await waitFor(() => recovered.length > 0);
    expect(recovered).toEqual([root]);
    expect(source.failedRoots()).toEqual([]);
    expect(health.get("watch").level).toBe("ok");
  });

  test("a root removed while watched is lost, then watched again", async () => {
    const root = path.join(tmp, "lib");
    await fsp.mkdir(root);
    await fsp.writeFile(path.join(root, "a.cbz"), "x");
    const health = new HealthState();
    const recovered: string[] = [];
    source = new FsWatchSource({
      roots: [root],
      moveWindowMs: 20,
      retryMinMs: 20,
      retryMaxMs: 40,
      onEvent: () => {},
      onRecovered: (r) => recovered.push(r),
      health,
    });
    await source.start();
    expect(source.failedRoots()).toEqual([]);

    await fsp.rm(root, { recursive: true });
    await waitFor(() => health.get("watch").level === "fatal");
    expect(health.get("watch").message).toBe(`not watching: ${root}`);
    expect(recovered).toEqual([]);

    await fsp.mkdir(root);
    await waitFor(() => recovered.length > 0);
    expect(recovered).toEqual([root]);
    expect(source.failedRoots()).toEqual([]);
    expect(health.get("watch").level).toBe("ok");
  });
});
