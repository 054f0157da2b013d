import { makeJob, PRIORITY } from "../model";
import { mergeJobs, ScanQueue } from "../queue";

describe("ScanQueue", () => {
  test("dequeues by priority, then by arrival", async () => {
    const q = new ScanQueue();
    q.enqueue(makeJob("/lib/sweep.cbz", "sweep", { now: 1 }));
    q.enqueue(makeJob("/lib/a.cbz", "modify", { now: 2 }));
    q.enqueue(makeJob("/lib/gone.cbz", "delete", { now: 3 }));
    q.enqueue(makeJob("/lib/b.cbz", "create", { now: 4 }));
    q.enqueue(makeJob("/lib/asked.cbz", "manual", { now: 5 }));

    const order: string[] = [];
    while (q.size) {
      const job = await q.dequeue();
      if (job) order.push(job.path);
    }
    expect(order).toEqual([
      "/lib/gone.cbz",
      "/lib/asked.cbz",
      "/lib/a.cbz",
      "/lib/b.cbz",
      "/lib/sweep.cbz",
    ]);
  });

  test("holds at most one job per path and never downgrades", () => {
    const q = new ScanQueue();
    q.enqueue(makeJob("/lib/a.cbz", "manual", { now: 1 }));
    q.enqueue(makeJob("/lib/a.cbz", "sweep", { now: 2 }));
    q.enqueue(makeJob("/lib/a.cbz", "modify", { now: 3 }));
    expect(q.size).toBe(1);
    const job = q.get("/lib/a.cbz");
    expect(job?.reason).toBe("manual");
    expect(job?.priority).toBe(PRIORITY.manual);
  });

  test("a higher tier replaces the queued job", () => {
    const q = new ScanQueue();
    q.enqueue(makeJob("/lib/a.cbz", "modify", { now: 10 }));
    q.enqueue(makeJob("/lib/a.cbz", "delete", { now: 20 }));
    expect(q.size).toBe(1);
    expect(q.get("/lib/a.cbz")).toEqual({
      path: "/lib/a.cbz",
      reason: "delete",
      priority: PRIORITY.destructive,
      enqueuedAt: 10,
    });
  });

  test("a queued delete takes the reason of a file that came back", () => {
    const q = new ScanQueue();
    q.enqueue(makeJob("/lib/a.cbz", "delete", { now: 1 }));
    q.enqueue(makeJob("/lib/a.cbz", "create", { now: 2 }));
    const job = q.get("/lib/a.cbz");
    expect(job?.reason).toBe("create");
    expect(job?.priority).toBe(PRIORITY.destructive);
  });

  test("a manual rescan over a queued delete keeps the tier and forces a scan", () => {
    const q = new ScanQueue();
    q.enqueue(makeJob("/lib/a.cbz", "delete", { now: 1 }));
    q.enqueue(makeJob("/lib/a.cbz", "manual", { now: 2 }));
    expect(q.size).toBe(1);
    expect(q.get("/lib/a.cbz")).toEqual({
      path: "/lib/a.cbz",
      reason: "manual",
      priority: PRIORITY.destructive,
      enqueuedAt: 1,
    });
  });

  test("a sweep does not revive a queued delete", () => {
    const q = new ScanQueue();
    q.enqueue(makeJob("/lib/a.cbz", "delete", { now: 1 }));
    q.enqueue(makeJob("/lib/a.cbz", "sweep", { now: 2 }));
    expect(q.get("/lib/a.cbz")?.reason).toBe("delete");
  });

  test("same-tier replacement keeps the queue position", () => {
    const q = new ScanQueue();
    q.enqueue(makeJob("/lib/a.cbz", "modify", { now: 1 }));
    q.enqueue(makeJob("/lib/b.cbz", "modify", { now: 2 }));
    q.enqueue(makeJob("/lib/a.cbz", "create", { now: 3 }));
    expect(q.snapshot().map((j) => [j.path, j.reason])).toEqual([
      ["/lib/a.cbz", "create"],
      ["/lib/b.cbz", "modify"],
    ]);
  });

  test("dequeue waits for work and shutdown releases waiters", async () => {
    const q = new ScanQueue();
    const first = q.dequeue();
    q.enqueue(makeJob("/lib/a.cbz", "create"));
    expect((await first)?.path).toBe("/lib/a.cbz");

    const waiting = [q.dequeue(), q.dequeue()];
    q.shutdown();
    q.shutdown();
    expect(await Promise.all(waiting)).toEqual([null, null]);
    expect(await q.dequeue()).toBeNull();
    expect(q.enqueue(makeJob("/lib/b.cbz", "create"))).toBe(false);
  });

  test("removed paths are skipped", async () => {
    const q = new ScanQueue();
    q.enqueue(makeJob("/lib/a.cbz", "modify"));
    q.enqueue(makeJob("/lib/b.cbz", "modify"));
    expect(q.remove("/lib/a.cbz")).toBe(true);
    expect(q.has("/lib/a.cbz")).toBe(false);
    expect((await q.dequeue())?.path).toBe("/lib/b.cbz");
    expect(q.tryDequeue()).toBeNull();
  });
});

describe("mergeJobs", () => {
  test("a delete over a queued move keeps the move source", () => {
    const move = makeJob("/lib/b.cbz", "move", {
      fromPath: "/lib/a.cbz",
      now: 1,
    });
    const del = makeJob("/lib/b.cbz", "delete", { now: 2 });
    const { job, replaced } = mergeJobs(move, del);
    expect(replaced).toBe(true);
    expect(job.reason).toBe("delete");
    expect(job.fromPath).toBe("/lib/a.cbz");
    expect(job.enqueuedAt).toBe(1);
  });
});
