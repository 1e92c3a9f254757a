import { describe, expect, it } from "vitest";
import { KeyedMutex } from "../src/rag/keyed-mutex.js";
import { mapWithConcurrency } from "../src/rag/worker-pool.js";

const tick = (ms = 1) => new Promise((resolve) => setTimeout(resolve, ms));

describe("KeyedMutex", () => {
  it("runs work for one key in submission order", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const job = (name: string, ms: number) =>
      mutex.runExclusive("doc", async () => {
        events.push(`start ${name}`);
        await tick(ms);
        events.push(`end ${name}`);
      });

    await Promise.all([job("a", 10), job("b", 1)]);

    expect(events).toEqual(["start a", "end a", "start b", "end b"]);
    expect(mutex.isLocked("doc")).toBe(false);
  });

  it("runs different keys concurrently", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    await Promise.all([
      mutex.runExclusive("a", async () => {
        events.push("start a");
        await tick(10);
        events.push("end a");
      }),
      mutex.runExclusive("b", async () => {
        events.push("start b");
        await tick(1);
        events.push("end b");
      }),
    ]);

    expect(events).toEqual(["start a", "start b", "end b", "end a"]);
  });

  it("releases the key when the work throws", async () => {
    const mutex = new KeyedMutex();
    await expect(
      mutex.runExclusive("doc", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(await mutex.runExclusive("doc", async () => "next")).toBe("next");
  });
});

describe("mapWithConcurrency", () => {
  it("keeps input order and reports progress", async () => {
    const progress: number[] = [];
    const results = await mapWithConcurrency(
      [30, 10, 20],
      async (ms) => {
        await tick(ms);
        return ms * 2;
      },
      { concurrency: 3, onProgress: (done) => progress.push(done) },
    );

    expect(results).toEqual([
      { status: "done", value: 60 },
      { status: "done", value: 20 },
      { status: "done", value: 40 },
    ]);
    expect(progress).toEqual([1, 2, 3]);
  });

  it("stops taking items once aborted", async () => {
    const controller = new AbortController();
    const results = await mapWithConcurrency(
      ["a", "b", "c", "d"],
      async (item) => {
        if (item === "b") controller.abort();
        return item;
      },
      { concurrency: 1, signal: controller.signal },
    );

    expect(results).toEqual([
      { status: "done", value: "a" },
      { status: "done", value: "b" },
      { status: "not-started" },
      { status: "not-started" },
    ]);
  });

  it("rethrows the first failure after in-flight work settles", async () => {
    const finished: number[] = [];
    await expect(
      mapWithConcurrency(
        [1, 2, 3, 4],
        async (n) => {
          if (n === 1) throw new Error("first failed");
          await tick(5);
          finished.push(n);
          return n;
        },
        { concurrency: 2 },
      ),
    ).rejects.toThrow("first failed");

    expect(finished).toEqual([2]);
  });

  it("handles an empty list", async () => {
    expect(await mapWithConcurrency([], async () => 1, { concurrency: 4 })).toEqual([]);
  });
});
