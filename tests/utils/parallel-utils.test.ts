import { describe, it } from "node:test";
import assert from "node:assert";
import { parallelBatch, TTLCache } from "../../src/utils/parallel-utils";

describe("parallelBatch", () => {
  it("should keep results in input order", async () => {
    const { results, errors } = await parallelBatch(
      [30, 10, 20],
      async (ms) => {
        await new Promise((resolve) => setTimeout(resolve, ms));
        return ms * 2;
      },
      { concurrency: 3 },
    );
    assert.deepStrictEqual(results, [60, 20, 40]);
    assert.deepStrictEqual(errors, []);
  });

  it("should never exceed the concurrency limit", async () => {
    let active = 0;
    let peak = 0;
    await parallelBatch(
      [1, 2, 3, 4, 5, 6],
      async () => {
        active += 1;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active -= 1;
      },
      { concurrency: 2 },
    );
    assert.strictEqual(peak, 2);
  });

  it("should capture failures without aborting other items", async () => {
    const { results, errors } = await parallelBatch(
      ["a", "b", "c"],
      async (item) => {
        if (item === "b") throw new Error("bad item");
        return item.toUpperCase();
      },
      { concurrency: 1 },
    );
    assert.deepStrictEqual(results, ["A", "C"]);
    assert.strictEqual(errors.length, 1);
    assert.strictEqual(errors[0].index, 1);
    assert.strictEqual(errors[0].error.message, "bad item");
  });

  it("should wrap non-Error rejections", async () => {
    const { errors } = await parallelBatch([1], async () => {
      throw "plain";
    });
    assert.strictEqual(errors[0].error.message, "plain");
  });

  it("should handle an empty list", async () => {
    const { results, errors } = await parallelBatch([], async (x: number) => x);
    assert.deepStrictEqual(results, []);
    assert.deepStrictEqual(errors, []);
  });
});

describe("TTLCache", () => {
  it("should expire entries after their TTL", () => {
    let now = 0;
    const cache = new TTLCache<string, number>(100, () => now);
    cache.set("a", 1);
    cache.set("b", 2, 500);
    now = 100;
    assert.strictEqual(cache.get("a"), 1);
    now = 101;
    assert.strictEqual(cache.get("a"), undefined);
    assert.strictEqual(cache.get("b"), 2);
  });

  it("should drop expired keys on the next write", () => {
    let now = 0;
    const cache = new TTLCache<string, number>(100, () => now);
    cache.set("a", 1);
    cache.set("b", 2, 500);
    now = 200;
    assert.strictEqual(cache.prune(), 1);
    now = 600;
    cache.set("c", 3);
    assert.strictEqual(cache.prune(), 0);
    assert.strictEqual(cache.get("b"), undefined);
    assert.strictEqual(cache.get("c"), 3);
  });

  it("should share one fetch between concurrent callers", async () => {
    const cache = new TTLCache<string, string>(1000);
    let fetches = 0;
    const fetcher = async (): Promise<string> => {
      fetches += 1;
      await new Promise((resolve) => setTimeout(resolve, 5));
      return "book";
    };
    const [a, b] = await Promise.all([
      cache.getOrFetch("token", fetcher),
      cache.getOrFetch("token", fetcher),
    ]);
    assert.strictEqual(a, "book");
    assert.strictEqual(b, "book");
    assert.strictEqual(fetches, 1);
    assert.strictEqual(await cache.getOrFetch("token", fetcher), "book");
    assert.strictEqual(fetches, 1);
  });

  it("should not cache a failed fetch", async () => {
    const cache = new TTLCache<string, number>(1000);
    await assert.rejects(
      cache.getOrFetch("k", async () => {
        throw new Error("down");
      }),
      /down/,
    );
    assert.strictEqual(await cache.getOrFetch("k", async () => 7), 7);
  });
});
