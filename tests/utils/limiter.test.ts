import { describe, it } from "node:test";
import assert from "node:assert";
import { KeyedMutex, Semaphore } from "../../src/utils/limiter";

const tick = (ms = 5): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

describe("Semaphore", () => {
  it("should cap concurrent holders", async () => {
    const sem = new Semaphore(2);
    let active = 0;
    let peak = 0;
    await Promise.all(
      [1, 2, 3, 4, 5].map(() =>
        sem.with(async () => {
          active += 1;
          peak = Math.max(peak, active);
          await tick();
          active -= 1;
        }),
      ),
    );
    assert.strictEqual(peak, 2);
  });

  it("should release on failure", async () => {
    const sem = new Semaphore(1);
    await assert.rejects(
      sem.with(async () => {
        throw new Error("boom");
      }),
      /boom/,
    );
    const release = await sem.acquire();
    release();
  });

  it("should ignore a second release", async () => {
    const sem = new Semaphore(1);
    const release = await sem.acquire();
    release();
    release();

    let active = 0;
    let peak = 0;
    await Promise.all(
      [1, 2, 3].map(() =>
        sem.with(async () => {
          active += 1;
          peak = Math.max(peak, active);
          await tick();
          active -= 1;
        }),
      ),
    );
    assert.strictEqual(peak, 1);
  });
});

describe("KeyedMutex", () => {
  it("should serialise work on the same key", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    await Promise.all([
      mutex.with("m1", async () => {
        order.push("a:start");
        await tick();
        order.push("a:end");
      }),
      mutex.with("m1", async () => {
        order.push("b:start");
        order.push("b:end");
      }),
    ]);
    assert.deepStrictEqual(order, ["a:start", "a:end", "b:start", "b:end"]);
  });

  it("should let different keys run in parallel", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    await Promise.all([
      mutex.with("m1", async () => {
        order.push("m1:start");
        await tick();
        order.push("m1:end");
      }),
      mutex.with("m2", async () => {
        order.push("m2:start");
        order.push("m2:end");
      }),
    ]);
    assert.deepStrictEqual(order, ["m1:start", "m2:start", "m2:end", "m1:end"]);
  });
});
