import { describe, it } from "node:test";
import assert from "node:assert";
import { historyKey, PriceHistoryStore } from "../../src/core/price-history";

describe("PriceHistoryStore", () => {
  it("should key series by market and token", () => {
    assert.strictEqual(historyKey("0xabc", "123"), "0xabc:123");
  });

  it("should keep points oldest first and evict beyond capacity", () => {
    const store = new PriceHistoryStore({ capacity: 3 });
    [0.5, 0.51, 0.52, 0.53, 0.54].forEach((price, i) => store.observe("k", 1000 + i, price));
    assert.deepStrictEqual(store.points("k"), [
      { timestamp: 1002, price: 0.52 },
      { timestamp: 1003, price: 0.53 },
      { timestamp: 1004, price: 0.54 },
    ]);
    assert.strictEqual(store.size("k"), 3);
    assert.deepStrictEqual(store.latest("k"), { timestamp: 1004, price: 0.54 });
  });

  it("should ignore out-of-order and non-finite points", () => {
    const store = new PriceHistoryStore();
    assert.strictEqual(store.observe("k", 2000, 0.5), true);
    assert.strictEqual(store.observe("k", 1999, 0.4), false);
    assert.strictEqual(store.observe("k", 2001, Number.NaN), false);
    assert.strictEqual(store.observe("k", 2000, 0.45), true);
    assert.strictEqual(store.size("k"), 2);
  });

  it("should return an inclusive window", () => {
    const store = new PriceHistoryStore();
    store.observe("k", 1000, 0.6);
    store.observe("k", 2000, 0.5);
    store.observe("k", 3000, 0.45);
    assert.deepStrictEqual(
      store.window("k", 2000, 3000).map((p) => p.price),
      [0.5, 0.45],
    );
    assert.deepStrictEqual(store.window("missing", 0, 5000), []);
  });

  it("should reject a capacity below one", () => {
    assert.throws(() => new PriceHistoryStore({ capacity: 0 }), RangeError);
  });

  it("should default to 100 points", () => {
    assert.strictEqual(new PriceHistoryStore().capacity, 100);
  });
});
