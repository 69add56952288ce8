import { describe, it } from "node:test";
import assert from "node:assert";
import { sizeOrder } from "../../src/core/order-sizer";

describe("sizeOrder", () => {
  it("should round the minimum share count up to clear $1", () => {
    const sized = sizeOrder(0.23, 4);
    assert.strictEqual(sized.shares, 4.35);
    assert.ok(Math.abs(sized.value - 1.0005) < 1e-9);
    assert.ok(sized.value >= 1);
  });

  it("should keep a request that already clears the minimum", () => {
    assert.deepStrictEqual(sizeOrder(0.5, 5), { shares: 5, value: 2.5 });
  });

  it("should not bump an exact minimum by a tick", () => {
    assert.deepStrictEqual(sizeOrder(0.5, 2), { shares: 2, value: 1 });
  });

  it("should size an empty request to the minimum", () => {
    assert.deepStrictEqual(sizeOrder(0.5, 0), { shares: 2, value: 1 });
  });

  it("should honour a custom minimum notional", () => {
    assert.deepStrictEqual(sizeOrder(0.5, 1, 5), { shares: 10, value: 5 });
  });

  it("should return zero for unpriceable orders", () => {
    assert.deepStrictEqual(sizeOrder(0, 5), { shares: 0, value: 0 });
    assert.deepStrictEqual(sizeOrder(-0.2, 5), { shares: 0, value: 0 });
    assert.deepStrictEqual(sizeOrder(Number.NaN, 5), { shares: 0, value: 0 });
  });

  it("should always clear the minimum for every cent price", () => {
    for (let cents = 1; cents <= 99; cents += 1) {
      const price = cents / 100;
      for (const requested of [0, 1, 3.33, 4, 7.5]) {
        const sized = sizeOrder(price, requested);
        assert.ok(
          sized.value >= 1 - 1e-9,
          `price ${price} requested ${requested} sized to $${sized.value}`,
        );
        assert.ok(sized.shares >= requested);
      }
    }
  });
});
