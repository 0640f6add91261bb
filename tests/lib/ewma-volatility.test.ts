import assert from "node:assert";
import { describe, it } from "node:test";
import { EwmaVolatility, populationVariance } from "../../src/lib/ewma-volatility";

describe("EwmaVolatility", () => {
  it("should read the default volatility before any update", () => {
    const ewma = new EwmaVolatility(0.94, 0.1);
    assert.strictEqual(ewma.getVolatility(), 0.1);
    assert.strictEqual(ewma.isInitialized(), false);
  });

  it("should seed a single return with 0.01 variance then decay", () => {
    const ewma = new EwmaVolatility(0.94, 0.1);
    ewma.update([0.2]);
    // 0.94 * 0.01 + 0.06 * 0.04
    assert.ok(Math.abs(ewma.getVariance() - 0.0118) < 1e-12);
    assert.ok(Math.abs(ewma.getVolatility() - Math.sqrt(0.0118)) < 1e-12);
  });

  it("should seed a batch with its population variance", () => {
    const ewma = new EwmaVolatility(0.5, 0.1);
    ewma.update([0.1, -0.1]);
    // seed 0.01; then 0.5 * 0.01 + 0.5 * 0.01 twice
    assert.ok(Math.abs(ewma.getVariance() - 0.01) < 1e-12);
  });

  it("should ignore non-finite returns", () => {
    const ewma = new EwmaVolatility();
    ewma.update([Number.NaN, Number.POSITIVE_INFINITY]);
    assert.strictEqual(ewma.isInitialized(), false);
  });
});

describe("populationVariance", () => {
  it("should divide by n", () => {
    assert.ok(Math.abs(populationVariance([1, 2, 3, 4]) - 1.25) < 1e-12);
  });
});
