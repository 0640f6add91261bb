import assert from "node:assert";
import { describe, it } from "node:test";
import {
  allowedTransitions,
  assertTransition,
  canTransition,
  isLive,
  isSettled,
  isTerminal,
  isValidPath,
} from "../../src/core/order-state-machine";
import { InvalidTransitionError } from "../../src/errors/app.errors";

describe("Order state machine", () => {
  it("should allow the happy path to CONFIRMED", () => {
    assert.strictEqual(isValidPath(["PENDING", "SUBMITTED", "FILLED", "CONFIRMED"]), true);
  });

  it("should allow a partial fill to be accepted or topped up", () => {
    assert.strictEqual(isValidPath(["PENDING", "SUBMITTED", "PARTIALLY_FILLED", "CONFIRMED"]), true);
    assert.strictEqual(isValidPath(["PENDING", "SUBMITTED", "PARTIALLY_FILLED", "FILLED", "CONFIRMED"]), true);
  });

  it("should route failures through FAILED to DEAD_LETTER", () => {
    assert.strictEqual(isValidPath(["PENDING", "FAILED", "DEAD_LETTER"]), true);
  });

  it("should reject paths that skip submission", () => {
    assert.strictEqual(canTransition("PENDING", "FILLED"), false);
    assert.strictEqual(isValidPath(["PENDING", "FILLED"]), false);
  });

  it("should reject paths that do not start PENDING", () => {
    assert.strictEqual(isValidPath(["SUBMITTED", "FILLED"]), false);
    assert.strictEqual(isValidPath([]), false);
  });

  it("should not leave terminal states", () => {
    for (const state of ["CONFIRMED", "CANCELLED", "DEAD_LETTER"] as const) {
      assert.strictEqual(isTerminal(state), true);
      assert.deepStrictEqual(allowedTransitions(state), []);
    }
  });

  it("should treat FAILED as settled but not terminal", () => {
    assert.strictEqual(isTerminal("FAILED"), false);
    assert.strictEqual(isSettled("FAILED"), true);
    assert.strictEqual(isSettled("FILLED"), false);
  });

  it("should only accept fills while SUBMITTED or PARTIALLY_FILLED", () => {
    assert.strictEqual(isLive("SUBMITTED"), true);
    assert.strictEqual(isLive("PARTIALLY_FILLED"), true);
    assert.strictEqual(isLive("PENDING"), false);
    assert.strictEqual(isLive("FILLED"), false);
  });

  it("should throw with the order and both states on an invalid move", () => {
    assert.throws(
      () => assertTransition("ord-1", "FILLED", "CANCELLED"),
      (err: unknown) =>
        err instanceof InvalidTransitionError &&
        err.message === "Invalid transition FILLED -> CANCELLED for order ord-1",
    );
  });
});
