import assert from "node:assert";
import { describe, it } from "node:test";
import { KeyedMutex } from "../../src/utils/keyed-mutex.util";

const tick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe("KeyedMutex", () => {
  it("should run work on the same key one at a time", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const first = mutex.runExclusive("pos-1", async () => {
      events.push("first:start");
      await tick();
      events.push("first:end");
    });
    const second = mutex.runExclusive("pos-1", () => {
      events.push("second");
    });

    await Promise.all([first, second]);
    assert.deepStrictEqual(events, ["first:start", "first:end", "second"]);
  });

  it("should not block different keys", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const slow = mutex.runExclusive("a", async () => {
      await tick();
      await tick();
      events.push("a");
    });
    const fast = mutex.runExclusive("b", () => {
      events.push("b");
    });

    await Promise.all([slow, fast]);
    assert.deepStrictEqual(events, ["b", "a"]);
  });

  it("should release the key when work throws", async () => {
    const mutex = new KeyedMutex();
    await assert.rejects(
      mutex.runExclusive("k", () => {
        throw new Error("boom");
      }),
      /boom/,
    );
    assert.strictEqual(mutex.isLocked("k"), false);
    assert.strictEqual(await mutex.runExclusive("k", () => 42), 42);
    assert.strictEqual(mutex.size, 0);
  });
});
