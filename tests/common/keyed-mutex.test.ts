import { describe, expect, it } from "vitest";
import { KeyedMutex } from "../../src/common/keyed-mutex.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedMutex", () => {
  it("runs work for one key in arrival order", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const first = mutex.run("task-1", async () => {
      await gate.promise;
      order.push("first");
    });
    const second = mutex.run("task-1", async () => {
      order.push("second");
    });
    await Promise.resolve();
    expect(order).toEqual([]);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(["first", "second"]);
  });

  it("does not hold other keys behind a busy one", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const busy = mutex.run("task-1", () => gate.promise);
    await expect(mutex.run("task-2", async () => "free")).resolves.toBe("free");
    gate.resolve();
    await busy;
  });

  it("releases the lock when the work throws", async () => {
    const mutex = new KeyedMutex();
    await expect(
      mutex.run("task-1", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    await expect(mutex.run("task-1", async () => 42)).resolves.toBe(42);
  });
});
