import { describe, expect, it } from "vitest";
import { AsyncLock } from "../../runtime/src/async-lock.js";

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe("AsyncLock", () => {
  it("runs holders one at a time in arrival order", async () => {
    const lock = new AsyncLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.withLock(async () => {
      order.push("a:start");
      await gate.promise;
      order.push("a:end");
    });
    const second = lock.withLock(async () => {
      order.push("b");
    });
    const third = lock.withLock(async () => {
      order.push("c");
    });

    expect(lock.isLocked).toBe(true);
    expect(lock.pending).toBe(2);
    gate.resolve();
    await Promise.all([first, second, third]);

    expect(order).toEqual(["a:start", "a:end", "b", "c"]);
    expect(lock.isLocked).toBe(false);
  });

  it("releases the lock when the holder throws", async () => {
    const lock = new AsyncLock();

    await expect(
      lock.withLock(async () => {
        throw new Error("step failed");
      }),
    ).rejects.toThrow("step failed");

    expect(lock.isLocked).toBe(false);
    await expect(lock.withLock(async () => "next")).resolves.toBe("next");
  });
});
