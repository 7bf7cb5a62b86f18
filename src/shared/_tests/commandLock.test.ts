import { describe, it, expect } from "vitest";
import { CommandLock, LockClosedError } from "../commandLock";
import { deferred, flush } from "../../test-utils/fakeMatrix";

describe("shared/CommandLock", () => {
  it("runs tasks one at a time in FIFO order", async () => {
    const lock = new CommandLock();
    const order: string[] = [];
    const gate = deferred<void>();
    const a = lock.run(async () => {
      order.push("a:start");
      await gate.promise;
      order.push("a:end");
      return "a";
    });
    const b = lock.run(async () => {
      order.push("b");
      return "b";
    });
    await flush();
    expect(order).toEqual(["a:start"]);
    expect(lock.depth).toBe(2);
    gate.resolve();
    expect(await Promise.all([a, b])).toEqual(["a", "b"]);
    expect(order).toEqual(["a:start", "a:end", "b"]);
  });

  it("a failing task rejects its own promise without blocking the queue", async () => {
    const lock = new CommandLock();
    const failing = lock.run(async () => {
      throw new Error("nope");
    });
    const next = lock.run(async () => 42);
    await expect(failing).rejects.toThrow("nope");
    expect(await next).toBe(42);
  });

  it("tryRun refuses while busy and runs when idle", async () => {
    const lock = new CommandLock();
    const gate = deferred<void>();
    const held = lock.run(() => gate.promise);
    expect(lock.tryRun(async () => 1)).toBeNull();
    gate.resolve();
    await held;
    await flush();
    expect(lock.busy).toBe(false);
    expect(await lock.tryRun(async () => 1)).toBe(1);
  });

  it("close waits for queued tasks then rejects new ones", async () => {
    const lock = new CommandLock();
    const gate = deferred<void>();
    let done = false;
    void lock.run(async () => {
      await gate.promise;
      done = true;
    });
    const closing = lock.close();
    expect(lock.isClosed).toBe(true);
    gate.resolve();
    await closing;
    expect(done).toBe(true);
    await expect(lock.run(async () => 1)).rejects.toBeInstanceOf(LockClosedError);
    expect(lock.tryRun(async () => 1)).toBeNull();
  });
});
