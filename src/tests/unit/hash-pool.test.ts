// src/tests/unit/hash-pool.test.ts
import { describe, expect, it } from "vitest";
import { HashingError } from "../../libs/errors.js";
import { HashPool } from "../../libs/hash-pool.js";
import { deferred, flush } from "../helpers.js";

describe("HashPool", () => {
  it("rejects a non-positive size", () => {
    expect(() => new HashPool({ size: 0 })).toThrow(RangeError);
    expect(() => new HashPool({ size: 1.5 })).toThrow(RangeError);
  });

  it("runs at most `size` jobs at once and queues the rest", async () => {
    const pool = new HashPool({ size: 2 });
    const started: string[] = [];
    const gates = [deferred<string>(), deferred<string>(), deferred<string>()];

    const results = ["a", "b", "c"].map((name, i) =>
      pool.run(() => {
        started.push(name);
        return gates[i].promise;
      }),
    );

    await flush();
    expect(started).toEqual(["a", "b"]);
    expect(pool.stats()).toEqual({ size: 2, active: 2, queued: 1 });

    gates[0].resolve("A");
    await expect(results[0]).resolves.toBe("A");
    await flush();

    expect(started).toEqual(["a", "b", "c"]);
    expect(pool.stats()).toEqual({ size: 2, active: 2, queued: 0 });

    gates[1].resolve("B");
    gates[2].resolve("C");
    await expect(Promise.all(results)).resolves.toEqual(["A", "B", "C"]);
    await flush();
    expect(pool.stats()).toEqual({ size: 2, active: 0, queued: 0 });
  });

  it("starts queued jobs in FIFO order", async () => {
    const pool = new HashPool({ size: 1 });
    const order: number[] = [];

    await Promise.all(
      [1, 2, 3, 4].map((n) =>
        pool.run(async () => {
          order.push(n);
          return n;
        }),
      ),
    );

    expect(order).toEqual([1, 2, 3, 4]);
  });

  it("frees the slot when a job rejects or throws synchronously", async () => {
    const pool = new HashPool({ size: 1 });

    const [failing, throwing, next] = await Promise.allSettled([
      pool.run(async () => {
        throw new Error("async boom");
      }),
      pool.run((): Promise<number> => {
        throw new Error("sync boom");
      }),
      pool.run(async () => 42),
    ]);

    expect(failing).toMatchObject({ status: "rejected", reason: { message: "async boom" } });
    expect(throwing).toMatchObject({ status: "rejected", reason: { message: "sync boom" } });
    expect(next).toEqual({ status: "fulfilled", value: 42 });
    await flush();
    expect(pool.stats().active).toBe(0);
  });

  it("close() drops queued jobs, waits for running ones and refuses new work", async () => {
    const pool = new HashPool({ size: 1 });
    const gate = deferred<string>();

    const running = pool.run(() => gate.promise);
    const queued = pool.run(async () => "never");
    await flush();

    let closed = false;
    const closing = pool.close().then(() => {
      closed = true;
    });

    await expect(queued).rejects.toBeInstanceOf(HashingError);
    await flush();
    expect(closed).toBe(false);

    gate.resolve("done");
    await expect(running).resolves.toBe("done");
    await closing;
    expect(closed).toBe(true);

    await expect(pool.run(async () => 1)).rejects.toMatchObject({
      code: "HASHING_FAILED",
      message: "hash_pool_closed",
    });
  });

  it("close() resolves immediately when idle", async () => {
    const pool = new HashPool({ size: 3 });
    await expect(pool.close()).resolves.toBeUndefined();
  });
});
