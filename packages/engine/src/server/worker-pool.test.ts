import { describe, expect, it, vi } from "vitest";
import { WorkerPool } from "./worker-pool.js";

function gate(): { promise: Promise<void>; open: () => void } {
  let open = () => {};
  const promise = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { promise, open };
}

describe("WorkerPool", () => {
  it.each([
    [{ size: 0, maxQueue: 1 }],
    [{ size: 1.5, maxQueue: 1 }],
    [{ size: 1, maxQueue: -1 }],
  ])("rejects invalid options %j", (options) => {
    expect(() => new WorkerPool(options)).toThrow(RangeError);
  });

  it("runs at most `size` jobs and queues the rest", async () => {
    const pool = new WorkerPool({ size: 2, maxQueue: 2 });
    const gates = [gate(), gate(), gate(), gate()];
    const started: number[] = [];

    gates.forEach((g, i) => {
      const accepted = pool.submit(async () => {
        started.push(i);
        await g.promise;
      });
      expect(accepted).toBe(true);
    });

    expect(started).toEqual([0, 1]);
    expect(pool.active).toBe(2);
    expect(pool.pending).toBe(2);
    expect(pool.capacity).toBe(2);

    const overflow = vi.fn(async () => {});
    expect(pool.submit(overflow)).toBe(false);

    for (const g of gates) g.open();
    await pool.onIdle();

    expect(started).toEqual([0, 1, 2, 3]);
    expect(overflow).not.toHaveBeenCalled();
    expect(pool.active).toBe(0);
    expect(pool.pending).toBe(0);
  });

  it("takes queued jobs in FIFO order", async () => {
    const pool = new WorkerPool({ size: 1, maxQueue: 3 });
    const first = gate();
    const order: string[] = [];

    pool.submit(async () => {
      await first.promise;
      order.push("a");
    });
    for (const name of ["b", "c", "d"]) {
      pool.submit(async () => {
        order.push(name);
      });
    }

    first.open();
    await pool.onIdle();

    expect(order).toEqual(["a", "b", "c", "d"]);
  });

  it("refuses work immediately when the queue size is zero", () => {
    const pool = new WorkerPool({ size: 1, maxQueue: 0 });
    const busy = gate();

    expect(pool.submit(() => busy.promise)).toBe(true);
    expect(pool.submit(async () => {})).toBe(false);
    busy.open();
  });

  it("reports job errors and keeps working", async () => {
    const onError = vi.fn();
    const pool = new WorkerPool({ size: 1, maxQueue: 1, onError });
    const ran = vi.fn();
    const failure = new Error("job failed");

    pool.submit(async () => {
      throw failure;
    });
    pool.submit(async () => {
      ran();
    });
    await pool.onIdle();

    expect(onError).toHaveBeenCalledWith(failure);
    expect(ran).toHaveBeenCalledTimes(1);
    expect(pool.active).toBe(0);
  });

  it("clear() drops queued jobs that have not started", async () => {
    const pool = new WorkerPool({ size: 1, maxQueue: 2 });
    const busy = gate();
    const dropped = vi.fn(async () => {});

    pool.submit(() => busy.promise);
    pool.submit(dropped);
    pool.submit(dropped);

    expect(pool.clear()).toBe(2);
    expect(pool.pending).toBe(0);

    busy.open();
    await pool.onIdle();
    expect(dropped).not.toHaveBeenCalled();
  });

  it("onIdle() resolves at once when nothing is running", async () => {
    const pool = new WorkerPool({ size: 1, maxQueue: 0 });
    await expect(pool.onIdle()).resolves.toBeUndefined();
  });
});
