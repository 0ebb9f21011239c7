import { describe, it, expect } from "vitest";

import { Semaphore } from "../semaphore.js";
import { TranslationCancelledError } from "../errors.js";

/** Let pending promise callbacks run */
function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe("Semaphore", () => {
  it("rejects permit counts that are not positive integers", () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
    expect(() => new Semaphore(-2)).toThrow(RangeError);
    expect(() => new Semaphore(1.5)).toThrow(RangeError);
  });

  it("admits up to its permit count and queues the rest", async () => {
    const gate = new Semaphore(2);
    const first = await gate.acquire();
    await gate.acquire();

    let granted = false;
    const third = gate.acquire().then((permit) => {
      granted = true;
      return permit;
    });

    await flush();
    expect(granted).toBe(false);

    first.release();
    await third;
    expect(granted).toBe(true);
  });

  it("admits waiters in arrival order", async () => {
    const gate = new Semaphore(1);
    const held = await gate.acquire();
    const order: number[] = [];

    const second = gate.acquire().then((permit) => {
      order.push(2);
      return permit;
    });
    const third = gate.acquire().then((permit) => {
      order.push(3);
      return permit;
    });

    held.release();
    const secondPermit = await second;
    await flush();
    expect(order).toEqual([2]);

    secondPermit.release();
    await third;
    expect(order).toEqual([2, 3]);
  });

  it("ignores a second release of the same permit", async () => {
    const gate = new Semaphore(1);
    const permit = await gate.acquire();
    permit.release();
    permit.release();

    await gate.acquire();
    let granted = false;
    void gate.acquire().then(() => {
      granted = true;
    });

    await flush();
    expect(granted).toBe(false);
  });

  it("drops a waiter whose signal aborts", async () => {
    const gate = new Semaphore(1);
    const held = await gate.acquire();
    const controller = new AbortController();

    const waiting = gate.acquire(controller.signal);
    controller.abort();
    await expect(waiting).rejects.toBeInstanceOf(TranslationCancelledError);

    held.release();
    // The aborted waiter must not have taken the released permit
    let granted = false;
    void gate.acquire().then(() => {
      granted = true;
    });
    await flush();
    expect(granted).toBe(true);
  });

  it("drops every waiter sharing a signal on one abort", async () => {
    const gate = new Semaphore(1);
    const held = await gate.acquire();
    const controller = new AbortController();
    const other = gate.acquire();

    const waiting = Array.from({ length: 20 }, () =>
      gate.acquire(controller.signal),
    );
    controller.abort();

    const results = await Promise.allSettled(waiting);
    expect(results.every((r) => r.status === "rejected")).toBe(true);

    // A waiter without the signal stays queued and gets the next permit
    held.release();
    await expect(other).resolves.toBeDefined();
  });

  it("rejects at once when the signal is already aborted", async () => {
    const gate = new Semaphore(1);
    const controller = new AbortController();
    controller.abort();

    await expect(gate.acquire(controller.signal)).rejects.toBeInstanceOf(
      TranslationCancelledError,
    );
    // No permit was consumed
    await expect(gate.use(async () => "free")).resolves.toBe("free");
  });

  it("releases the permit when the guarded call fails", async () => {
    const gate = new Semaphore(1);

    await expect(
      gate.use(async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    await expect(gate.use(async () => "ok")).resolves.toBe("ok");
  });
});
