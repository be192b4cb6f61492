import { describe, it, expect } from "vitest";
import { abortable, mapConcurrent, throwIfAborted, timeout } from "../async.js";
import { QueryCancelledError } from "../../core/errors.js";

describe("timeout", () => {
  it("resolves when the promise settles in time", async () => {
    await expect(timeout(Promise.resolve(42), 1000)).resolves.toBe(42);
  });

  it("rejects with the built error when time runs out", async () => {
    const never = new Promise<number>(() => undefined);
    await expect(timeout(never, 5, () => new Error("too slow"))).rejects.toThrow("too slow");
  });
});

describe("abortable", () => {
  it("passes the result through without a signal", async () => {
    await expect(abortable(Promise.resolve("done"))).resolves.toBe("done");
  });

  it("rejects at once for an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(abortable(Promise.resolve("done"), controller.signal)).rejects.toBeInstanceOf(QueryCancelledError);
  });

  it("stops waiting when the signal fires", async () => {
    const controller = new AbortController();
    const pending = abortable(new Promise<string>(() => undefined), controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(QueryCancelledError);
  });
});

describe("throwIfAborted", () => {
  it("throws only after abort", () => {
    const controller = new AbortController();
    expect(() => throwIfAborted(controller.signal)).not.toThrow();
    controller.abort();
    expect(() => throwIfAborted(controller.signal)).toThrow(QueryCancelledError);
  });
});

describe("mapConcurrent", () => {
  it("keeps input order", async () => {
    const results = await mapConcurrent(
      [30, 10, 20],
      async (ms, index) => {
        await new Promise((resolve) => setTimeout(resolve, ms));
        return `${index}:${ms}`;
      },
      3
    );

    expect(results).toEqual(["0:30", "1:10", "2:20"]);
  });

  it("never exceeds the concurrency limit", async () => {
    let active = 0;
    let peak = 0;

    await mapConcurrent(
      [1, 2, 3, 4, 5, 6],
      async () => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active--;
      },
      2
    );

    expect(peak).toBe(2);
  });

  it("handles an empty list", async () => {
    await expect(mapConcurrent([], async () => 1, 4)).resolves.toEqual([]);
  });
});
