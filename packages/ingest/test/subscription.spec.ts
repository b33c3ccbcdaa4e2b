import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { NetworkError } from "@tradewire/core";
import { keepSubscribed, type ReconnectOptions } from "../src/index.js";
import { FakeFeed } from "./fakes.js";

const RECONNECT: ReconnectOptions = { maxRetries: 2, baseMs: 100, maxMs: 1_000, jitter: false };

describe("keepSubscribed", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });
  afterEach(() => {
    vi.useRealTimers();
  });

  it("backs off exponentially and fails once retries are exhausted", async () => {
    const feed = new FakeFeed<number>();
    const delays: Array<[number, number]> = [];
    const errors: NetworkError[] = [];
    const handle = keepSubscribed("test", feed.open, () => {}, RECONNECT, {
      onReconnect: (attempt, delay) => delays.push([attempt, delay]),
      onError: (e) => errors.push(e),
    });
    await vi.advanceTimersByTimeAsync(0);
    expect(feed.opens).toBe(1);

    feed.drop(new Error("boom"));
    await vi.advanceTimersByTimeAsync(99);
    expect(feed.opens).toBe(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(feed.opens).toBe(2);

    feed.drop(new Error("boom"));
    await vi.advanceTimersByTimeAsync(200);
    expect(feed.opens).toBe(3);

    feed.drop(new Error("boom"));
    const outcome = await handle.done;
    expect(delays).toEqual([
      [1, 100],
      [2, 200],
    ]);
    expect(outcome.status).toBe("failed");
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(NetworkError);
    expect(errors[0].message).toBe("test stream lost after 2 reconnect attempts: boom");
  });

  it("resets the attempt count after a message arrives", async () => {
    const feed = new FakeFeed<number>();
    const seen: number[] = [];
    const delays: number[] = [];
    keepSubscribed("test", feed.open, (m) => seen.push(m), RECONNECT, {
      onReconnect: (attempt) => delays.push(attempt),
    });
    await vi.advanceTimersByTimeAsync(0);
    feed.drop(new Error("reset by peer"));
    await vi.advanceTimersByTimeAsync(100);
    feed.emit(7);
    feed.drop();
    expect(seen).toEqual([7]);
    expect(delays).toEqual([1, 1]);
  });

  it("closes the stream and stops delivering on close()", async () => {
    const feed = new FakeFeed<number>();
    const seen: number[] = [];
    const handle = keepSubscribed("test", feed.open, (m) => seen.push(m), RECONNECT);
    await vi.advanceTimersByTimeAsync(0);
    feed.emit(1);
    handle.close();
    handle.close();
    feed.emit(2);
    feed.drop(new Error("cancelled"));
    await vi.advanceTimersByTimeAsync(1_000);

    expect(await handle.done).toEqual({ status: "closed" });
    expect(seen).toEqual([1]);
    expect(feed.closes).toBe(1);
    expect(feed.opens).toBe(1);
  });

  it("retries when opening the stream itself fails", async () => {
    let calls = 0;
    const feed = new FakeFeed<number>();
    const handle = keepSubscribed(
      "test",
      async (handlers) => {
        calls++;
        if (calls === 1) throw new Error("connection refused");
        return feed.open(handlers);
      },
      () => {},
      RECONNECT,
    );
    await vi.advanceTimersByTimeAsync(100);
    expect(calls).toBe(2);
    expect(feed.opens).toBe(1);
    handle.close();
    expect(await handle.done).toEqual({ status: "closed" });
  });
});
