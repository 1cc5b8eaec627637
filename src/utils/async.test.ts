/**
 * Tests for async utilities
 */

import { describe, it, expect } from "vitest";
import { setTimeout as sleep } from "node:timers/promises";
import { createChannel, parallel } from "./async.js";

describe("parallel", () => {
  it("should keep result order regardless of completion order", async () => {
    const results = await parallel(
      [30, 10, 20],
      async (ms) => {
        await sleep(ms);
        return ms * 2;
      },
      3,
    );

    expect(results).toEqual([60, 20, 40]);
  });

  it("should never exceed the concurrency limit", async () => {
    let active = 0;
    let peak = 0;

    await parallel(
      [1, 2, 3, 4, 5, 6],
      async () => {
        active++;
        peak = Math.max(peak, active);
        await sleep(5);
        active--;
      },
      2,
    );

    expect(peak).toBe(2);
  });

  it("should skip items not yet started once the signal aborts", async () => {
    const controller = new AbortController();
    const started: number[] = [];

    const results = await parallel(
      [0, 1, 2, 3],
      async (item) => {
        started.push(item);
        if (item === 0) controller.abort();
        return item;
      },
      1,
      controller.signal,
    );

    expect(started).toEqual([0]);
    expect(results).toEqual([0, undefined, undefined, undefined]);
  });
});

describe("createChannel", () => {
  it("should deliver values in send order and end after close", async () => {
    const channel = createChannel<number>(2);
    const producer = (async () => {
      for (const n of [1, 2, 3, 4]) await channel.send(n);
      channel.close();
    })();

    const received: number[] = [];
    for await (const n of channel) received.push(n);
    await producer;

    expect(received).toEqual([1, 2, 3, 4]);
  });

  it("should block senders while the buffer is full", async () => {
    const channel = createChannel<string>(1);
    await channel.send("a");

    let delivered = false;
    const blocked = channel.send("b").then((ok) => {
      delivered = ok;
    });
    await sleep(5);
    expect(delivered).toBe(false);

    const iterator = channel[Symbol.asyncIterator]();
    await expect(iterator.next()).resolves.toEqual({ value: "a", done: false });
    await blocked;
    expect(delivered).toBe(true);
    await expect(iterator.next()).resolves.toEqual({ value: "b", done: false });
  });

  it("should hand values straight to a waiting receiver", async () => {
    const channel = createChannel<number>(1);
    const iterator = channel[Symbol.asyncIterator]();
    const next = iterator.next();

    await expect(channel.send(9)).resolves.toBe(true);
    await expect(next).resolves.toEqual({ value: 9, done: false });
  });

  it("should refuse sends after close and still drain buffered values", async () => {
    const channel = createChannel<number>(4);
    await channel.send(1);
    channel.close();

    expect(channel.closed).toBe(true);
    await expect(channel.send(2)).resolves.toBe(false);

    const iterator = channel[Symbol.asyncIterator]();
    await expect(iterator.next()).resolves.toEqual({ value: 1, done: false });
    await expect(iterator.next()).resolves.toEqual({ value: undefined, done: true });
  });

  it("should release blocked senders when the consumer stops early", async () => {
    const channel = createChannel<number>(1);
    await channel.send(1);
    const blocked = channel.send(2);

    const iterator = channel[Symbol.asyncIterator]();
    await iterator.return?.();

    await expect(blocked).resolves.toBe(false);
    expect(channel.closed).toBe(true);
  });
});
