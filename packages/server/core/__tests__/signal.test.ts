/* packages/server/core/__tests__/signal.test.ts */

import { describe, expect, it } from "vitest";
import { BoardError, ChangeSignal } from "../src/index.js";

describe("ChangeSignal", () => {
  it("starts at version 0 with no subscribers", () => {
    const signal = new ChangeSignal();
    expect(signal.version).toBe(0);
    expect(signal.subscriberCount).toBe(0);
  });

  it("resolves a fresh handle at once with the current version", async () => {
    const signal = new ChangeSignal();
    signal.notify();
    signal.notify();
    const handle = signal.subscribe();
    await expect(signal.waitNext(handle)).resolves.toBe(2);
  });

  it("wakes a pending waiter on notify", async () => {
    const signal = new ChangeSignal();
    const handle = signal.subscribe();
    await handle.waitNext();

    const pending = handle.waitNext();
    signal.notify();
    await expect(pending).resolves.toBe(1);
  });

  it("collapses notifies that land before the waiter resumes", async () => {
    const signal = new ChangeSignal();
    const handle = signal.subscribe();
    await handle.waitNext();

    const pending = handle.waitNext();
    signal.notify();
    signal.notify();
    signal.notify();
    await expect(pending).resolves.toBe(3);
  });

  it("returns at once when versions were missed while not waiting", async () => {
    const signal = new ChangeSignal();
    const handle = signal.subscribe();
    await handle.waitNext();
    signal.notify();
    signal.notify();
    await expect(handle.waitNext()).resolves.toBe(2);
  });

  it("wakes every subscriber on one notify", async () => {
    const signal = new ChangeSignal();
    const a = signal.subscribe();
    const b = signal.subscribe();
    await a.waitNext();
    await b.waitNext();

    const both = Promise.all([a.waitNext(), b.waitNext()]);
    signal.notify();
    await expect(both).resolves.toEqual([1, 1]);
  });

  it("rejects a second concurrent wait on the same handle", async () => {
    const signal = new ChangeSignal();
    const handle = signal.subscribe();
    await handle.waitNext();

    const first = handle.waitNext();
    await expect(handle.waitNext()).rejects.toThrow(BoardError);
    signal.notify();
    await expect(first).resolves.toBe(1);
  });

  it("resolves null after the handle closes and releases it", async () => {
    const signal = new ChangeSignal();
    const handle = signal.subscribe();
    await handle.waitNext();
    expect(signal.subscriberCount).toBe(1);

    const pending = handle.waitNext();
    handle.close();
    await expect(pending).resolves.toBeNull();
    await expect(handle.waitNext()).resolves.toBeNull();
    expect(signal.subscriberCount).toBe(0);
  });

  it("closes all handles when the signal closes", async () => {
    const signal = new ChangeSignal();
    const a = signal.subscribe();
    const b = signal.subscribe();
    await a.waitNext();

    const pending = a.waitNext();
    signal.close();
    await expect(pending).resolves.toBeNull();
    expect(b.closed).toBe(true);
    expect(signal.subscriberCount).toBe(0);
  });

  it("hands out closed handles and ignores notify once closed", async () => {
    const signal = new ChangeSignal();
    signal.close();
    signal.notify();
    expect(signal.version).toBe(0);

    const handle = signal.subscribe();
    expect(handle.closed).toBe(true);
    expect(signal.subscriberCount).toBe(0);
    await expect(handle.waitNext()).resolves.toBeNull();
  });
});
