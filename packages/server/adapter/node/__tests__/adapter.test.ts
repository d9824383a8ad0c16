/* packages/server/adapter/node/__tests__/adapter.test.ts */

import { once } from "node:events";
import type { AddressInfo } from "node:net";
import type { Server } from "node:http";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createBoard } from "@tickerboard/server";
import type { Board } from "@tickerboard/server";
import { serveNode } from "../src/index.js";

let board: Board;
let server: Server;
let base: string;

beforeEach(async () => {
  board = createBoard({ logger: { info: vi.fn(), error: vi.fn() } });
  server = serveNode(board, { port: 0, host: "127.0.0.1", heartbeatMs: 0 });
  await once(server, "listening");
  const addr = server.address();
  if (addr === null || typeof addr === "string") throw new Error("expected a TCP address");
  base = `http://127.0.0.1:${(addr satisfies AddressInfo).port}`;
});

afterEach(async () => {
  board.close();
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

/** Read until `count` complete SSE events have arrived */
async function readEvents(reader: ReadableStreamDefaultReader<Uint8Array>, count: number) {
  const decoder = new TextDecoder();
  let text = "";
  while (text.split("\n\n").length - 1 < count) {
    const { value, done } = await reader.read();
    if (done) break;
    text += decoder.decode(value, { stream: true });
  }
  return text;
}

describe("adapter-node", () => {
  it("GET / serves the page", async () => {
    const res = await fetch(`${base}/`);
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("text/html; charset=utf-8");
    expect(await res.text()).toContain('sse-connect="/events"');
  });

  it("POST /posts creates a post from JSON", async () => {
    const res = await fetch(`${base}/posts`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ author: "ann", content: "hello" }),
    });
    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({ ok: true, data: { id: 1, author: "ann" } });
  });

  it("POST /posts creates a post from a form", async () => {
    const res = await fetch(`${base}/posts`, {
      method: "POST",
      body: new URLSearchParams({ author: "bob", content: "hi" }),
    });
    expect(res.status).toBe(201);
    expect(board.store.snapshot()[0]?.author).toBe("bob");
  });

  it("POST /posts with an unsupported type returns 415", async () => {
    const res = await fetch(`${base}/posts`, {
      method: "POST",
      headers: { "Content-Type": "text/plain" },
      body: "hello",
    });
    expect(res.status).toBe(415);
    expect(board.store.size).toBe(0);
  });

  it("POST /posts with an oversized body returns 413", async () => {
    const small = serveNode(board, { port: 0, host: "127.0.0.1", maxBodyBytes: 64 });
    await once(small, "listening");
    const addr = small.address();
    if (addr === null || typeof addr === "string") throw new Error("expected a TCP address");
    try {
      const res = await fetch(`http://127.0.0.1:${addr.port}/posts`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ author: "ann", content: "x".repeat(200) }),
      });
      expect(res.status).toBe(413);
      expect(await res.json()).toEqual({
        ok: false,
        error: { code: "PAYLOAD_TOO_LARGE", message: "Request body exceeds 64 bytes" },
      });
      expect(board.store.size).toBe(0);
    } finally {
      small.closeAllConnections();
      await new Promise<void>((resolve) => small.close(() => resolve()));
    }
  });

  it("unknown paths return 404", async () => {
    const res = await fetch(`${base}/missing`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      ok: false,
      error: { code: "NOT_FOUND", message: "No route for GET /missing" },
    });
  });

  it("streams posts over SSE and cleans up on disconnect", async () => {
    const res = await fetch(`${base}/events?format=json`);
    expect(res.headers.get("content-type")).toBe("text/event-stream");
    const body = res.body;
    if (!body) throw new Error("expected a body");
    const reader = body.getReader();

    expect(await readEvents(reader, 1)).toBe(
      'id: 0\nevent: posts\ndata: {"version":0,"posts":[]}\n\n',
    );
    expect(board.subscriptionCount).toBe(1);

    board.publisher.createPost("ann", "live");
    const frame = await readEvents(reader, 1);
    expect(frame.startsWith("id: 1\nevent: posts\n")).toBe(true);
    expect(frame).toContain('"content":"live"');

    await reader.cancel();
    await vi.waitFor(() => expect(board.subscriptionCount).toBe(0));
  });

  it("ends open streams when the board closes", async () => {
    const res = await fetch(`${base}/events`);
    const body = res.body;
    if (!body) throw new Error("expected a body");
    const reader = body.getReader();
    await readEvents(reader, 1);

    board.close();
    const rest = await reader.read();
    expect(rest.done).toBe(true);
  });
});
