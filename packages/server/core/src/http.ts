/* packages/server/core/src/http.ts */

import type { Board, Logger } from "./board.js";
import { BoardError } from "./errors.js";
import type { Post } from "./post.js";
import { renderPage, SSE_POSTS_EVENT } from "./render/page.js";
import type { PageOptions } from "./render/page.js";
import { renderPostList } from "./render/posts.js";
import type { CloseReason, EventStream, FrameRenderer } from "./subscription.js";

export interface HttpRequest {
  method: string;
  url: string;
  header: (name: string) => string | null;
  text: () => Promise<string>;
}

export interface HttpBodyResponse {
  status: number;
  headers: Record<string, string>;
  body: unknown;
}

export interface HttpStreamResponse {
  status: number;
  headers: Record<string, string>;
  stream: EventStream;
}

export type HttpResponse = HttpBodyResponse | HttpStreamResponse;

export type HttpHandler = (req: HttpRequest) => Promise<HttpResponse>;

export interface HttpHandlerOptions {
  /** Mount point for all routes, e.g. "/board/" */
  basePath?: string;
  title?: string;
  fallback?: HttpHandler;
  logger?: Logger;
}

export type RouteName = "page" | "events" | "listPosts" | "createPost";

const JSON_HEADER = { "Content-Type": "application/json" };
const HTML_HEADER = { "Content-Type": "text/html; charset=utf-8" };
const SSE_HEADER = {
  "Content-Type": "text/event-stream",
  "Cache-Control": "no-cache",
  Connection: "keep-alive",
};

export const SSE_HEARTBEAT = ": keep-alive\n\n";

function jsonResponse(status: number, body: unknown): HttpBodyResponse {
  return { status, headers: JSON_HEADER, body };
}

function errorResponse(error: unknown, logger: Logger): HttpBodyResponse {
  if (error instanceof BoardError) {
    return jsonResponse(error.status, error.toJSON());
  }
  logger.error("[tickerboard] request failed:", error);
  const message = error instanceof Error ? error.message : "Unknown error";
  return jsonResponse(500, new BoardError("INTERNAL_ERROR", message).toJSON());
}

// -- SSE framing --

/** Format one SSE event; multi-line data becomes one `data:` line per line */
export function sseEvent(event: string, data: string, id?: string): string {
  const lines = data
    .split(/\r\n|\r|\n/)
    .map((line) => `data: ${line}`)
    .join("\n");
  const idLine = id !== undefined ? `id: ${id}\n` : "";
  return `${idLine}event: ${event}\n${lines}\n\n`;
}

/** Format an SSE error event */
export function sseErrorEvent(code: string, message: string): string {
  return sseEvent("error", JSON.stringify({ code, message }));
}

/** Final frame for a stream that failed on the server side */
export function sseFailureEvent(error: unknown): string {
  if (error instanceof BoardError) return sseErrorEvent(error.code, error.message);
  const message = error instanceof Error ? error.message : "Unknown error";
  return sseErrorEvent("INTERNAL_ERROR", message);
}

export const htmlFrame: FrameRenderer = (posts, version) =>
  sseEvent(SSE_POSTS_EVENT, renderPostList(posts), String(version));

export const jsonFrame: FrameRenderer = (posts, version) =>
  sseEvent(SSE_POSTS_EVENT, JSON.stringify({ version, posts }), String(version));

// -- Routing --

function normalizeBasePath(basePath = "/"): string {
  const withLead = basePath.startsWith("/") ? basePath : `/${basePath}`;
  return withLead.endsWith("/") ? withLead : `${withLead}/`;
}

export function matchRoute(
  method: string,
  pathname: string,
  basePath?: string,
): RouteName | null {
  const base = normalizeBasePath(basePath);
  let rest: string;
  if (pathname === base.slice(0, -1)) {
    rest = "";
  } else if (pathname.startsWith(base)) {
    rest = pathname.slice(base.length);
  } else {
    return null;
  }

  if (rest === "") return method === "GET" ? "page" : null;
  if (rest === "events") return method === "GET" ? "events" : null;
  if (rest === "posts") {
    if (method === "GET") return "listPosts";
    if (method === "POST") return "createPost";
  }
  return null;
}

async function readPostPayload(req: HttpRequest): Promise<unknown> {
  const contentType = (req.header("content-type") ?? "").split(";")[0].trim().toLowerCase();
  if (contentType !== "application/json" && contentType !== "application/x-www-form-urlencoded") {
    throw new BoardError(
      "UNSUPPORTED_MEDIA_TYPE",
      "Expected application/json or application/x-www-form-urlencoded",
    );
  }

  let text: string;
  try {
    text = await req.text();
  } catch (error) {
    // Adapters reject oversized bodies with their own BoardError
    if (error instanceof BoardError) throw error;
    throw new BoardError("VALIDATION_ERROR", "Unreadable request body");
  }

  if (contentType === "application/x-www-form-urlencoded") {
    return Object.fromEntries(new URLSearchParams(text));
  }
  try {
    return JSON.parse(text) as unknown;
  } catch {
    throw new BoardError("VALIDATION_ERROR", "Invalid JSON body");
  }
}

export function createHttpHandler(board: Board, opts?: HttpHandlerOptions): HttpHandler {
  const basePath = normalizeBasePath(opts?.basePath);
  const logger = opts?.logger ?? board.logger;
  const pageOptions: PageOptions = {
    title: opts?.title,
    eventsPath: `${basePath}events`,
    postsPath: `${basePath}posts`,
  };

  return async (req) => {
    const url = new URL(req.url, "http://localhost");

    switch (matchRoute(req.method, url.pathname, basePath)) {
      case "page":
        return {
          status: 200,
          headers: HTML_HEADER,
          body: renderPage(board.store.snapshot(), pageOptions),
        };

      case "events": {
        const render = url.searchParams.get("format") === "json" ? jsonFrame : htmlFrame;
        return { status: 200, headers: SSE_HEADER, stream: board.subscribe(render) };
      }

      case "listPosts":
        return jsonResponse(200, { ok: true, data: board.store.snapshot() });

      case "createPost":
        try {
          const payload = await readPostPayload(req);
          const post: Post = board.publisher.submit(payload);
          return jsonResponse(201, { ok: true, data: post });
        } catch (error) {
          return errorResponse(error, logger);
        }

      case null:
        if (opts?.fallback) return opts.fallback(req);
        return errorResponse(
          new BoardError("NOT_FOUND", `No route for ${req.method} ${url.pathname}`),
          logger,
        );
    }
  };
}

// -- Writing responses --

export function serialize(body: unknown): string {
  return typeof body === "string" ? body : JSON.stringify(body);
}

/** Returning false (or throwing) marks the write as failed */
export type StreamWriter = (chunk: string) => boolean | void | Promise<boolean | void>;

export interface DrainOptions {
  /** Keep-alive comment interval; 0 or unset disables it */
  heartbeatMs?: number;
  /** A write that has not settled by then counts as failed */
  writeTimeoutMs?: number;
}

async function writeWithin(
  write: StreamWriter,
  chunk: string,
  timeoutMs?: number,
): Promise<boolean> {
  const attempt = (async () => (await write(chunk)) !== false)().catch(() => false);
  if (!timeoutMs) return attempt;

  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });
  try {
    return await Promise.race([attempt, expired]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Consume an event stream frame by frame. Writes are serialized; a failed or
 * timed-out write closes the stream with `write_error`, no retry.
 * Errors raised by the stream itself propagate.
 */
export async function drainStream(
  stream: EventStream,
  write: StreamWriter,
  opts?: DrainOptions,
): Promise<CloseReason | null> {
  let queue: Promise<boolean> = Promise.resolve(true);
  const send = (chunk: string): Promise<boolean> => {
    queue = queue.then((ok) => ok && writeWithin(write, chunk, opts?.writeTimeoutMs));
    return queue;
  };

  const heartbeat = opts?.heartbeatMs
    ? setInterval(() => {
        void send(SSE_HEARTBEAT).then((ok) => {
          if (!ok) stream.close("write_error");
        });
      }, opts.heartbeatMs)
    : null;

  try {
    for await (const chunk of stream) {
      if (!(await send(chunk))) {
        stream.close("write_error");
        break;
      }
    }
  } finally {
    if (heartbeat) clearInterval(heartbeat);
  }
  return stream.closeReason;
}

/**
 * Convert an HttpResponse to a Web API Response (for fetch-style runtimes such as Hono).
 * Stream bodies hold at most one unread frame; a write waits for the reader to
 * pull, so a stalled reader hits the write timeout instead of queueing frames.
 */
export function toWebResponse(
  result: HttpResponse,
  opts?: DrainOptions,
  logger: Logger = console,
): Response {
  if ("stream" in result) {
    const stream = result.stream;
    const encoder = new TextEncoder();
    let done = false;
    let demand: (() => void) | null = null;
    const release = () => {
      const resolve = demand;
      demand = null;
      resolve?.();
    };

    const readable = new ReadableStream<Uint8Array>(
      {
        start(controller) {
          const write = async (chunk: string): Promise<boolean> => {
            while (!done && (controller.desiredSize ?? 0) <= 0) {
              await new Promise<void>((resolve) => {
                demand = resolve;
              });
            }
            if (done) return false;
            controller.enqueue(encoder.encode(chunk));
            return true;
          };

          void drainStream(stream, write, opts).then(
            (reason) => {
              if (done) return;
              done = true;
              release();
              if (reason === "write_error") {
                controller.error(new BoardError("INTERNAL_ERROR", "Event stream write failed"));
              } else {
                controller.close();
              }
            },
            (error: unknown) => {
              logger.error("[tickerboard] event stream failed:", error);
              if (done) return;
              done = true;
              release();
              controller.enqueue(encoder.encode(sseFailureEvent(error)));
              controller.close();
            },
          );
        },
        pull() {
          release();
        },
        cancel() {
          done = true;
          release();
          stream.close("client_disconnect");
        },
      },
      new CountQueuingStrategy({ highWaterMark: 1 }),
    );
    return new Response(readable, { status: result.status, headers: result.headers });
  }
  return new Response(serialize(result.body), { status: result.status, headers: result.headers });
}
