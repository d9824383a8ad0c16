/* packages/server/adapter/node/src/index.ts */

import type { IncomingMessage, RequestListener, Server, ServerResponse } from "node:http";
import { createServer } from "node:http";
import {
  BoardError,
  bodyByteLimit,
  createHttpHandler,
  serialize,
  drainStream,
  sseFailureEvent,
} from "@tickerboard/server";
import type {
  Board,
  DrainOptions,
  HttpHandlerOptions,
  HttpResponse,
  HttpStreamResponse,
  Logger,
} from "@tickerboard/server";

export interface ServeNodeOptions extends HttpHandlerOptions, DrainOptions {
  port?: number;
  host?: string;
  /** Request bodies past this size get 413; defaults to what the post limits can need */
  maxBodyBytes?: number;
}

/** Buffers the body; stops reading once it passes `maxBytes` */
function readBody(req: IncomingMessage, maxBytes: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const tooLarge = () =>
      new BoardError("PAYLOAD_TOO_LARGE", `Request body exceeds ${maxBytes} bytes`);

    if (Number(req.headers["content-length"]) > maxBytes) {
      req.pause();
      reject(tooLarge());
      return;
    }

    const chunks: Buffer[] = [];
    let size = 0;
    const onData = (c: Buffer) => {
      size += c.length;
      if (size > maxBytes) {
        req.off("data", onData);
        req.pause();
        reject(tooLarge());
        return;
      }
      chunks.push(c);
    };
    req.on("data", onData);
    req.on("end", () => resolve(Buffer.concat(chunks).toString()));
    req.on("error", reject);
  });
}

function headerOf(req: IncomingMessage, name: string): string | null {
  const v = req.headers[name.toLowerCase()];
  return typeof v === "string" ? v : Array.isArray(v) ? (v[0] ?? null) : null;
}

/** Resolves true once the socket drains, false if the response closes first */
function waitForDrain(res: ServerResponse): Promise<boolean> {
  return new Promise((resolve) => {
    const onDrain = () => settle(true);
    const onClose = () => settle(false);
    function settle(ok: boolean) {
      res.off("drain", onDrain);
      res.off("close", onClose);
      resolve(ok);
    }
    res.once("drain", onDrain);
    res.once("close", onClose);
  });
}

async function sendStream(
  res: ServerResponse,
  result: HttpStreamResponse,
  logger: Logger,
  opts?: DrainOptions,
): Promise<void> {
  const { stream } = result;
  res.writeHead(result.status, result.headers);
  res.flushHeaders();

  // Client went away before the stream finished
  res.on("close", () => {
    if (!res.writableFinished) stream.close("client_disconnect");
  });

  try {
    const reason = await drainStream(
      stream,
      (chunk) => {
        if (res.destroyed || !res.writable) return false;
        return res.write(chunk) || waitForDrain(res);
      },
      opts,
    );
    if (reason === "write_error") {
      res.destroy();
      return;
    }
  } catch (error) {
    logger.error("[tickerboard] event stream failed:", error);
    if (res.writable) res.write(sseFailureEvent(error));
  }
  res.end();
}

async function sendResponse(
  res: ServerResponse,
  result: HttpResponse,
  logger: Logger,
  opts?: DrainOptions,
): Promise<void> {
  if ("stream" in result) {
    await sendStream(res, result, logger, opts);
    return;
  }
  // The rest of an oversized body is never read, so the socket cannot be reused
  if (result.status === 413) res.setHeader("Connection", "close");
  res.writeHead(result.status, result.headers);
  res.end(serialize(result.body));
}

/** Request listener for mounting the board on an existing node:http server */
export function createNodeListener(board: Board, opts?: ServeNodeOptions): RequestListener {
  const handler = createHttpHandler(board, opts);
  const logger = opts?.logger ?? board.logger;
  const maxBodyBytes = opts?.maxBodyBytes ?? bodyByteLimit(board.store.postLimits);
  const drain: DrainOptions = {
    heartbeatMs: opts?.heartbeatMs,
    writeTimeoutMs: opts?.writeTimeoutMs,
  };

  return (req, res) => {
    const raw = readBody(req, maxBodyBytes);
    // Body is only awaited for POSTs; keep a rejected read from going unhandled
    raw.catch(() => undefined);
    void (async () => {
      try {
        const result = await handler({
          method: req.method || "GET",
          url: `http://localhost${req.url || "/"}`,
          header: (name) => headerOf(req, name),
          text: () => raw,
        });
        await sendResponse(res, result, logger, drain);
      } catch (error) {
        logger.error("[tickerboard] request failed:", error);
        if (!res.headersSent) res.writeHead(500, { "Content-Type": "application/json" });
        res.end();
      }
    })();
  };
}

export function serveNode(board: Board, opts?: ServeNodeOptions): Server {
  const server = createServer(createNodeListener(board, opts));
  server.listen(opts?.port ?? 3000, opts?.host);
  return server;
}
