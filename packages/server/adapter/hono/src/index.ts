/* packages/server/adapter/hono/src/index.ts */

import { createHttpHandler, matchRoute, toWebResponse } from "@tickerboard/server";
import type { Board, DrainOptions, HttpHandlerOptions } from "@tickerboard/server";
import type { MiddlewareHandler } from "hono";

export interface TickerboardHonoOptions
  extends Omit<HttpHandlerOptions, "fallback">,
    DrainOptions {}

/** Hono middleware serving the board routes; every other request goes to `next()` */
export function tickerboard(board: Board, opts?: TickerboardHonoOptions): MiddlewareHandler {
  const handler = createHttpHandler(board, opts);
  const drain: DrainOptions = {
    heartbeatMs: opts?.heartbeatMs,
    writeTimeoutMs: opts?.writeTimeoutMs,
  };

  return async (c, next) => {
    const raw = c.req.raw;
    const url = new URL(raw.url);

    if (!matchRoute(raw.method, url.pathname, opts?.basePath)) {
      return next();
    }

    const result = await handler({
      method: raw.method,
      url: raw.url,
      header: (name) => raw.headers.get(name),
      text: () => raw.text(),
    });

    return toWebResponse(result, drain, opts?.logger ?? board.logger);
  };
}
