/* examples/server-node/src/index.ts */

import { createBoard, loadConfig } from "@tickerboard/server";
import { serveNode } from "@tickerboard/adapter-node";

const config = loadConfig();

const board = createBoard({
  maxPosts: config.maxPosts,
  limits: {
    maxAuthorLength: config.maxAuthorLength,
    maxContentLength: config.maxContentLength,
  },
  avatarBaseUrl: config.avatarBaseUrl,
});

const server = serveNode(board, {
  port: config.port,
  host: config.host,
  title: config.title,
  heartbeatMs: config.heartbeatMs,
  writeTimeoutMs: config.writeTimeoutMs,
});

server.on("listening", () => {
  console.log(`Tickerboard running on http://${config.host}:${config.port}`);
});

function shutdown(signal: string): void {
  console.log(`Received ${signal}, closing ${board.subscriptionCount} stream(s)`);
  // Ends every open event stream so server.close() is not held up by them
  board.close();
  server.close((err) => {
    if (err) {
      console.error("Server did not close cleanly:", err);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
