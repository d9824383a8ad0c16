/* packages/server/core/src/board.ts */

import { DEFAULT_LIMITS } from "./post.js";
import type { PostLimits } from "./post.js";
import { ChangeSignal } from "./signal.js";
import { PostStore } from "./store.js";
import { Publisher } from "./publisher.js";
import { Subscription } from "./subscription.js";
import type { CloseReason, FrameRenderer } from "./subscription.js";

export type Logger = Pick<Console, "info" | "error">;

export interface BoardOptions {
  maxPosts?: number;
  limits?: Partial<PostLimits>;
  clock?: () => Date;
  avatarBaseUrl?: string;
  logger?: Logger;
}

/** The one shared handle every request path works through */
export interface Board {
  readonly store: PostStore;
  readonly signal: ChangeSignal;
  readonly publisher: Publisher;
  readonly logger: Logger;
  readonly subscriptionCount: number;
  readonly closed: boolean;
  subscribe(render: FrameRenderer): Subscription;
  /** End every subscription and stop the signal; used on process shutdown */
  close(): void;
}

export function createBoard(opts?: BoardOptions): Board {
  const logger = opts?.logger ?? console;
  const signal = new ChangeSignal();
  const store = new PostStore(signal, {
    maxPosts: opts?.maxPosts,
    limits: { ...DEFAULT_LIMITS, ...opts?.limits },
  });
  const publisher = new Publisher(store, {
    clock: opts?.clock,
    avatarBaseUrl: opts?.avatarBaseUrl,
  });
  const open = new Set<Subscription>();
  let closed = false;

  function onClose(sub: Subscription, reason: CloseReason): void {
    open.delete(sub);
    if (reason === "invariant_violation") {
      logger.error(`[tickerboard] subscription ${sub.id} closed: ${reason}`);
      return;
    }
    logger.info(`[tickerboard] subscription ${sub.id} closed (${reason}), ${open.size} open`);
  }

  return {
    store,
    signal,
    publisher,
    logger,
    get subscriptionCount() {
      return open.size;
    },
    get closed() {
      return closed;
    },
    subscribe(render) {
      const sub = new Subscription(store, signal, { render, onClose });
      if (!sub.isClosed()) {
        open.add(sub);
        logger.info(`[tickerboard] subscription ${sub.id} opened, ${open.size} open`);
      }
      return sub;
    },
    close() {
      if (closed) return;
      closed = true;
      for (const sub of [...open]) sub.close("shutdown");
      signal.close();
    },
  };
}
