/* packages/server/core/src/subscription.ts */

import { BoardError } from "./errors.js";
import type { Post } from "./post.js";
import type { PostStore } from "./store.js";
import type { ChangeSignal, SignalHandle } from "./signal.js";

export type SubscriptionState = "init" | "waiting" | "emitting" | "closed";

export type CloseReason = "client_disconnect" | "write_error" | "shutdown" | "invariant_violation";

/** Serialize one snapshot into a frame ready to write to the client */
export type FrameRenderer = (posts: readonly Post[], version: number) => string;

/** A stream of frames that can be ended from outside the consuming loop */
export interface EventStream extends AsyncIterable<string> {
  close(reason: CloseReason): void;
  readonly closeReason: CloseReason | null;
}

export interface SubscriptionOptions {
  render: FrameRenderer;
  onClose?: (subscription: Subscription, reason: CloseReason) => void;
}

let nextSubscriptionId = 1;

/**
 * Per-connection streaming loop: init -> waiting <-> emitting -> closed.
 *
 * Iterating yields the current snapshot first, then one frame per observed
 * change. Every frame re-reads the store, so a slow consumer skips straight
 * to the latest state instead of replaying intermediate ones.
 */
export class Subscription implements EventStream {
  readonly id = nextSubscriptionId++;
  private _state: SubscriptionState = "init";
  private _closeReason: CloseReason | null = null;
  private started = false;
  private lastLength = 0;
  private readonly handle: SignalHandle;

  constructor(
    private readonly store: PostStore,
    signal: ChangeSignal,
    private readonly opts: SubscriptionOptions,
  ) {
    this.handle = signal.subscribe();
    if (this.handle.closed) this.close("shutdown");
  }

  get state(): SubscriptionState {
    return this._state;
  }

  get closeReason(): CloseReason | null {
    return this._closeReason;
  }

  isClosed(): boolean {
    return this._state === "closed";
  }

  close(reason: CloseReason): void {
    if (this._state === "closed") return;
    this._state = "closed";
    this._closeReason = reason;
    this.handle.close();
    this.opts.onClose?.(this, reason);
  }

  [Symbol.asyncIterator](): AsyncGenerator<string, void, undefined> {
    if (this.started) {
      throw new BoardError("INTERNAL_ERROR", `Subscription ${this.id} is already being consumed`);
    }
    this.started = true;
    return this.frames();
  }

  private async *frames(): AsyncGenerator<string, void, undefined> {
    try {
      // Init: a fresh handle resolves at once with the current version
      let version = await this.handle.waitNext();
      while (version !== null && !this.isClosed()) {
        this._state = "emitting";
        yield this.emit(version);
        if (this.isClosed()) return;
        this._state = "waiting";
        version = await this.handle.waitNext();
      }
      // Signal closed underneath us
      this.close("shutdown");
    } finally {
      this.close("client_disconnect");
    }
  }

  private emit(version: number): string {
    const posts = this.store.snapshot();
    if (posts.length < this.lastLength) {
      this.close("invariant_violation");
      throw new BoardError(
        "INVARIANT_VIOLATION",
        `Snapshot shrank from ${this.lastLength} to ${posts.length} posts`,
      );
    }
    this.lastLength = posts.length;
    return this.opts.render(posts, version);
  }
}
