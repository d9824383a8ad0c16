/* packages/server/core/src/signal.ts */

import { BoardError } from "./errors.js";

/**
 * One subscriber's view of a ChangeSignal.
 *
 * Remembers the last version it observed; `waitNext()` resolves with the
 * newest version past that one. A fresh handle has observed nothing, so its
 * first wait resolves at once with the current version.
 */
export class SignalHandle {
  private lastSeen = -1;
  private waiter: (() => void) | null = null;
  private _closed = false;

  constructor(
    private readonly readVersion: () => number,
    private readonly release: (handle: SignalHandle) => void,
  ) {}

  get closed(): boolean {
    return this._closed;
  }

  /** Resolves with the next unseen version, or null once the handle is closed */
  async waitNext(): Promise<number | null> {
    if (this._closed) return null;
    if (this.readVersion() <= this.lastSeen) {
      if (this.waiter) {
        throw new BoardError("INTERNAL_ERROR", "waitNext is already pending on this handle");
      }
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
      if (this._closed) return null;
    }
    // Read on resume, not at wake time: notifies that landed in between collapse into one
    this.lastSeen = this.readVersion();
    return this.lastSeen;
  }

  /** @internal called by ChangeSignal.notify() */
  wake(): void {
    const waiter = this.waiter;
    if (!waiter) return;
    this.waiter = null;
    waiter();
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;
    this.release(this);
    this.wake();
  }
}

/**
 * Payload-free broadcast: a version counter plus the set of handles to wake.
 * Subscribers re-read the store after waking instead of receiving data here.
 */
export class ChangeSignal {
  private _version = 0;
  private _closed = false;
  private readonly handles = new Set<SignalHandle>();

  get version(): number {
    return this._version;
  }

  get subscriberCount(): number {
    return this.handles.size;
  }

  get closed(): boolean {
    return this._closed;
  }

  notify(): void {
    if (this._closed) return;
    this._version += 1;
    for (const handle of [...this.handles]) handle.wake();
  }

  subscribe(): SignalHandle {
    const handle = new SignalHandle(
      () => this._version,
      (h) => this.handles.delete(h),
    );
    if (this._closed) {
      handle.close();
    } else {
      this.handles.add(handle);
    }
    return handle;
  }

  waitNext(handle: SignalHandle): Promise<number | null> {
    return handle.waitNext();
  }

  /** Close every handle; pending waits resolve null */
  close(): void {
    if (this._closed) return;
    this._closed = true;
    for (const handle of [...this.handles]) handle.close();
  }
}
