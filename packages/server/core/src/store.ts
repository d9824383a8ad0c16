/* packages/server/core/src/store.ts */

import { BoardError } from "./errors.js";
import { DEFAULT_LIMITS, validatePost } from "./post.js";
import type { Post, PostLimits } from "./post.js";
import type { ChangeSignal } from "./signal.js";

export interface PostStoreOptions {
  /** Hard bound on stored posts; appends past it are rejected */
  maxPosts?: number;
  limits?: PostLimits;
}

export const DEFAULT_MAX_POSTS = 10_000;

/**
 * Append-only post sequence.
 *
 * The sequence is a frozen array that `append` replaces in a single
 * synchronous step, so `snapshot()` returns either the old or the new array,
 * never a partial one. The signal is notified only after the swap.
 */
export class PostStore {
  private posts: readonly Post[] = Object.freeze([]);
  private nextId = 1;
  private readonly maxPosts: number;
  private readonly limits: PostLimits;

  constructor(
    private readonly signal: ChangeSignal,
    opts?: PostStoreOptions,
  ) {
    this.maxPosts = opts?.maxPosts ?? DEFAULT_MAX_POSTS;
    this.limits = opts?.limits ?? DEFAULT_LIMITS;
  }

  get size(): number {
    return this.posts.length;
  }

  get capacity(): number {
    return this.maxPosts;
  }

  get postLimits(): PostLimits {
    return this.limits;
  }

  append(draft: unknown): Post {
    const valid = validatePost(draft, this.limits);
    if (this.posts.length >= this.maxPosts) {
      throw new BoardError("CAPACITY_EXCEEDED", `Post limit of ${this.maxPosts} reached`);
    }

    const last = this.posts[this.posts.length - 1];
    const createdAt =
      last && Date.parse(valid.createdAt) < Date.parse(last.createdAt)
        ? last.createdAt
        : valid.createdAt;

    const post: Post = Object.freeze({
      id: this.nextId,
      author: valid.author,
      content: valid.content,
      avatarRef: valid.avatarRef,
      createdAt,
    });
    this.posts = Object.freeze([...this.posts, post]);
    this.nextId += 1;

    this.signal.notify();
    return post;
  }

  snapshot(): readonly Post[] {
    return this.posts;
  }
}
