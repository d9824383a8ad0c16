/* packages/server/core/__tests__/fixtures.ts */

import { vi } from "vitest";
import { createBoard } from "../src/index.js";
import type { Board, BoardOptions, Logger, PostDraft } from "../src/index.js";

export const FIXED_TIME = "2024-05-01T12:00:00.000Z";

export function silentLogger(): Logger {
  return { info: vi.fn(), error: vi.fn() };
}

export function testBoard(opts?: BoardOptions): Board {
  return createBoard({
    logger: silentLogger(),
    clock: () => new Date(FIXED_TIME),
    ...opts,
  });
}

export function draft(overrides?: Partial<PostDraft>): PostDraft {
  return {
    author: "ann",
    content: "hello",
    avatarRef: "https://example.test/ann.png",
    createdAt: FIXED_TIME,
    ...overrides,
  };
}

/** Frame renderer that only records what a frame was built from */
export const countFrame = (posts: readonly unknown[], version: number): string =>
  `${version}:${posts.length}`;
