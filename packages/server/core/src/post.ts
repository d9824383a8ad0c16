/* packages/server/core/src/post.ts */

import { t } from "./types/index.js";
import type { Infer } from "./types/schema.js";
import { BoardError } from "./errors.js";
import { assertSchema } from "./validation/index.js";

export const postDraftSchema = t.object({
  author: t.string(),
  content: t.string(),
  avatarRef: t.string(),
  createdAt: t.timestamp(),
});

export const postSchema = t.object({
  id: t.uint32(),
  author: t.string(),
  content: t.string(),
  avatarRef: t.string(),
  createdAt: t.timestamp(),
});

export const postListSchema = t.array(postSchema);

/** A post before the store has committed it (no id yet) */
export type PostDraft = Infer<typeof postDraftSchema>;

export type Post = Readonly<Infer<typeof postSchema>>;

export interface PostLimits {
  maxAuthorLength: number;
  maxContentLength: number;
  maxAvatarRefLength: number;
}

export const DEFAULT_LIMITS: PostLimits = {
  maxAuthorLength: 40,
  maxContentLength: 280,
  maxAvatarRefLength: 2048,
};

/**
 * Largest request body that can still carry a post within `limits`: every
 * character may take up to 12 bytes once UTF-8 and percent or JSON escaped,
 * plus room for field names and punctuation.
 */
export function bodyByteLimit(limits: PostLimits = DEFAULT_LIMITS): number {
  const chars = limits.maxAuthorLength + limits.maxContentLength + limits.maxAvatarRefLength;
  return chars * 12 + 1024;
}

/**
 * Check a draft against the schema and the length limits.
 * Returns the normalized draft (author trimmed); throws VALIDATION_ERROR otherwise.
 */
export function validatePost(draft: unknown, limits: PostLimits = DEFAULT_LIMITS): PostDraft {
  assertSchema(postDraftSchema, draft, "Post");
  const { author, content, avatarRef, createdAt } = draft;

  const trimmed = author.trim();
  if (trimmed.length === 0) {
    throw new BoardError("VALIDATION_ERROR", "Author must not be empty");
  }
  if (trimmed.length > limits.maxAuthorLength) {
    throw new BoardError(
      "VALIDATION_ERROR",
      `Author exceeds ${limits.maxAuthorLength} characters`,
    );
  }
  if (content.length > limits.maxContentLength) {
    throw new BoardError(
      "VALIDATION_ERROR",
      `Content exceeds ${limits.maxContentLength} characters`,
    );
  }
  if (avatarRef.length > limits.maxAvatarRefLength) {
    throw new BoardError(
      "VALIDATION_ERROR",
      `Avatar reference exceeds ${limits.maxAvatarRefLength} characters`,
    );
  }
  // RFC 3339 admits leap seconds (":60") that Date cannot represent
  if (Number.isNaN(Date.parse(createdAt))) {
    throw new BoardError("VALIDATION_ERROR", `Unrepresentable createdAt "${createdAt}"`);
  }

  return { author: trimmed, content, avatarRef, createdAt };
}
