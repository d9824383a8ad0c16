/* packages/server/core/src/publisher.ts */

import { t } from "./types/index.js";
import type { Infer } from "./types/schema.js";
import { assertSchema } from "./validation/index.js";
import type { Post } from "./post.js";
import type { PostStore } from "./store.js";

export const postInput = t.object({
  author: t.string(),
  content: t.string(),
  avatarRef: t.optional(t.string()),
});

export type PostInput = Infer<typeof postInput>;

export const DEFAULT_AVATAR_BASE_URL = "https://ui-avatars.com/api/";

export interface PublisherOptions {
  clock?: () => Date;
  avatarBaseUrl?: string;
}

export function defaultAvatarRef(author: string, baseUrl = DEFAULT_AVATAR_BASE_URL): string {
  const query = new URLSearchParams({ background: "random", rounded: "true", name: author.trim() });
  return `${baseUrl}?${query.toString()}`;
}

/** Keep only the fields the input schema knows, so form extras do not fail validation */
function pickInputFields(raw: unknown): unknown {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) return raw;
  const picked: Record<string, unknown> = {};
  for (const key of ["author", "content", "avatarRef"]) {
    if (key in raw) picked[key] = Reflect.get(raw, key);
  }
  return picked;
}

export class Publisher {
  private readonly clock: () => Date;
  private readonly avatarBaseUrl: string;

  constructor(
    private readonly store: PostStore,
    opts?: PublisherOptions,
  ) {
    this.clock = opts?.clock ?? (() => new Date());
    this.avatarBaseUrl = opts?.avatarBaseUrl ?? DEFAULT_AVATAR_BASE_URL;
  }

  createPost(author: string, content: string, avatarRef?: string): Post {
    return this.store.append({
      author,
      content,
      avatarRef: avatarRef || defaultAvatarRef(author, this.avatarBaseUrl),
      createdAt: this.clock().toISOString(),
    });
  }

  /** Validate a raw request payload and publish it */
  submit(raw: unknown): Post {
    const input = pickInputFields(raw);
    assertSchema(postInput, input, "Post input");
    return this.createPost(input.author, input.content, input.avatarRef);
  }
}
