/* packages/server/core/src/render/posts.ts */

import type { Post } from "../post.js";
import { escapeHtml } from "./escape.js";

export const POST_LIST_ID = "posts";

export function renderPost(post: Post): string {
  const author = escapeHtml(post.author);
  const createdAt = escapeHtml(post.createdAt);
  return (
    `<div class="card mb-2 shadow-sm" id="post-${post.id}">` +
    `<div class="card-body d-flex">` +
    `<img class="me-4" src="${escapeHtml(post.avatarRef)}" alt="${author}" width="108">` +
    `<div>` +
    `<h5 class="card-title text-muted">${author}: <small><time datetime="${createdAt}">${createdAt}</time></small></h5>` +
    `<div class="card-text lead mb-2">${escapeHtml(post.content)}</div>` +
    `</div>` +
    `</div>` +
    `</div>`
  );
}

/** The swappable list fragment; posts appear in append order */
export function renderPostList(posts: readonly Post[]): string {
  return `<div id="${POST_LIST_ID}" class="posts">${posts.map(renderPost).join("")}</div>`;
}
