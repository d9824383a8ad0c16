/* packages/server/core/src/render/page.ts */

import type { Post } from "../post.js";
import { escapeHtml } from "./escape.js";
import { renderPostList } from "./posts.js";

export interface PageOptions {
  title?: string;
  /** Path the browser opens the event stream on */
  eventsPath?: string;
  /** Path the submit form posts to */
  postsPath?: string;
}

export const SSE_POSTS_EVENT = "posts";

const HTMX_SCRIPTS = [
  "https://unpkg.com/htmx.org@1.9.12",
  "https://unpkg.com/htmx.org@1.9.12/dist/ext/sse.js",
];
const BOOTSTRAP_CSS = "https://cdn.jsdelivr.net/npm/bootstrap@5.3.3/dist/css/bootstrap.min.css";

export function renderPage(posts: readonly Post[], opts?: PageOptions): string {
  const title = escapeHtml(opts?.title ?? "Tickerboard");
  const eventsPath = escapeHtml(opts?.eventsPath ?? "/events");
  const postsPath = escapeHtml(opts?.postsPath ?? "/posts");
  const scripts = HTMX_SCRIPTS.map((src) => `    <script src="${src}"></script>`).join("\n");

  return `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8">
    <title>${title}</title>
    <link href="${BOOTSTRAP_CSS}" rel="stylesheet">
${scripts}
  </head>
  <body>
    <main class="container col-10">
      <h1 class="text-center mt-2">${title}</h1>
      <form hx-post="${postsPath}" hx-swap="none">
        <div class="mb-3">
          <label for="author">Name:</label>
          <input id="author" class="form-control" name="author" required>
        </div>
        <div class="mb-3">
          <label for="content">Message:</label>
          <textarea id="content" class="form-control" rows="3" name="content"></textarea>
        </div>
        <button type="submit" class="btn btn-primary">Post</button>
      </form>
      <div hx-ext="sse" sse-connect="${eventsPath}" sse-swap="${SSE_POSTS_EVENT}" hx-swap="innerHTML">
        ${renderPostList(posts)}
      </div>
    </main>
  </body>
</html>
`;
}
