/* packages/server/core/src/index.ts */

export { t } from "./types/index.js";
export { BoardError, DEFAULT_STATUS } from "./errors.js";
export {
  validatePost,
  bodyByteLimit,
  postDraftSchema,
  postSchema,
  postListSchema,
  DEFAULT_LIMITS,
} from "./post.js";
export { validateInput, formatValidationErrors, assertSchema } from "./validation/index.js";
export { ChangeSignal, SignalHandle } from "./signal.js";
export { PostStore, DEFAULT_MAX_POSTS } from "./store.js";
export { Publisher, postInput, defaultAvatarRef, DEFAULT_AVATAR_BASE_URL } from "./publisher.js";
export { Subscription } from "./subscription.js";
export { createBoard } from "./board.js";
export { escapeHtml } from "./render/escape.js";
export { renderPost, renderPostList, POST_LIST_ID } from "./render/posts.js";
export { renderPage, SSE_POSTS_EVENT } from "./render/page.js";
export {
  createHttpHandler,
  matchRoute,
  sseEvent,
  sseErrorEvent,
  sseFailureEvent,
  htmlFrame,
  jsonFrame,
  SSE_HEARTBEAT,
  serialize,
  drainStream,
  toWebResponse,
} from "./http.js";
export { loadConfig } from "./config.js";

export type {
  HttpHandler,
  HttpHandlerOptions,
  HttpRequest,
  HttpResponse,
  HttpBodyResponse,
  HttpStreamResponse,
  RouteName,
  StreamWriter,
  DrainOptions,
} from "./http.js";
export type { SchemaNode, OptionalSchemaNode, Infer } from "./types/schema.js";
export type { ErrorCode, ErrorEnvelope } from "./errors.js";
export type { Post, PostDraft, PostLimits } from "./post.js";
export type { PostStoreOptions } from "./store.js";
export type { PostInput, PublisherOptions } from "./publisher.js";
export type {
  SubscriptionState,
  SubscriptionOptions,
  CloseReason,
  EventStream,
  FrameRenderer,
} from "./subscription.js";
export type { Board, BoardOptions, Logger } from "./board.js";
export type { PageOptions } from "./render/page.js";
export type { BoardConfig } from "./config.js";
