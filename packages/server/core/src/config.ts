/* packages/server/core/src/config.ts */

import { BoardError } from "./errors.js";
import { DEFAULT_LIMITS } from "./post.js";
import { DEFAULT_AVATAR_BASE_URL } from "./publisher.js";
import { DEFAULT_MAX_POSTS } from "./store.js";

export interface BoardConfig {
  port: number;
  host: string;
  title: string;
  maxPosts: number;
  maxAuthorLength: number;
  maxContentLength: number;
  heartbeatMs: number;
  writeTimeoutMs: number;
  avatarBaseUrl: string;
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new BoardError(
      "CONFIG_ERROR",
      `${name} must be an integer between ${min} and ${max}, got "${raw}"`,
    );
  }
  return value;
}

function readString(env: Env, name: string, fallback: string): string {
  const raw = env[name]?.trim();
  return raw ? raw : fallback;
}

export function loadConfig(env: Env = process.env): BoardConfig {
  return {
    port: readInt(env, "PORT", 3000, 0, 65535),
    host: readString(env, "HOST", "127.0.0.1"),
    title: readString(env, "TICKERBOARD_TITLE", "Tickerboard"),
    maxPosts: readInt(env, "TICKERBOARD_MAX_POSTS", DEFAULT_MAX_POSTS, 1, 1_000_000),
    maxAuthorLength: readInt(
      env,
      "TICKERBOARD_MAX_AUTHOR_LENGTH",
      DEFAULT_LIMITS.maxAuthorLength,
      1,
      1000,
    ),
    maxContentLength: readInt(
      env,
      "TICKERBOARD_MAX_CONTENT_LENGTH",
      DEFAULT_LIMITS.maxContentLength,
      0,
      100_000,
    ),
    heartbeatMs: readInt(env, "TICKERBOARD_HEARTBEAT_MS", 15_000, 0, 3_600_000),
    writeTimeoutMs: readInt(env, "TICKERBOARD_WRITE_TIMEOUT_MS", 10_000, 1, 600_000),
    avatarBaseUrl: readString(env, "TICKERBOARD_AVATAR_BASE_URL", DEFAULT_AVATAR_BASE_URL),
  };
}
