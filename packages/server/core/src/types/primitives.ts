/* packages/server/core/src/types/primitives.ts */

import type { SchemaNode } from "./schema.js";
import { createSchemaNode } from "./schema.js";

export function string(): SchemaNode<string> {
  return createSchemaNode<string>({ type: "string" });
}

export function uint32(): SchemaNode<number> {
  return createSchemaNode<number>({ type: "uint32" });
}

/** RFC 3339 string, e.g. `new Date().toISOString()` */
export function timestamp(): SchemaNode<string> {
  return createSchemaNode<string>({ type: "timestamp" });
}
