/* packages/server/core/src/types/index.ts */

import { string, uint32, timestamp } from "./primitives.js";
import { object, optional, array } from "./composites.js";

export const t = {
  string,
  uint32,
  timestamp,
  object,
  optional,
  array,
} as const;
