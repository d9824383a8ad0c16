/* packages/server/core/src/types/schema.ts */

import type { Schema } from "jtd";

export type JTDSchema = Schema;

export interface SchemaNode<TOutput = unknown> {
  readonly _schema: JTDSchema;
  /** Type-level only; never present at runtime */
  readonly _output?: TOutput;
}

export interface OptionalSchemaNode<TOutput = unknown> extends SchemaNode<TOutput> {
  readonly _optional: true;
}

export type Infer<T extends SchemaNode> = T extends SchemaNode<infer U> ? U : never;

export function createSchemaNode<T>(schema: JTDSchema): SchemaNode<T> {
  return { _schema: schema };
}

export function createOptionalSchemaNode<T>(schema: JTDSchema): OptionalSchemaNode<T> {
  return { _schema: schema, _optional: true };
}
