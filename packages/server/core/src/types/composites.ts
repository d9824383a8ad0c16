/* packages/server/core/src/types/composites.ts */

import type { SchemaNode, OptionalSchemaNode, Infer, JTDSchema } from "./schema.js";
import { createSchemaNode, createOptionalSchemaNode } from "./schema.js";

// -- Type-level utilities --

type Simplify<T> = { [K in keyof T]: T[K] } & {};

type RequiredKeys<T extends Record<string, SchemaNode>> = {
  [K in keyof T]: T[K] extends OptionalSchemaNode ? never : K;
}[keyof T];

type OptionalKeys<T extends Record<string, SchemaNode>> = {
  [K in keyof T]: T[K] extends OptionalSchemaNode ? K : never;
}[keyof T];

type InferObject<T extends Record<string, SchemaNode>> = Simplify<
  { [K in RequiredKeys<T>]: Infer<T[K]> } & { [K in OptionalKeys<T>]?: Infer<T[K]> }
>;

interface PropertiesForm {
  properties?: Record<string, JTDSchema>;
  optionalProperties?: Record<string, JTDSchema>;
}

// -- Builders --

export function object<T extends Record<string, SchemaNode>>(
  fields: T,
): SchemaNode<InferObject<T>> {
  const properties: Record<string, JTDSchema> = {};
  const optionalProperties: Record<string, JTDSchema> = {};

  for (const [key, node] of Object.entries(fields)) {
    if ("_optional" in node && node._optional === true) {
      optionalProperties[key] = node._schema;
    } else {
      properties[key] = node._schema;
    }
  }

  const schema: PropertiesForm = {};
  if (Object.keys(properties).length > 0 || Object.keys(optionalProperties).length === 0) {
    schema.properties = properties;
  }
  if (Object.keys(optionalProperties).length > 0) {
    schema.optionalProperties = optionalProperties;
  }

  return createSchemaNode<InferObject<T>>(schema);
}

export function optional<T>(node: SchemaNode<T>): OptionalSchemaNode<T> {
  return createOptionalSchemaNode<T>(node._schema);
}

export function array<T>(node: SchemaNode<T>): SchemaNode<T[]> {
  return createSchemaNode<T[]>({ elements: node._schema });
}
