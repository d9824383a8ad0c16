/* packages/server/core/src/validation/index.ts */

import { validate } from "jtd";
import type { Schema, ValidationError as JTDValidationError } from "jtd";
import type { SchemaNode } from "../types/schema.js";
import { BoardError } from "../errors.js";

export interface ValidationResult {
  valid: boolean;
  errors: JTDValidationError[];
}

export function validateInput(schema: Schema, data: unknown): ValidationResult {
  const errors = validate(schema, data, { maxDepth: 32, maxErrors: 10 });
  return {
    valid: errors.length === 0,
    errors,
  };
}

export function formatValidationErrors(errors: JTDValidationError[]): string {
  return errors
    .map((e) => {
      const path = e.instancePath.length > 0 ? e.instancePath.join("/") : "(root)";
      const schema = e.schemaPath.join("/");
      return `${path} (schema: ${schema})`;
    })
    .join("; ");
}

/** Throw VALIDATION_ERROR unless `data` matches the schema node */
export function assertSchema<T>(
  node: SchemaNode<T>,
  data: unknown,
  label: string,
): asserts data is T {
  const validation = validateInput(node._schema, data);
  if (!validation.valid) {
    const details = formatValidationErrors(validation.errors);
    throw new BoardError("VALIDATION_ERROR", `${label} validation failed: ${details}`);
  }
}
