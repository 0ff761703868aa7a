/**
 * Schema validation
 *
 * Runs when a registry is built, so a layout that could read past the
 * payload region fails at startup rather than while decoding.
 */

import { SchemaDefinitionError } from "../errors.js";
import { MAX_TYPE_ID, PAYLOAD_LENGTH } from "../models/frame.js";
import type { EventSchema, FieldSpec } from "./types.js";

const WIDTHS: readonly number[] = [1, 2, 4];
const ENCODINGS: readonly string[] = ["uint", "int", "float"];

function validateField(schema: EventSchema, field: FieldSpec): void {
  const where = `${schema.name} (${schema.id}) field "${field.name}"`;

  if (!field.name) {
    throw new SchemaDefinitionError(`${schema.name} (${schema.id}) has a field with no name`);
  }
  if (!WIDTHS.includes(field.width)) {
    throw new SchemaDefinitionError(`${where}: width must be 1, 2 or 4, got ${field.width}`);
  }
  if (!ENCODINGS.includes(field.encoding)) {
    throw new SchemaDefinitionError(`${where}: unknown encoding ${field.encoding}`);
  }
  if (field.encoding === "float" && field.width !== 4) {
    throw new SchemaDefinitionError(`${where}: float fields must be 4 bytes wide`);
  }
  if (!Number.isInteger(field.offset) || field.offset < 0) {
    throw new SchemaDefinitionError(`${where}: offset must be a non-negative integer, got ${field.offset}`);
  }
  if (field.offset + field.width > PAYLOAD_LENGTH) {
    throw new SchemaDefinitionError(
      `${where}: bytes ${field.offset}..${field.offset + field.width - 1} fall outside the ${PAYLOAD_LENGTH}-byte payload`
    );
  }
  if (field.divisor !== undefined && !(Number.isFinite(field.divisor) && field.divisor > 0)) {
    throw new SchemaDefinitionError(`${where}: divisor must be a positive number, got ${field.divisor}`);
  }
}

/**
 * Throw SchemaDefinitionError if a schema is not decodable within one frame
 */
export function validateSchema(schema: EventSchema): void {
  if (!Number.isInteger(schema.id) || schema.id < 0 || schema.id > MAX_TYPE_ID) {
    throw new SchemaDefinitionError(`${schema.name}: type id must be in 0..${MAX_TYPE_ID}, got ${schema.id}`);
  }
  if (!schema.name) {
    throw new SchemaDefinitionError(`Schema for type id ${schema.id} has no name`);
  }

  const seen = new Set<string>();
  for (const field of schema.fields) {
    validateField(schema, field);
    if (seen.has(field.name)) {
      throw new SchemaDefinitionError(`${schema.name} (${schema.id}) declares field "${field.name}" twice`);
    }
    seen.add(field.name);
  }
}

/**
 * Bytes of payload a schema reads (the end of its furthest field)
 */
export function payloadExtent(schema: EventSchema): number {
  return schema.fields.reduce((end, field) => Math.max(end, field.offset + field.width), 0);
}
