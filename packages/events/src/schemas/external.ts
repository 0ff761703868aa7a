/**
 * External schema catalogues
 *
 * Vendor layouts beyond the built-ins are configuration data: a JSON array
 * of schemas, e.g.
 *
 * ```json
 * [{ "id": 90, "name": "LID_NEW_DAY", "fields": [
 *   { "name": "commandedBasalRate", "offset": 0, "width": 4, "encoding": "float" }
 * ] }]
 * ```
 */

import { SchemaDefinitionError } from "../errors.js";
import type { EventSchema, FieldEncoding, FieldSpec, FieldWidth } from "./types.js";
import { validateSchema } from "./validate.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFieldWidth(value: unknown): value is FieldWidth {
  return value === 1 || value === 2 || value === 4;
}

function isFieldEncoding(value: unknown): value is FieldEncoding {
  return value === "uint" || value === "int" || value === "float";
}

function parseField(value: unknown, context: string): FieldSpec {
  if (!isRecord(value)) {
    throw new SchemaDefinitionError(`${context}: field must be an object`);
  }
  const { name, offset, width, encoding, divisor } = value;
  if (typeof name !== "string" || typeof offset !== "number") {
    throw new SchemaDefinitionError(`${context}: field needs a string name and numeric offset`);
  }
  if (!isFieldWidth(width)) {
    throw new SchemaDefinitionError(`${context} field "${name}": width must be 1, 2 or 4`);
  }
  if (!isFieldEncoding(encoding)) {
    throw new SchemaDefinitionError(`${context} field "${name}": encoding must be uint, int or float`);
  }
  if (divisor !== undefined && typeof divisor !== "number") {
    throw new SchemaDefinitionError(`${context} field "${name}": divisor must be a number`);
  }
  return divisor === undefined
    ? { name, offset, width, encoding }
    : { name, offset, width, encoding, divisor };
}

function parseSchema(value: unknown, index: number): EventSchema {
  const context = `Schema #${index}`;
  if (!isRecord(value)) {
    throw new SchemaDefinitionError(`${context}: expected an object`);
  }
  const { id, name, fields } = value;
  if (typeof id !== "number" || typeof name !== "string" || !Array.isArray(fields)) {
    throw new SchemaDefinitionError(`${context}: expected numeric id, string name and fields array`);
  }
  const schema: EventSchema = {
    id,
    name,
    fields: fields.map((field: unknown) => parseField(field, `${context} (${name})`)),
  };
  validateSchema(schema);
  return schema;
}

/**
 * Parse and validate a JSON schema catalogue
 */
export function parseSchemaCatalog(json: string): EventSchema[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error: unknown) {
    throw new SchemaDefinitionError("Schema catalogue is not valid JSON", { cause: error });
  }
  if (!Array.isArray(parsed)) {
    throw new SchemaDefinitionError("Schema catalogue must be a JSON array of schemas");
  }
  return parsed.map((schema: unknown, index) => parseSchema(schema, index));
}
