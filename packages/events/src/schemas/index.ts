export type { FieldWidth, FieldEncoding, FieldSpec, EventSchema, FieldValues } from "./types.js";
export {
  BUILTIN_SCHEMAS,
  BUILTIN_EVENT_KINDS,
  CGM_EVENT_KINDS,
  isBuiltinEventKind,
  type BuiltinSchemas,
  type BuiltinEventKind,
} from "./catalog.js";
export { validateSchema, payloadExtent } from "./validate.js";
export { parseSchemaCatalog } from "./external.js";
