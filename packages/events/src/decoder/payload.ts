/**
 * Payload decoding
 *
 * A single routine reads any schema's fields from the payload region; each
 * event kind is just that routine bound to its schema.
 */

import { MalformedPayloadError } from "../errors.js";
import type { DecodedEvent, DecodedEventKind, EventBase, EventOfKind, ExternalEvent } from "../models/events.js";
import type { FrameHeader } from "../models/frame.js";
import { BUILTIN_SCHEMAS, type BuiltinEventKind } from "../schemas/catalog.js";
import type { EventSchema, FieldSpec, FieldValues } from "../schemas/types.js";
import { payloadExtent } from "../schemas/validate.js";
import type { ResolvedTimestamp } from "../time/resolver.js";

/**
 * Turns the payload region of a frame into one DecodedEvent variant
 */
export interface PayloadDecoder<E extends EventBase & { kind: DecodedEventKind } = DecodedEvent> {
  readonly typeId: number;
  readonly name: string;
  readonly kind: E["kind"];
  readonly schema: EventSchema;
  decode(payload: Uint8Array, header: FrameHeader, timestamp: ResolvedTimestamp): E;
}

function readField(view: DataView, field: FieldSpec): number {
  let value: number;
  switch (field.encoding) {
    case "uint":
      value =
        field.width === 1
          ? view.getUint8(field.offset)
          : field.width === 2
            ? view.getUint16(field.offset, false)
            : view.getUint32(field.offset, false);
      break;
    case "int":
      value =
        field.width === 1
          ? view.getInt8(field.offset)
          : field.width === 2
            ? view.getInt16(field.offset, false)
            : view.getInt32(field.offset, false);
      break;
    case "float":
      value = view.getFloat32(field.offset, false);
      break;
  }
  return field.divisor === undefined ? value : value / field.divisor;
}

/**
 * Read every field a schema declares from a payload region
 */
export function readFields(schema: EventSchema, payload: Uint8Array): Record<string, number> {
  const required = payloadExtent(schema);
  if (payload.length < required) {
    throw new MalformedPayloadError(schema.id, required, payload.length);
  }

  const view = new DataView(payload.buffer, payload.byteOffset, payload.byteLength);
  const values: Record<string, number> = {};
  for (const field of schema.fields) {
    values[field.name] = readField(view, field);
  }
  return values;
}

function hasDeclaredFields<S extends EventSchema>(schema: S, values: object): values is FieldValues<S> {
  return schema.fields.every((field) => field.name in values);
}

/**
 * Decoder for one built-in kind
 */
export function definePayloadDecoder<K extends BuiltinEventKind>(kind: K): PayloadDecoder<EventOfKind<K>> {
  const schema = BUILTIN_SCHEMAS[kind];
  return {
    typeId: schema.id,
    name: schema.name,
    kind,
    schema,
    decode(payload, header, timestamp) {
      const values = readFields(schema, payload);
      if (!hasDeclaredFields(schema, values)) {
        throw new MalformedPayloadError(schema.id, payloadExtent(schema), payload.length);
      }
      return {
        kind,
        typeId: header.typeId,
        name: schema.name,
        source: header.source,
        sequenceNumber: header.sequenceNumber,
        timestamp,
        fields: values,
      };
    },
  };
}

/**
 * Decoder for an externally supplied schema
 */
export function defineExternalDecoder(schema: EventSchema): PayloadDecoder<ExternalEvent> {
  return {
    typeId: schema.id,
    name: schema.name,
    kind: "external",
    schema,
    decode(payload, header, timestamp) {
      return {
        kind: "external",
        typeId: header.typeId,
        name: schema.name,
        source: header.source,
        sequenceNumber: header.sequenceNumber,
        timestamp,
        fields: readFields(schema, payload),
      };
    },
  };
}
