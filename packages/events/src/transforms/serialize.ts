/**
 * JSON-safe form of decoded events, as handed to persistence
 */

import { getDecoderConfig } from "../config.js";
import { getDefaultRegistry, type EventRegistry } from "../decoder/registry.js";
import { InvalidEncodingError } from "../errors.js";
import type { DecodedEvent, DecodedEventKind } from "../models/events.js";
import { decodeFrame } from "../pipeline/pipeline.js";
import { decodeBase64, encodeBase64 } from "../pipeline/base64.js";
import { formatTimestamp } from "../time/resolver.js";

export interface SerializedEvent {
  kind: DecodedEventKind;
  typeId: number;
  name: string;
  source: number;
  sequenceNumber: number;
  /** ISO-8601 with the zone's offset */
  timestamp: string;
  /** Naive wall clock, YYYY-MM-DDTHH:mm:ss */
  wallClock: string;
  timeZone: string;
  /** Seconds since the pump epoch */
  rawTimestamp: number;
  fields: Record<string, number>;
  /** Base64 of the original frame, when it was retained */
  raw?: string;
}

/**
 * Convert an event to plain JSON values
 */
export function serializeEvent(event: DecodedEvent): SerializedEvent {
  const serialized: SerializedEvent = {
    kind: event.kind,
    typeId: event.typeId,
    name: event.name,
    source: event.source,
    sequenceNumber: event.sequenceNumber,
    timestamp: formatTimestamp(event.timestamp),
    wallClock: event.timestamp.wallClock,
    timeZone: event.timestamp.timeZone,
    rawTimestamp: event.timestamp.raw,
    fields: { ...event.fields },
  };
  if (event.raw) {
    serialized.raw = encodeBase64(event.raw);
  }
  return serialized;
}

export interface RedecodeOptions {
  registry?: EventRegistry;
  /** Zone to label the wall clock with (default: the serialized event's zone) */
  timeZone?: string;
}

/**
 * Decode a stored event again from its retained raw frame.
 * Throws InvalidEncodingError if no frame was retained, or any frame-level error.
 */
export function redecodeSerializedEvent(serialized: SerializedEvent, options: RedecodeOptions = {}): DecodedEvent {
  if (serialized.raw === undefined) {
    throw new InvalidEncodingError(`Stored event ${serialized.sequenceNumber} has no raw frame to re-decode`);
  }
  return decodeFrame(
    decodeBase64(serialized.raw),
    options.registry ?? getDefaultRegistry(),
    options.timeZone ?? (serialized.timeZone || getDecoderConfig().timeZone),
    true
  );
}
