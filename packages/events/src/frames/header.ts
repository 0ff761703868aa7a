/**
 * Common frame header codec
 */

import { MalformedHeaderError } from "../errors.js";
import {
  FRAME_LENGTH,
  HEADER_LENGTH,
  MAX_SOURCE,
  MAX_TYPE_ID,
  PAYLOAD_LENGTH,
  type FrameHeader,
  type RawFrame,
} from "../models/frame.js";

const UINT32_MAX = 0xffffffff;

/**
 * Parse the header fields from the start of a frame (big-endian)
 */
export function decodeFrameHeader(frame: Uint8Array): FrameHeader {
  if (frame.length < HEADER_LENGTH) {
    throw new MalformedHeaderError(frame.length, HEADER_LENGTH);
  }
  const view = new DataView(frame.buffer, frame.byteOffset, frame.byteLength);
  const sourceAndType = view.getUint16(0, false);

  return {
    source: sourceAndType >> 12,
    typeId: sourceAndType & MAX_TYPE_ID,
    rawTimestamp: view.getUint32(2, false),
    sequenceNumber: view.getUint32(6, false),
  };
}

/**
 * The payload region of a frame (everything after the header)
 */
export function framePayload(frame: Uint8Array): Uint8Array {
  return frame.subarray(HEADER_LENGTH);
}

function assertRange(name: string, value: number, max: number): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new RangeError(`${name} must be an integer in 0..${max}, got ${value}`);
  }
}

/**
 * Build a frame from header fields and payload bytes.
 * Payloads shorter than the payload region are zero padded.
 */
export function encodeFrame(header: FrameHeader, payload: Uint8Array = new Uint8Array(0)): RawFrame {
  assertRange("source", header.source, MAX_SOURCE);
  assertRange("typeId", header.typeId, MAX_TYPE_ID);
  assertRange("rawTimestamp", header.rawTimestamp, UINT32_MAX);
  assertRange("sequenceNumber", header.sequenceNumber, UINT32_MAX);
  if (payload.length > PAYLOAD_LENGTH) {
    throw new RangeError(`Payload must be at most ${PAYLOAD_LENGTH} bytes, got ${payload.length}`);
  }

  const frame = new Uint8Array(FRAME_LENGTH);
  const view = new DataView(frame.buffer);
  view.setUint16(0, (header.source << 12) | header.typeId, false);
  view.setUint32(2, header.rawTimestamp, false);
  view.setUint32(6, header.sequenceNumber, false);
  frame.set(payload, HEADER_LENGTH);
  return frame;
}
