/**
 * Synthetic frame builders for tests
 */

import { encodeFrame } from "../frames/header.js";
import { PAYLOAD_LENGTH, type FrameHeader } from "../models/frame.js";
import { encodeBase64 } from "../pipeline/base64.js";

/**
 * Build a payload region by writing into a zeroed 16-byte view
 */
export function payload(write: (view: DataView) => void): Uint8Array {
  const bytes = new Uint8Array(PAYLOAD_LENGTH);
  write(new DataView(bytes.buffer));
  return bytes;
}

type HeaderInput = Partial<Omit<FrameHeader, "typeId">> & { rawTimestamp: number; sequenceNumber: number };

function header(typeId: number, input: HeaderInput): FrameHeader {
  return {
    source: input.source ?? 0,
    typeId,
    rawTimestamp: input.rawTimestamp,
    sequenceNumber: input.sequenceNumber,
  };
}

/**
 * LID_CGM_DATA_GXB frame (type 256)
 */
export function cgmFrame(input: HeaderInput & { glucose: number; rateTenths?: number; typeId?: number }): Uint8Array {
  return encodeFrame(
    header(input.typeId ?? 256, input),
    payload((view) => {
      view.setUint16(0, 0x0001, false);
      view.setInt8(3, input.rateTenths ?? 0);
      view.setUint16(6, input.glucose, false);
      view.setUint8(14, 5);
    })
  );
}

/**
 * LID_BASAL_DELIVERY frame (type 279); rates in milliunits/hour
 */
export function basalDeliveryFrame(
  input: HeaderInput & { profile: number; algorithm: number; temp: number; commanded: number }
): Uint8Array {
  return encodeFrame(
    header(279, input),
    payload((view) => {
      view.setUint16(0, 1, false);
      view.setUint16(4, input.profile, false);
      view.setUint16(6, input.algorithm, false);
      view.setUint16(8, input.temp, false);
      view.setUint16(10, input.commanded, false);
    })
  );
}

/**
 * LID_BOLUS_COMPLETED frame (type 20)
 */
export function bolusFrame(
  input: HeaderInput & { bolusId: number; delivered: number; requested: number; iob?: number }
): Uint8Array {
  return encodeFrame(
    header(20, input),
    payload((view) => {
      view.setUint16(0, 3, false);
      view.setUint16(2, input.bolusId, false);
      view.setFloat32(4, input.iob ?? 0, false);
      view.setFloat32(8, input.delivered, false);
      view.setFloat32(12, input.requested, false);
    })
  );
}

/**
 * Frame with an arbitrary type id and payload
 */
export function rawFrame(typeId: number, input: HeaderInput, body: Uint8Array = new Uint8Array(0)): Uint8Array {
  return encodeFrame(header(typeId, input), body);
}

/**
 * Join frames (and optional stray bytes) into one blob
 */
export function concatFrames(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const blob = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    blob.set(part, offset);
    offset += part.length;
  }
  return blob;
}

/**
 * Join frames and base64 encode them, as the vendor API returns them
 */
export function toBlob(...parts: Uint8Array[]): string {
  return encodeBase64(concatFrames(...parts));
}

/**
 * Run a function that is expected to throw and return what it threw
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error: unknown) {
    return error;
  }
  throw new Error("Expected function to throw");
}
