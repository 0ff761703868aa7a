/**
 * Slice an event blob into fixed-size frames
 */

import { FRAME_LENGTH, type RawFrame } from "../models/frame.js";

/**
 * Yield consecutive, non-overlapping frames in input order.
 *
 * Trailing bytes that do not fill a whole frame are never yielded; callers
 * decide what to do about them via trailingByteCount(). Frames are views
 * into the input buffer.
 */
export function* splitFrames(bytes: Uint8Array, frameLength: number = FRAME_LENGTH): Generator<RawFrame> {
  if (!Number.isInteger(frameLength) || frameLength <= 0) {
    throw new RangeError(`Frame length must be a positive integer, got ${frameLength}`);
  }
  const whole = bytes.length - (bytes.length % frameLength);
  for (let offset = 0; offset < whole; offset += frameLength) {
    yield bytes.subarray(offset, offset + frameLength);
  }
}

/**
 * Number of whole frames in a buffer
 */
export function frameCount(bytes: Uint8Array, frameLength: number = FRAME_LENGTH): number {
  return Math.floor(bytes.length / frameLength);
}

/**
 * Bytes left over after the last whole frame
 */
export function trailingByteCount(bytes: Uint8Array, frameLength: number = FRAME_LENGTH): number {
  return bytes.length % frameLength;
}
