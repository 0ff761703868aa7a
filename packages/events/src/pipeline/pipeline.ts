/**
 * Event decode pipeline: base64 blob -> ordered sequence of typed events
 *
 * Used for live API responses and for re-decoding stored raw blobs; both
 * produce identical sequences for the same bytes.
 *
 * Failure policy: encoding errors are thrown immediately. Per-frame errors
 * (bad header, unknown type id, short payload) are skipped by default: each
 * is handed to onFrameFailure and decoding continues with the next frame.
 * With failurePolicy "abort" the first per-frame error is thrown instead.
 */

import { getDecoderConfig } from "../config.js";
import { getDefaultRegistry, type EventRegistry } from "../decoder/registry.js";
import { isFrameDecodeError, TruncatedFrameError, type FrameDecodeError } from "../errors.js";
import type { DecodedEvent } from "../models/events.js";
import { FRAME_LENGTH } from "../models/frame.js";
import { decodeFrameHeader, framePayload } from "../frames/header.js";
import { splitFrames, trailingByteCount } from "../frames/splitter.js";
import { resolveTimestamp } from "../time/resolver.js";
import { toEventBytes } from "./base64.js";

/**
 * What to do with a per-frame failure
 * - skip: report it and continue with the next frame
 * - abort: throw it, ending the sequence
 */
export type FailurePolicy = "skip" | "abort";

/**
 * What to do with bytes after the last whole frame
 * - drop: ignore them silently
 * - report: report a TruncatedFrameError as a failure (not fatal)
 * - error: throw TruncatedFrameError before decoding anything
 */
export type TrailingBytesPolicy = "drop" | "report" | "error";

/**
 * A frame that could not be decoded
 */
export interface FrameFailure {
  /** Index of the frame in the blob (frame count for trailing bytes) */
  frameIndex: number;
  /** Byte offset of the frame in the blob */
  offset: number;
  error: FrameDecodeError;
}

export interface DecodeOptions {
  /** Zone pump wall clocks are labelled with (default: PUMP_TIMEZONE) */
  timeZone?: string;
  registry?: EventRegistry;
  failurePolicy?: FailurePolicy;
  trailingBytes?: TrailingBytesPolicy;
  /** Attach a copy of each frame's bytes to its event */
  retainRaw?: boolean;
  /** Called for each skipped frame (default: console.warn) */
  onFrameFailure?: (failure: FrameFailure) => void;
}

/**
 * Result of decoding a whole blob
 */
export interface DecodeResult {
  events: DecodedEvent[];
  failures: FrameFailure[];
  /** Decoded events per vendor event name */
  counts: Record<string, number>;
  /** Bytes after the last whole frame */
  trailingBytes: number;
}

interface ResolvedOptions {
  timeZone: string;
  registry: EventRegistry;
  failurePolicy: FailurePolicy;
  trailingBytes: TrailingBytesPolicy;
  retainRaw: boolean;
  onFrameFailure: (failure: FrameFailure) => void;
}

function warnFrameFailure(failure: FrameFailure): void {
  console.warn(`Skipping frame ${failure.frameIndex} at byte ${failure.offset}: ${failure.error.message}`);
}

function resolveOptions(options: DecodeOptions): ResolvedOptions {
  return {
    timeZone: options.timeZone ?? getDecoderConfig().timeZone,
    registry: options.registry ?? getDefaultRegistry(),
    failurePolicy: options.failurePolicy ?? "skip",
    trailingBytes: options.trailingBytes ?? "report",
    retainRaw: options.retainRaw ?? false,
    onFrameFailure: options.onFrameFailure ?? warnFrameFailure,
  };
}

/**
 * Decode a single frame into its event
 */
export function decodeFrame(
  frame: Uint8Array,
  registry: EventRegistry,
  timeZone: string,
  retainRaw = false
): DecodedEvent {
  const header = decodeFrameHeader(frame);
  const decoder = registry.lookup(header.typeId);
  const timestamp = resolveTimestamp(header.rawTimestamp, timeZone);
  const event = decoder.decode(framePayload(frame), header, timestamp);
  if (retainRaw) {
    event.raw = frame.slice();
  }
  return event;
}

function* generateEvents(bytes: Uint8Array, options: ResolvedOptions): Generator<DecodedEvent> {
  const trailing = trailingByteCount(bytes);
  if (trailing > 0 && options.trailingBytes === "error") {
    throw new TruncatedFrameError(trailing, FRAME_LENGTH);
  }

  let frameIndex = 0;
  for (const frame of splitFrames(bytes)) {
    try {
      yield decodeFrame(frame, options.registry, options.timeZone, options.retainRaw);
    } catch (error: unknown) {
      if (!isFrameDecodeError(error) || options.failurePolicy === "abort") {
        throw error;
      }
      options.onFrameFailure({ frameIndex, offset: frameIndex * FRAME_LENGTH, error });
    }
    frameIndex++;
  }

  if (trailing > 0 && options.trailingBytes === "report") {
    const error = new TruncatedFrameError(trailing, FRAME_LENGTH);
    if (options.failurePolicy === "abort") {
      throw error;
    }
    options.onFrameFailure({ frameIndex, offset: frameIndex * FRAME_LENGTH, error });
  }
}

/**
 * Lazily decode an event blob.
 *
 * Base64 input is decoded (and validated) immediately; frames are decoded as
 * the sequence is iterated. The returned iterable can be iterated again and
 * yields the same events in the same order.
 */
export function decodeEvents(input: string | Uint8Array, options: DecodeOptions = {}): Iterable<DecodedEvent> {
  const bytes = toEventBytes(input);
  const resolved = resolveOptions(options);
  return {
    [Symbol.iterator]: () => generateEvents(bytes, resolved),
  };
}

/**
 * Decode a whole event blob, collecting events, failures and counts
 */
export function decodeEventBlob(input: string | Uint8Array, options: DecodeOptions = {}): DecodeResult {
  const failures: FrameFailure[] = [];
  const bytes = toEventBytes(input);
  const events = [
    ...decodeEvents(bytes, {
      ...options,
      onFrameFailure: (failure) => {
        failures.push(failure);
        options.onFrameFailure?.(failure);
      },
    }),
  ];

  const counts: Record<string, number> = {};
  for (const event of events) {
    counts[event.name] = (counts[event.name] ?? 0) + 1;
  }

  return { events, failures, counts, trailingBytes: trailingByteCount(bytes) };
}
