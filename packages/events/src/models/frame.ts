/**
 * Binary frame layout shared by every pump event
 *
 * | bytes | field                                        |
 * |-------|----------------------------------------------|
 * | 0-1   | u16 BE: source (high nibble), type id (12 b) |
 * | 2-5   | u32 BE: seconds since the pump epoch         |
 * | 6-9   | u32 BE: sequence number                      |
 * | 10-25 | payload, layout depends on type id           |
 */

/** Total bytes per frame */
export const FRAME_LENGTH = 26;

/** Bytes of common header at the start of every frame */
export const HEADER_LENGTH = 10;

/** Bytes of type-specific payload after the header */
export const PAYLOAD_LENGTH = FRAME_LENGTH - HEADER_LENGTH;

/** Largest source value (4 bits) */
export const MAX_SOURCE = 0xf;

/** Largest type id (12 bits) */
export const MAX_TYPE_ID = 0xfff;

/**
 * One fixed-length frame as sliced from an event blob. Never mutated.
 */
export type RawFrame = Uint8Array;

/**
 * Fields common to every frame
 */
export interface FrameHeader {
  /** 4-bit source of the event */
  source: number;
  /** 12-bit event type id */
  typeId: number;
  /** Seconds since the pump epoch */
  rawTimestamp: number;
  /** Pump-assigned sequence number */
  sequenceNumber: number;
}
