/**
 * @pumplog/events - Models
 *
 * Type definitions for frames, decoded events and extracted records
 */

// Frame layout
export {
  FRAME_LENGTH,
  HEADER_LENGTH,
  PAYLOAD_LENGTH,
  MAX_SOURCE,
  MAX_TYPE_ID,
  type RawFrame,
  type FrameHeader,
} from "./frame.js";

// Decoded events
export type {
  EventBase,
  EventOfKind,
  BuiltinEvent,
  ExternalEvent,
  DecodedEvent,
  DecodedEventKind,
} from "./events.js";

// Extracted records
export type { BaseRecord } from "./base.js";
export type { CgmReading } from "./glucose.js";
export type { BolusRecord, BasalRecord, InsulinRecord } from "./insulin.js";
export type { PumpRecord, PumpRecordType } from "./records.js";
export { RECORD_TYPES } from "./records.js";
