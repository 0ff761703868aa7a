/**
 * Decoded pump event types
 */

import type { BuiltinEventKind, BuiltinSchemas } from "../schemas/catalog.js";
import type { FieldValues } from "../schemas/types.js";
import type { ResolvedTimestamp } from "../time/resolver.js";

/**
 * Fields every decoded event carries, taken from the frame header
 */
export interface EventBase {
  /** 12-bit event type id */
  typeId: number;
  /** Vendor event name, e.g. LID_CGM_DATA_GXB */
  name: string;
  /** 4-bit event source */
  source: number;
  /** Pump-assigned sequence number */
  sequenceNumber: number;
  timestamp: ResolvedTimestamp;
  /** Copy of the original frame bytes, when requested */
  raw?: Uint8Array;
}

/**
 * A decoded event of one built-in kind
 */
export type EventOfKind<K extends BuiltinEventKind> = EventBase & {
  kind: K;
  fields: FieldValues<BuiltinSchemas[K]>;
};

/**
 * Union of all built-in event variants, discriminated on `kind`
 */
export type BuiltinEvent = { [K in BuiltinEventKind]: EventOfKind<K> }[BuiltinEventKind];

/**
 * An event decoded with an externally supplied schema
 */
export interface ExternalEvent extends EventBase {
  kind: "external";
  fields: Readonly<Record<string, number>>;
}

export type DecodedEvent = BuiltinEvent | ExternalEvent;

/**
 * Event discriminator, including the external variant
 */
export type DecodedEventKind = DecodedEvent["kind"];
