/**
 * Declarative payload layouts
 *
 * A schema lists where each field sits in the 16-byte payload region and
 * how to read it. One generic routine interprets every schema.
 */

/** Bytes a field occupies */
export type FieldWidth = 1 | 2 | 4;

/**
 * How a field's bytes are read (always big-endian)
 * - uint: unsigned integer
 * - int: two's complement signed integer
 * - float: IEEE-754 binary32, width 4 only
 */
export type FieldEncoding = "uint" | "int" | "float";

export interface FieldSpec {
  /** Property name on the decoded event's fields */
  readonly name: string;
  /** Byte offset within the payload region */
  readonly offset: number;
  readonly width: FieldWidth;
  readonly encoding: FieldEncoding;
  /** Fixed-point divisor; the read value is divided by this (e.g. 1000 for milliunits) */
  readonly divisor?: number;
}

export interface EventSchema {
  /** 12-bit type id from the frame header */
  readonly id: number;
  /** Vendor event name, e.g. LID_BASAL_RATE_CHANGE */
  readonly name: string;
  readonly fields: readonly FieldSpec[];
}

/**
 * Decoded field values keyed by the names a schema declares
 */
export type FieldValues<S extends EventSchema> = {
  readonly [N in S["fields"][number]["name"]]: number;
};
