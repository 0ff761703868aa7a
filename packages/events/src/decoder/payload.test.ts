import { describe, it, expect } from "vitest";
import { readFields, definePayloadDecoder, defineExternalDecoder, type PayloadDecoder } from "./payload.js";
import { MalformedPayloadError } from "../errors.js";
import { resolveTimestamp } from "../time/resolver.js";
import { captureError, payload } from "../testing/fixtures.js";
import type { EventSchema } from "../schemas/types.js";

const MIXED: EventSchema = {
  id: 90,
  name: "LID_MIXED",
  fields: [
    { name: "u8", offset: 0, width: 1, encoding: "uint" },
    { name: "i8", offset: 1, width: 1, encoding: "int" },
    { name: "u16", offset: 2, width: 2, encoding: "uint" },
    { name: "i16", offset: 4, width: 2, encoding: "int" },
    { name: "u32", offset: 6, width: 4, encoding: "uint" },
    { name: "f32", offset: 10, width: 4, encoding: "float" },
    { name: "scaled", offset: 14, width: 2, encoding: "uint", divisor: 100 },
  ],
};

describe("readFields", () => {
  it("reads every encoding big-endian", () => {
    const body = payload((view) => {
      view.setUint8(0, 200);
      view.setInt8(1, -3);
      view.setUint16(2, 0xbeef, false);
      view.setInt16(4, -1234, false);
      view.setUint32(6, 0xdeadbeef, false);
      view.setFloat32(10, -0.5, false);
      view.setUint16(14, 1250, false);
    });

    expect(readFields(MIXED, body)).toEqual({
      u8: 200,
      i8: -3,
      u16: 0xbeef,
      i16: -1234,
      u32: 0xdeadbeef,
      f32: -0.5,
      scaled: 12.5,
    });
  });

  it("reads from a view into a larger buffer", () => {
    const frame = new Uint8Array(26);
    frame[10] = 7;
    const schema: EventSchema = { id: 1, name: "LID_ONE", fields: [{ name: "a", offset: 0, width: 1, encoding: "uint" }] };
    expect(readFields(schema, frame.subarray(10))).toEqual({ a: 7 });
  });

  it("throws MalformedPayloadError when the payload is too short", () => {
    const error = captureError(() => readFields(MIXED, new Uint8Array(8)));
    expect(error).toBeInstanceOf(MalformedPayloadError);
    expect(error).toMatchObject({ typeId: 90, required: 16, available: 8 });
  });
});

describe("definePayloadDecoder", () => {
  const header = { source: 1, typeId: 20, rawTimestamp: 60, sequenceNumber: 9 };
  const timestamp = resolveTimestamp(60, "UTC");

  it("binds a built-in kind to its schema", () => {
    const decoder = definePayloadDecoder("bolusCompleted");
    expect(decoder.typeId).toBe(20);
    expect(decoder.name).toBe("LID_BOLUS_COMPLETED");
    expect(decoder.kind).toBe("bolusCompleted");
  });

  it("can be used wherever a general decoder is expected", () => {
    const decoder: PayloadDecoder = definePayloadDecoder("cgmDataG7");
    const event = decoder.decode(payload((view) => view.setUint16(6, 140, false)), header, timestamp);
    expect(event.kind).toBe("cgmDataG7");
    expect(event.fields).toMatchObject({ currentGlucoseDisplayValue: 140 });
  });

  it("decodes a payload into a typed event", () => {
    const body = payload((view) => {
      view.setUint16(0, 3, false);
      view.setUint16(2, 77, false);
      view.setFloat32(4, 1.5, false);
      view.setFloat32(8, 2.25, false);
      view.setFloat32(12, 3, false);
    });

    const event = definePayloadDecoder("bolusCompleted").decode(body, header, timestamp);
    expect(event.fields.insulinDelivered).toBe(2.25);
    expect(event).toEqual({
      kind: "bolusCompleted",
      typeId: 20,
      name: "LID_BOLUS_COMPLETED",
      source: 1,
      sequenceNumber: 9,
      timestamp,
      fields: {
        completionStatus: 3,
        bolusId: 77,
        insulinOnBoard: 1.5,
        insulinDelivered: 2.25,
        insulinRequested: 3,
      },
    });
  });
});

describe("defineExternalDecoder", () => {
  it("decodes with a runtime schema as kind external", () => {
    const decoder = defineExternalDecoder(MIXED);
    const event = decoder.decode(
      payload((view) => view.setUint8(0, 42)),
      { source: 0, typeId: 90, rawTimestamp: 0, sequenceNumber: 1 },
      resolveTimestamp(0, "UTC")
    );

    expect(decoder.kind).toBe("external");
    expect(event.kind).toBe("external");
    expect(event.name).toBe("LID_MIXED");
    expect(event.fields.u8).toBe(42);
    expect(event.fields.scaled).toBe(0);
  });
});
