import { describe, it, expect } from "vitest";
import { serializeEvent, redecodeSerializedEvent } from "./serialize.js";
import { decodeEventBlob } from "../pipeline/pipeline.js";
import { encodeBase64 } from "../pipeline/base64.js";
import { InvalidEncodingError, UnknownEventTypeError } from "../errors.js";
import { bolusFrame, cgmFrame, rawFrame } from "../testing/fixtures.js";

const TZ = "America/Los_Angeles";

describe("serializeEvent", () => {
  it("produces plain JSON values", () => {
    const frame = bolusFrame({ rawTimestamp: 0, sequenceNumber: 7, source: 2, bolusId: 4, delivered: 1.5, requested: 2 });
    const [event] = decodeEventBlob(frame, { timeZone: TZ }).events;

    expect(serializeEvent(event)).toEqual({
      kind: "bolusCompleted",
      typeId: 20,
      name: "LID_BOLUS_COMPLETED",
      source: 2,
      sequenceNumber: 7,
      timestamp: "2008-01-01T00:00:00-08:00",
      wallClock: "2008-01-01T00:00:00",
      timeZone: TZ,
      rawTimestamp: 0,
      fields: {
        completionStatus: 3,
        bolusId: 4,
        insulinOnBoard: 0,
        insulinDelivered: 1.5,
        insulinRequested: 2,
      },
    });
  });

  it("survives a JSON round trip unchanged", () => {
    const [event] = decodeEventBlob(cgmFrame({ rawTimestamp: 100, sequenceNumber: 1, glucose: 110 }), {
      timeZone: TZ,
      retainRaw: true,
    }).events;
    const serialized = serializeEvent(event);
    expect(JSON.parse(JSON.stringify(serialized))).toEqual(serialized);
  });

  it("includes the raw frame as base64 when retained", () => {
    const frame = cgmFrame({ rawTimestamp: 100, sequenceNumber: 1, glucose: 110 });
    const [event] = decodeEventBlob(frame, { timeZone: TZ, retainRaw: true }).events;
    expect(serializeEvent(event).raw).toBe(encodeBase64(frame));
  });

  it("omits raw when not retained", () => {
    const [event] = decodeEventBlob(cgmFrame({ rawTimestamp: 100, sequenceNumber: 1, glucose: 110 }), {
      timeZone: TZ,
    }).events;
    expect(serializeEvent(event)).not.toHaveProperty("raw");
  });
});

describe("redecodeSerializedEvent", () => {
  const frame = cgmFrame({ rawTimestamp: 100, sequenceNumber: 1, glucose: 110, rateTenths: -4 });
  const [original] = decodeEventBlob(frame, { timeZone: TZ, retainRaw: true }).events;
  const stored = serializeEvent(original);

  it("reproduces the original event from its stored frame", () => {
    expect(redecodeSerializedEvent(stored)).toEqual(original);
  });

  it("can relabel the wall clock with another zone", () => {
    const event = redecodeSerializedEvent(stored, { timeZone: "UTC" });
    expect(event.timestamp.wallClock).toBe("2008-01-01T00:01:40");
    expect(event.timestamp.timeZone).toBe("UTC");
  });

  it("requires a stored frame", () => {
    const withoutRaw = { ...stored, raw: undefined };
    expect(() => redecodeSerializedEvent(withoutRaw)).toThrow(InvalidEncodingError);
    expect(() => redecodeSerializedEvent(withoutRaw)).toThrow("Stored event 1 has no raw frame to re-decode");
  });

  it("raises frame errors for a frame the registry does not know", () => {
    const unknown = encodeBase64(rawFrame(0xfff, { rawTimestamp: 0, sequenceNumber: 2 }));
    expect(() => redecodeSerializedEvent({ ...stored, raw: unknown })).toThrow(UnknownEventTypeError);
  });
});
