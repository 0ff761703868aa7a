import { describe, it, expect } from "vitest";
import { decodeBase64, encodeBase64, toEventBytes } from "./base64.js";
import { InvalidEncodingError } from "../errors.js";

describe("decodeBase64", () => {
  it("decodes padded and unpadded groups", () => {
    expect(Array.from(decodeBase64("AAEC"))).toEqual([0, 1, 2]);
    expect(Array.from(decodeBase64("AAE="))).toEqual([0, 1]);
    expect(Array.from(decodeBase64(""))).toEqual([]);
  });

  it("ignores line breaks and spaces", () => {
    expect(Array.from(decodeBase64("AA\r\nEC "))).toEqual([0, 1, 2]);
  });

  it("rejects characters outside the alphabet", () => {
    expect(() => decodeBase64("AA$C")).toThrow(InvalidEncodingError);
    expect(() => decodeBase64("AA-_")).toThrow("Event blob contains characters outside the base64 alphabet");
  });

  it("rejects input whose length is not a multiple of four", () => {
    expect(() => decodeBase64("AAE")).toThrow("Event blob length 3 is not a multiple of 4");
  });
});

describe("encodeBase64", () => {
  it("encodes only the bytes of the view", () => {
    const bytes = new Uint8Array([9, 0, 1, 2, 9]);
    expect(encodeBase64(bytes.subarray(1, 4))).toBe("AAEC");
  });
});

describe("toEventBytes", () => {
  it("passes bytes through and decodes strings", () => {
    const bytes = new Uint8Array([1, 2, 3]);
    expect(toEventBytes(bytes)).toBe(bytes);
    expect(Array.from(toEventBytes("AQID"))).toEqual([1, 2, 3]);
  });
});
