import { describe, it, expect } from "vitest";
import { validateSchema, payloadExtent } from "./validate.js";
import { BUILTIN_SCHEMAS, BUILTIN_EVENT_KINDS, isBuiltinEventKind } from "./catalog.js";
import { SchemaDefinitionError } from "../errors.js";
import type { EventSchema, FieldSpec } from "./types.js";

function schemaWith(...fields: FieldSpec[]): EventSchema {
  return { id: 90, name: "LID_TEST", fields };
}

describe("validateSchema", () => {
  it("accepts every built-in schema", () => {
    for (const kind of BUILTIN_EVENT_KINDS) {
      expect(() => validateSchema(BUILTIN_SCHEMAS[kind])).not.toThrow();
    }
  });

  it("accepts a field ending exactly at the payload boundary", () => {
    expect(() => validateSchema(schemaWith({ name: "tail", offset: 12, width: 4, encoding: "uint" }))).not.toThrow();
  });

  it("rejects a field that reads past the payload", () => {
    expect(() => validateSchema(schemaWith({ name: "tail", offset: 13, width: 4, encoding: "uint" }))).toThrow(
      'LID_TEST (90) field "tail": bytes 13..16 fall outside the 16-byte payload'
    );
  });

  it("rejects floats narrower than four bytes", () => {
    expect(() => validateSchema(schemaWith({ name: "f", offset: 0, width: 2, encoding: "float" }))).toThrow(
      SchemaDefinitionError
    );
  });

  it("rejects negative or fractional offsets", () => {
    expect(() => validateSchema(schemaWith({ name: "a", offset: -1, width: 1, encoding: "uint" }))).toThrow(
      SchemaDefinitionError
    );
    expect(() => validateSchema(schemaWith({ name: "a", offset: 1.5, width: 1, encoding: "uint" }))).toThrow(
      SchemaDefinitionError
    );
  });

  it("rejects a zero or negative divisor", () => {
    expect(() =>
      validateSchema(schemaWith({ name: "a", offset: 0, width: 2, encoding: "uint", divisor: 0 }))
    ).toThrow("divisor must be a positive number, got 0");
  });

  it("rejects duplicate field names", () => {
    expect(() =>
      validateSchema(
        schemaWith(
          { name: "a", offset: 0, width: 1, encoding: "uint" },
          { name: "a", offset: 1, width: 1, encoding: "uint" }
        )
      )
    ).toThrow('LID_TEST (90) declares field "a" twice');
  });

  it("rejects type ids outside 12 bits and empty names", () => {
    expect(() => validateSchema({ id: 4096, name: "LID_BIG", fields: [] })).toThrow(
      "LID_BIG: type id must be in 0..4095, got 4096"
    );
    expect(() => validateSchema({ id: 5, name: "", fields: [] })).toThrow("Schema for type id 5 has no name");
  });
});

describe("payloadExtent", () => {
  it("is the end of the furthest field", () => {
    expect(payloadExtent(BUILTIN_SCHEMAS.pumpingResumed)).toBe(6);
    expect(payloadExtent(BUILTIN_SCHEMAS.basalRateChange)).toBe(16);
    expect(payloadExtent(schemaWith())).toBe(0);
  });
});

describe("isBuiltinEventKind", () => {
  it("recognises catalogue keys only", () => {
    expect(isBuiltinEventKind("cgmDataG7")).toBe(true);
    expect(isBuiltinEventKind("external")).toBe(false);
    expect(isBuiltinEventKind("toString")).toBe(false);
  });
});
