import { describe, it, expect, vi, beforeEach } from "vitest";
import { readFileSync } from "fs";
import { InvalidEncodingError } from "@pumplog/events";
import { parseBlobText, readEventInput, readSchemaCatalog } from "./input.js";

vi.mock("fs", () => ({
  readFileSync: vi.fn(),
}));

describe("parseBlobText", () => {
  it("trims plain base64 text", () => {
    expect(parseBlobText("  AAEC\n")).toBe("AAEC");
  });

  it("unwraps a JSON string", () => {
    expect(parseBlobText('"AAEC"\n')).toBe("AAEC");
  });

  it("rejects a malformed JSON string", () => {
    expect(() => parseBlobText('"AAEC')).toThrow(InvalidEncodingError);
  });
});

describe("readEventInput", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("reads base64 text from a file", () => {
    vi.mocked(readFileSync).mockReturnValue(Buffer.from('"AAEC"'));
    expect(readEventInput("blob.json")).toBe("AAEC");
    expect(readFileSync).toHaveBeenCalledWith("blob.json");
  });

  it("reads stdin when no file is given", () => {
    vi.mocked(readFileSync).mockReturnValue(Buffer.from("AQID\n"));
    expect(readEventInput(undefined)).toBe("AQID");
    expect(readFileSync).toHaveBeenCalledWith(0);
  });

  it("returns the bytes untouched in binary mode", () => {
    const data = Buffer.from([1, 2, 3]);
    vi.mocked(readFileSync).mockReturnValue(data);
    expect(readEventInput("blob.bin", { binary: true })).toBe(data);
  });
});

describe("readSchemaCatalog", () => {
  it("parses the catalogue file", () => {
    vi.mocked(readFileSync).mockReturnValue('[{"id": 90, "name": "LID_X", "fields": []}]');
    expect(readSchemaCatalog("schemas.json")).toEqual([{ id: 90, name: "LID_X", fields: [] }]);
    expect(readFileSync).toHaveBeenCalledWith("schemas.json", "utf-8");
  });
});
