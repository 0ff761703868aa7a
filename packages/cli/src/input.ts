/**
 * Reading event blobs and schema catalogues from files or stdin
 */

import { readFileSync } from "fs";
import { InvalidEncodingError, parseSchemaCatalog, type EventSchema } from "@pumplog/events";

const STDIN_FD = 0;

export interface InputOptions {
  /** Treat the input as raw frame bytes rather than base64 text */
  binary?: boolean;
}

/**
 * Extract the base64 text from an input file.
 * API responses arrive as a JSON string, so a quoted value is unwrapped.
 */
export function parseBlobText(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith('"')) return trimmed;

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch (error: unknown) {
    throw new InvalidEncodingError("Input starts with a quote but is not a JSON string", { cause: error });
  }
  if (typeof parsed !== "string") {
    throw new InvalidEncodingError("Input starts with a quote but is not a JSON string");
  }
  return parsed;
}

/**
 * Read an event blob from a file, or stdin when no file is given
 */
export function readEventInput(file: string | undefined, options: InputOptions = {}): string | Uint8Array {
  const data = readFileSync(file ?? STDIN_FD);
  return options.binary ? data : parseBlobText(data.toString("utf-8"));
}

/**
 * Load a JSON schema catalogue from disk
 */
export function readSchemaCatalog(path: string): EventSchema[] {
  return parseSchemaCatalog(readFileSync(path, "utf-8"));
}
