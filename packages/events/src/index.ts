/**
 * @pumplog/events
 *
 * Decoder for insulin-pump binary event logs, plus the transforms that
 * turn decoded events into glucose and insulin records
 *
 * @example
 * ```typescript
 * import { decodeEventBlob, extractRecords, serializeEvent } from "@pumplog/events";
 *
 * const { events, failures } = decodeEventBlob(responseBody, { timeZone: "America/Chicago" });
 * const { records } = extractRecords(events);
 * ```
 */

// Errors
export * from "./errors.js";

// Configuration
export { loadDecoderConfig, getDecoderConfig, type DecoderConfig } from "./config.js";

// Models - Type definitions
export * from "./models/index.js";

// Frames - Splitting and header codec
export * from "./frames/index.js";

// Time - Timestamp resolution and zone helpers
export * from "./time/index.js";

// Schemas - Declarative payload layouts
export * from "./schemas/index.js";

// Decoder - Payload decoders and registry
export * from "./decoder/index.js";

// Pipeline - Blob to event sequence
export * from "./pipeline/index.js";

// Transforms - Records, serialization, batch merging
export * from "./transforms/index.js";
