/**
 * Combining event batches from overlapping fetches
 *
 * Frame order is only meaningful within one blob. Re-run or overlapping
 * fetches repeat events, so batches are merged on the pump's own identity
 * for an event: its source and sequence number.
 */

import { createHash } from "crypto";
import type { DecodedEvent } from "../models/events.js";

/**
 * Identity of an event across fetches
 */
export function eventKey(event: DecodedEvent): string {
  return `${event.source}:${event.sequenceNumber}`;
}

/**
 * Short content hash of an event, for detecting a sequence number reused
 * with different content
 */
export function generateEventHash(event: DecodedEvent): string {
  const fields = Object.entries(event.fields)
    .map(([name, value]) => `${name}=${value}`)
    .join(",");
  const hashInput = `${event.typeId}:${event.source}:${event.sequenceNumber}:${event.timestamp.raw}:${fields}`;
  return createHash("sha256").update(hashInput).digest("hex").substring(0, 12);
}

/**
 * Merge batches, keeping the first occurrence of each event, ordered by sequence number
 */
export function mergeEventBatches(...batches: Iterable<DecodedEvent>[]): DecodedEvent[] {
  const seen = new Set<string>();
  const merged: DecodedEvent[] = [];

  for (const batch of batches) {
    for (const event of batch) {
      const key = eventKey(event);
      if (seen.has(key)) continue;
      seen.add(key);
      merged.push(event);
    }
  }

  return merged.sort((a, b) => a.sequenceNumber - b.sequenceNumber || a.source - b.source);
}
