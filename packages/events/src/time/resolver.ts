/**
 * Timestamp resolution for pump frames
 *
 * The pump counts seconds from its own epoch and encodes the user's local
 * wall clock with no zone attached. The wall-clock fields are computed in
 * UTC and the configured zone is attached as a label; they are never
 * converted into that zone.
 */

import { formatOffset, getZoneOffsetMinutes, wallClockToInstant } from "./zone.js";

/**
 * Pump epoch origin: 2008-01-01T00:00:00Z as Unix seconds
 */
export const EPOCH_ORIGIN_SECONDS = 1199145600;

/**
 * A pump timestamp: a naive wall clock plus the zone it belongs to
 */
export interface ResolvedTimestamp {
  /** Seconds since the pump epoch, as read from the frame */
  readonly raw: number;
  /** Wall clock as YYYY-MM-DDTHH:mm:ss, no offset */
  readonly wallClock: string;
  /** Wall clock as milliseconds, anchored to UTC (not a real instant) */
  readonly wallClockMs: number;
  /** IANA zone the wall clock is read in */
  readonly timeZone: string;
}

/**
 * Resolve a raw frame timestamp against the configured zone
 */
export function resolveTimestamp(raw: number, timeZone: string): ResolvedTimestamp {
  const wallClockMs = (EPOCH_ORIGIN_SECONDS + raw) * 1000;
  return Object.freeze({
    raw,
    wallClock: new Date(wallClockMs).toISOString().slice(0, 19),
    wallClockMs,
    timeZone,
  });
}

/**
 * The real instant (epoch ms) at which this wall clock occurred in its zone
 */
export function toInstant(timestamp: ResolvedTimestamp): number {
  return wallClockToInstant(timestamp.wallClockMs, timestamp.timeZone);
}

/**
 * ISO-8601 with the zone's offset, e.g. 2008-01-01T00:00:00-08:00
 */
export function formatTimestamp(timestamp: ResolvedTimestamp): string {
  const offset = getZoneOffsetMinutes(toInstant(timestamp), timestamp.timeZone);
  return `${timestamp.wallClock}${formatOffset(offset)}`;
}

/**
 * Wall-clock seconds elapsed from one timestamp to another
 */
export function secondsBetween(from: ResolvedTimestamp, to: ResolvedTimestamp): number {
  return to.raw - from.raw;
}
