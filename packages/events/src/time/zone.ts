/**
 * Timezone helpers built on Intl
 *
 * Pump timestamps carry no zone, so every conversion between a wall clock
 * and a real instant goes through the configured IANA zone.
 */

/**
 * Default zone for pump wall-clock times
 */
export const DEFAULT_TIMEZONE = "America/Los_Angeles";

/**
 * Check that a string names a timezone Intl understands
 */
export function isValidTimeZone(timeZone: string): boolean {
  if (!timeZone) return false;
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch (error: unknown) {
    if (error instanceof RangeError) return false;
    throw error;
  }
}

/**
 * Format a timestamp as YYYY-MM-DD in the given timezone
 */
export function formatDateInTimezone(timestampMs: number, timezone: string = DEFAULT_TIMEZONE): string {
  const formatter = new Intl.DateTimeFormat("en-CA", {
    timeZone: timezone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  });
  return formatter.format(new Date(timestampMs));
}

// One formatter per zone, built on first use
const offsetFormatters = new Map<string, Intl.DateTimeFormat>();

function offsetFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = offsetFormatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
    });
    offsetFormatters.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Offset of a zone from UTC at a given instant, in minutes (e.g. -480 for PST)
 */
export function getZoneOffsetMinutes(instantMs: number, timeZone: string): number {
  const parts = offsetFormatter(timeZone).formatToParts(new Date(instantMs));

  const part = (type: Intl.DateTimeFormatPartTypes): number =>
    parseInt(parts.find((p) => p.type === type)?.value ?? "0", 10);

  const localAsUtc = Date.UTC(
    part("year"),
    part("month") - 1,
    part("day"),
    part("hour"),
    part("minute"),
    part("second")
  );
  const wholeSecondInstant = Math.floor(instantMs / 1000) * 1000;

  return Math.round((localAsUtc - wholeSecondInstant) / 60_000);
}

/**
 * Find the instant at which a naive wall clock (given as UTC-anchored ms) occurs in a zone.
 *
 * The offset is evaluated twice so wall clocks just after a DST switch land
 * on the right side of it. Wall clocks inside a spring-forward gap resolve
 * using the pre-transition offset.
 */
export function wallClockToInstant(wallClockMs: number, timeZone: string): number {
  const firstOffset = getZoneOffsetMinutes(wallClockMs, timeZone);
  const guess = wallClockMs - firstOffset * 60_000;
  const secondOffset = getZoneOffsetMinutes(guess, timeZone);
  if (secondOffset === firstOffset) return guess;

  const adjusted = wallClockMs - secondOffset * 60_000;
  return getZoneOffsetMinutes(adjusted, timeZone) === secondOffset ? adjusted : guess;
}

/**
 * Render an offset in minutes as ±HH:MM
 */
export function formatOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? "-" : "+";
  const abs = Math.abs(offsetMinutes);
  const hours = Math.floor(abs / 60).toString().padStart(2, "0");
  const minutes = (abs % 60).toString().padStart(2, "0");
  return `${sign}${hours}:${minutes}`;
}
