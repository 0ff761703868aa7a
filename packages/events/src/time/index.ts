export {
  EPOCH_ORIGIN_SECONDS,
  resolveTimestamp,
  toInstant,
  formatTimestamp,
  secondsBetween,
  type ResolvedTimestamp,
} from "./resolver.js";

export {
  DEFAULT_TIMEZONE,
  isValidTimeZone,
  formatDateInTimezone,
  getZoneOffsetMinutes,
  wallClockToInstant,
  formatOffset,
} from "./zone.js";
