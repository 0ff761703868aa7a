/**
 * Decoder configuration
 *
 * The only environment input is the zone pump wall clocks are read in.
 * It is loaded once per process and frozen.
 */

import { ConfigError } from "./errors.js";
import { DEFAULT_TIMEZONE, isValidTimeZone } from "./time/zone.js";

export interface DecoderConfig {
  /** IANA zone used to label pump wall-clock timestamps */
  readonly timeZone: string;
}

/**
 * Read decoder configuration from an environment map
 */
export function loadDecoderConfig(env: NodeJS.ProcessEnv = process.env): DecoderConfig {
  const timeZone = env.PUMP_TIMEZONE?.trim() || DEFAULT_TIMEZONE;
  if (!isValidTimeZone(timeZone)) {
    throw new ConfigError(`PUMP_TIMEZONE is not a valid IANA timezone: ${timeZone}`);
  }
  return Object.freeze({ timeZone });
}

let processConfig: DecoderConfig | undefined;

/**
 * Process-wide configuration, loaded from process.env on first use
 */
export function getDecoderConfig(): DecoderConfig {
  processConfig ??= loadDecoderConfig();
  return processConfig;
}
