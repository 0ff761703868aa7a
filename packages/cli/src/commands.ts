/**
 * Command implementations
 *
 * Each command returns its output lines instead of printing them, so the
 * commander wiring in cli.ts stays thin.
 */

import {
  ConfigError,
  EventRegistry,
  RECORD_TYPES,
  decodeEventBlob,
  extractRecords,
  formatDateInTimezone,
  getDecoderConfig,
  isValidTimeZone,
  serializeEvent,
  type DecodeResult,
  type EventSchema,
  type FailurePolicy,
  type PumpRecord,
  type TrailingBytesPolicy,
} from "@pumplog/events";

const TRAILING_POLICIES = ["drop", "report", "error"] as const satisfies readonly TrailingBytesPolicy[];

/**
 * Options shared by commands that decode a blob, as commander parses them
 */
export interface DecodeCommandOptions {
  tz?: string;
  schemas?: string;
  strict?: boolean;
  trailing?: string;
  includeRaw?: boolean;
  binary?: boolean;
}

export interface RecordsCommandOptions extends DecodeCommandOptions {
  serial?: string;
}

/**
 * Resolved decode settings
 */
export interface DecodeContext {
  registry: EventRegistry;
  timeZone: string;
  failurePolicy: FailurePolicy;
  trailingBytes: TrailingBytesPolicy;
  retainRaw: boolean;
}

export interface CommandOutput {
  stdout: string[];
  stderr: string[];
  exitCode: number;
}

function isTrailingBytesPolicy(value: string): value is TrailingBytesPolicy {
  return TRAILING_POLICIES.some((policy) => policy === value);
}

/**
 * Build decode settings from command options and any external schemas
 */
export function createDecodeContext(
  options: DecodeCommandOptions,
  external: readonly EventSchema[] = []
): DecodeContext {
  const timeZone = options.tz ?? getDecoderConfig().timeZone;
  if (!isValidTimeZone(timeZone)) {
    throw new ConfigError(`--tz is not a valid IANA timezone: ${timeZone}`);
  }

  const trailing = options.trailing ?? "report";
  if (!isTrailingBytesPolicy(trailing)) {
    throw new ConfigError(`--trailing must be one of ${TRAILING_POLICIES.join(", ")}, got ${trailing}`);
  }

  return {
    registry: EventRegistry.create({ external }),
    timeZone,
    failurePolicy: options.strict ? "abort" : "skip",
    trailingBytes: trailing,
    retainRaw: options.includeRaw ?? false,
  };
}

function decodeWith(input: string | Uint8Array, context: DecodeContext): DecodeResult {
  return decodeEventBlob(input, {
    registry: context.registry,
    timeZone: context.timeZone,
    failurePolicy: context.failurePolicy,
    trailingBytes: context.trailingBytes,
    retainRaw: context.retainRaw,
  });
}

function failureLines(result: DecodeResult): string[] {
  return result.failures.map(
    (failure) => `  frame ${failure.frameIndex} at byte ${failure.offset}: ${failure.error.message}`
  );
}

// Nothing decoded but something failed: treat the input as unusable
function exitCodeFor(result: DecodeResult): number {
  return result.events.length === 0 && result.failures.length > 0 ? 1 : 0;
}

/**
 * decode: serialized events as NDJSON, summary on stderr
 */
export function runDecode(input: string | Uint8Array, context: DecodeContext): CommandOutput {
  const result = decodeWith(input, context);

  const counts = Object.entries(result.counts)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([name, count]) => `  ${name}: ${count}`);

  return {
    stdout: result.events.map((event) => JSON.stringify(serializeEvent(event))),
    stderr: [
      `Decoded ${result.events.length} events (${result.failures.length} failures, ${result.trailingBytes} trailing bytes)`,
      ...counts,
      ...failureLines(result),
    ],
    exitCode: exitCodeFor(result),
  };
}

// Local dates of the earliest and latest record
function dateSpan(records: PumpRecord[], timeZone: string): string[] {
  if (records.length === 0) return [];
  let earliest = records[0].timestamp;
  let latest = earliest;
  for (const record of records) {
    if (record.timestamp < earliest) earliest = record.timestamp;
    if (record.timestamp > latest) latest = record.timestamp;
  }
  return [`  dates: ${formatDateInTimezone(earliest, timeZone)} to ${formatDateInTimezone(latest, timeZone)}`];
}

/**
 * records: glucose and insulin records as NDJSON, counts on stderr
 */
export function runRecords(
  input: string | Uint8Array,
  context: DecodeContext,
  options: { deviceSerial?: string; importedAt?: number } = {}
): CommandOutput {
  const result = decodeWith(input, context);
  const extracted = extractRecords(result.events, options);

  const counts = RECORD_TYPES.filter((type) => extracted.counts[type] !== undefined).map(
    (type) => `  ${type}: ${extracted.counts[type]}`
  );

  return {
    stdout: extracted.records.map((record) => JSON.stringify(record)),
    stderr: [
      `Extracted ${extracted.records.length} records from ${result.events.length} events (${extracted.rejected} rejected)`,
      ...counts,
      ...dateSpan(extracted.records, context.timeZone),
      ...failureLines(result),
    ],
    exitCode: exitCodeFor(result),
  };
}

/**
 * catalog: one line per registered event type
 */
export function runCatalog(registry: EventRegistry): CommandOutput {
  return {
    stdout: registry
      .describe()
      .map(
        (entry) =>
          `${entry.typeId}\t${entry.name}\t${entry.kind}\t${entry.fields.map((field) => field.name).join(", ")}`
      ),
    stderr: [`${registry.size} event types`],
    exitCode: 0,
  };
}
