/**
 * Project decoded pump events onto glucose and insulin records
 */

import type { DecodedEvent, EventOfKind } from "../models/events.js";
import type { CgmReading } from "../models/glucose.js";
import type { BasalRecord, BolusRecord } from "../models/insulin.js";
import type { PumpRecord, PumpRecordType } from "../models/records.js";
import { toInstant } from "../time/resolver.js";
import { isValidBasalRate, isValidGlucose, isValidInsulinBolus } from "./validation.js";

export interface ExtractOptions {
  /** Pump serial to stamp on every record */
  deviceSerial?: string;
  /** Extraction time (default: now) */
  importedAt?: number;
}

/**
 * Extraction result
 */
export interface ExtractResult {
  records: PumpRecord[];
  counts: Partial<Record<PumpRecordType, number>>;
  /** Events of a record-bearing kind whose values failed validation */
  rejected: number;
}

type CgmEvent = EventOfKind<"cgmDataGxb"> | EventOfKind<"cgmDataG7">;

function toCgmReading(event: CgmEvent, deviceSerial: string | undefined, importedAt: number): CgmReading | null {
  const glucose = event.fields.currentGlucoseDisplayValue;
  if (!isValidGlucose(glucose)) return null;

  return {
    type: "cgm",
    timestamp: toInstant(event.timestamp),
    glucoseMgDl: glucose,
    trendRate: event.fields.rate,
    deviceSerial,
    sourceEventId: event.sequenceNumber,
    importedAt,
  };
}

function toBolusRecord(
  event: EventOfKind<"bolusCompleted">,
  deviceSerial: string | undefined,
  importedAt: number
): BolusRecord | null {
  const delivered = event.fields.insulinDelivered;
  if (!isValidInsulinBolus(delivered)) return null;

  return {
    type: "bolus",
    timestamp: toInstant(event.timestamp),
    bolusId: event.fields.bolusId,
    insulinDeliveredUnits: delivered,
    insulinRequestedUnits: event.fields.insulinRequested,
    insulinOnBoardUnits: event.fields.insulinOnBoard,
    deviceSerial,
    sourceEventId: event.sequenceNumber,
    importedAt,
  };
}

function toBasalRecord(
  event: EventOfKind<"basalDelivery">,
  deviceSerial: string | undefined,
  importedAt: number
): BasalRecord | null {
  const { commandedRate, profileBasalRate, algorithmRate, tempRate } = event.fields;
  if (!isValidBasalRate(commandedRate)) return null;

  return {
    type: "basal",
    timestamp: toInstant(event.timestamp),
    commandedRate,
    profileRate: profileBasalRate,
    algorithmRate,
    // zero means no temp rate is active
    tempRate: tempRate || undefined,
    deviceSerial,
    sourceEventId: event.sequenceNumber,
    importedAt,
  };
}

/**
 * Convert one event to its record, or null if it carries none (or fails validation)
 */
export function toRecord(event: DecodedEvent, options: ExtractOptions = {}): PumpRecord | null {
  const importedAt = options.importedAt ?? Date.now();
  switch (event.kind) {
    case "cgmDataGxb":
    case "cgmDataG7":
      return toCgmReading(event, options.deviceSerial, importedAt);
    case "bolusCompleted":
      return toBolusRecord(event, options.deviceSerial, importedAt);
    case "basalDelivery":
      return toBasalRecord(event, options.deviceSerial, importedAt);
    default:
      return null;
  }
}

/**
 * Whether an event's kind maps to a record type
 */
export function isRecordBearing(event: DecodedEvent): boolean {
  return (
    event.kind === "cgmDataGxb" ||
    event.kind === "cgmDataG7" ||
    event.kind === "bolusCompleted" ||
    event.kind === "basalDelivery"
  );
}

/**
 * Extract all glucose and insulin records from a sequence of events, preserving order
 */
export function extractRecords(events: Iterable<DecodedEvent>, options: ExtractOptions = {}): ExtractResult {
  const importedAt = options.importedAt ?? Date.now();
  const records: PumpRecord[] = [];
  const counts: Partial<Record<PumpRecordType, number>> = {};
  let rejected = 0;

  for (const event of events) {
    if (!isRecordBearing(event)) continue;
    const record = toRecord(event, { ...options, importedAt });
    if (!record) {
      rejected++;
      continue;
    }
    records.push(record);
    counts[record.type] = (counts[record.type] ?? 0) + 1;
  }

  return { records, counts, rejected };
}
