/**
 * Built-in event kinds
 *
 * This is the closed set of kinds the decoder knows at compile time. Each
 * key becomes a variant of DecodedEvent. Layouts for other vendor ids are
 * supplied at runtime as external schemas (see external.ts).
 *
 * Offsets are relative to the payload region (frame byte 10).
 */

import type { EventSchema } from "./types.js";

export const BUILTIN_SCHEMAS = {
  basalRateChange: {
    id: 3,
    name: "LID_BASAL_RATE_CHANGE",
    fields: [
      { name: "commandedBasalRate", offset: 0, width: 4, encoding: "float" },
      { name: "baseBasalRate", offset: 4, width: 4, encoding: "float" },
      { name: "maxBasalRate", offset: 8, width: 4, encoding: "float" },
      { name: "insulinDeliveryProfile", offset: 12, width: 2, encoding: "uint" },
      { name: "changeType", offset: 15, width: 1, encoding: "uint" },
    ],
  },
  pumpingSuspended: {
    id: 11,
    name: "LID_PUMPING_SUSPENDED",
    fields: [
      { name: "insulinAmount", offset: 4, width: 2, encoding: "uint" },
      { name: "suspendReason", offset: 8, width: 1, encoding: "uint" },
    ],
  },
  pumpingResumed: {
    id: 12,
    name: "LID_PUMPING_RESUMED",
    fields: [{ name: "insulinAmount", offset: 4, width: 2, encoding: "uint" }],
  },
  bolusCompleted: {
    id: 20,
    name: "LID_BOLUS_COMPLETED",
    fields: [
      { name: "completionStatus", offset: 0, width: 2, encoding: "uint" },
      { name: "bolusId", offset: 2, width: 2, encoding: "uint" },
      { name: "insulinOnBoard", offset: 4, width: 4, encoding: "float" },
      { name: "insulinDelivered", offset: 8, width: 4, encoding: "float" },
      { name: "insulinRequested", offset: 12, width: 4, encoding: "float" },
    ],
  },
  cartridgeFilled: {
    id: 33,
    name: "LID_CARTRIDGE_FILLED",
    fields: [
      { name: "insulinVolume", offset: 0, width: 4, encoding: "uint" },
      { name: "volumeEstimate", offset: 4, width: 4, encoding: "float" },
    ],
  },
  dailyBasal: {
    id: 81,
    name: "LID_DAILY_BASAL",
    fields: [
      { name: "dailyTotalBasal", offset: 0, width: 4, encoding: "float" },
      { name: "lastBasalRate", offset: 4, width: 4, encoding: "float" },
      { name: "insulinOnBoard", offset: 8, width: 4, encoding: "float" },
      { name: "batteryChargePercent", offset: 12, width: 1, encoding: "uint" },
    ],
  },
  cgmDataGxb: {
    id: 256,
    name: "LID_CGM_DATA_GXB",
    fields: [
      { name: "glucoseValueStatus", offset: 0, width: 2, encoding: "uint" },
      { name: "cgmDataType", offset: 2, width: 1, encoding: "uint" },
      // mg/dL per minute, stored in tenths
      { name: "rate", offset: 3, width: 1, encoding: "int", divisor: 10 },
      { name: "algorithmState", offset: 4, width: 1, encoding: "uint" },
      { name: "rssi", offset: 5, width: 1, encoding: "int" },
      { name: "currentGlucoseDisplayValue", offset: 6, width: 2, encoding: "uint" },
      { name: "egvTimestamp", offset: 8, width: 4, encoding: "uint" },
      { name: "egvInfoBitmask", offset: 12, width: 2, encoding: "uint" },
      { name: "interval", offset: 14, width: 1, encoding: "uint" },
    ],
  },
  basalDelivery: {
    id: 279,
    name: "LID_BASAL_DELIVERY",
    fields: [
      { name: "commandedRateSource", offset: 0, width: 2, encoding: "uint" },
      // rates are stored in milliunits per hour
      { name: "profileBasalRate", offset: 4, width: 2, encoding: "uint", divisor: 1000 },
      { name: "algorithmRate", offset: 6, width: 2, encoding: "uint", divisor: 1000 },
      { name: "tempRate", offset: 8, width: 2, encoding: "uint", divisor: 1000 },
      { name: "commandedRate", offset: 10, width: 2, encoding: "uint", divisor: 1000 },
    ],
  },
  cgmDataG7: {
    id: 399,
    name: "LID_CGM_DATA_G7",
    fields: [
      { name: "glucoseValueStatus", offset: 0, width: 2, encoding: "uint" },
      { name: "cgmDataType", offset: 2, width: 1, encoding: "uint" },
      { name: "rate", offset: 3, width: 1, encoding: "int", divisor: 10 },
      { name: "algorithmState", offset: 4, width: 1, encoding: "uint" },
      { name: "rssi", offset: 5, width: 1, encoding: "int" },
      { name: "currentGlucoseDisplayValue", offset: 6, width: 2, encoding: "uint" },
      { name: "egvTimestamp", offset: 8, width: 4, encoding: "uint" },
      { name: "egvInfoBitmask", offset: 12, width: 2, encoding: "uint" },
      { name: "interval", offset: 14, width: 1, encoding: "uint" },
    ],
  },
} as const satisfies Record<string, EventSchema>;

export type BuiltinSchemas = typeof BUILTIN_SCHEMAS;

/**
 * Discriminator for built-in event variants
 */
export type BuiltinEventKind = keyof BuiltinSchemas;

/**
 * All built-in kinds as an array for iteration
 */
export const BUILTIN_EVENT_KINDS = Object.freeze(
  Object.keys(BUILTIN_SCHEMAS).filter(isBuiltinEventKind)
);

export function isBuiltinEventKind(kind: string): kind is BuiltinEventKind {
  return Object.prototype.hasOwnProperty.call(BUILTIN_SCHEMAS, kind);
}

/**
 * Kinds whose payload is a CGM glucose reading
 */
export const CGM_EVENT_KINDS = ["cgmDataGxb", "cgmDataG7"] as const satisfies readonly BuiltinEventKind[];
