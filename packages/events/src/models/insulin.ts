/**
 * Insulin record types - bolus and basal deliveries
 */

import type { BaseRecord } from "./base.js";

/**
 * Completed bolus
 * Source: LID_BOLUS_COMPLETED
 */
export interface BolusRecord extends BaseRecord {
  type: "bolus";
  /** Pump-assigned bolus id */
  bolusId: number;
  /** Insulin delivered (units) */
  insulinDeliveredUnits: number;
  /** Insulin requested (units); differs from delivered when cancelled */
  insulinRequestedUnits: number;
  /** Insulin on board after the bolus (units) */
  insulinOnBoardUnits?: number;
}

/**
 * Basal delivery - background insulin rate in effect
 * Source: LID_BASAL_DELIVERY
 */
export interface BasalRecord extends BaseRecord {
  type: "basal";
  /** Rate from the active profile (units/hour) */
  profileRate?: number;
  /** Rate set by the control algorithm (units/hour) */
  algorithmRate?: number;
  /** Temporary rate (units/hour) */
  tempRate?: number;
  /** Rate actually commanded (units/hour) */
  commandedRate: number;
}

/**
 * Union of all insulin record types
 */
export type InsulinRecord = BolusRecord | BasalRecord;
