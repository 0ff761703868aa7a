/**
 * Glucose record types
 */

import type { BaseRecord } from "./base.js";

/**
 * CGM glucose reading - typically every 5 minutes
 * Source: LID_CGM_DATA_* events
 */
export interface CgmReading extends BaseRecord {
  type: "cgm";
  /** Glucose value in mg/dL */
  glucoseMgDl: number;
  /** Rate of change in mg/dL per minute */
  trendRate?: number;
}
