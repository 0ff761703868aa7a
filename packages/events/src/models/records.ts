/**
 * Union types and helpers for extracted records
 */

import type { CgmReading } from "./glucose.js";
import type { BolusRecord, BasalRecord, InsulinRecord } from "./insulin.js";

/**
 * All possible extracted record types
 */
export type PumpRecord = CgmReading | BolusRecord | BasalRecord;

/**
 * Record type discriminator
 */
export type PumpRecordType = PumpRecord["type"];

/**
 * All record types as a const array for iteration
 */
export const RECORD_TYPES = ["cgm", "bolus", "basal"] as const satisfies readonly PumpRecordType[];

// Re-export grouped types for convenience
export type { InsulinRecord };
