/**
 * Base types shared by all records extracted from pump events
 */

/**
 * All extracted records share these common fields
 */
export interface BaseRecord {
  /** Unix timestamp in milliseconds (wall clock placed in the pump's zone) */
  timestamp: number;
  /** Device serial number (e.g., insulin pump ID) */
  deviceSerial?: string;
  /** Pump sequence number of the event this record came from */
  sourceEventId: number;
  /** When this record was extracted */
  importedAt: number;
}
