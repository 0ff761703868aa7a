/**
 * @pumplog/events - Transforms
 *
 * What happens to decoded events on their way to persistence
 */

export {
  extractRecords,
  toRecord,
  isRecordBearing,
  type ExtractOptions,
  type ExtractResult,
} from "./records.js";

export {
  serializeEvent,
  redecodeSerializedEvent,
  type SerializedEvent,
  type RedecodeOptions,
} from "./serialize.js";

export { eventKey, generateEventHash, mergeEventBatches } from "./merge.js";

export {
  VALIDATION,
  isValidGlucose,
  isValidInsulinBolus,
  isValidBasalRate,
} from "./validation.js";
