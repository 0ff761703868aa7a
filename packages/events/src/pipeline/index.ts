export {
  decodeEvents,
  decodeEventBlob,
  decodeFrame,
  type DecodeOptions,
  type DecodeResult,
  type FrameFailure,
  type FailurePolicy,
  type TrailingBytesPolicy,
} from "./pipeline.js";
export { decodeBase64, encodeBase64, toEventBytes } from "./base64.js";
