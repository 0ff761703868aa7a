export { splitFrames, frameCount, trailingByteCount } from "./splitter.js";
export { decodeFrameHeader, framePayload, encodeFrame } from "./header.js";
