/**
 * Error types raised while decoding pump event logs
 *
 * Encoding and configuration errors are fatal to the call that raised them.
 * Frame-level errors (header, unknown type, payload, truncation) are isolated
 * per frame by the pipeline.
 */

/**
 * Base class for every error this package raises
 */
export class PumpEventError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The event blob is not valid base64
 */
export class InvalidEncodingError extends PumpEventError {}

/**
 * A frame is too short to hold the common header
 */
export class MalformedHeaderError extends PumpEventError {
  constructor(
    readonly length: number,
    readonly required: number
  ) {
    super(`Frame of ${length} bytes is shorter than the ${required}-byte header`);
  }
}

/**
 * A frame's type id has no registered payload decoder
 */
export class UnknownEventTypeError extends PumpEventError {
  constructor(readonly typeId: number) {
    super(`Unknown event type id ${typeId}`);
  }
}

/**
 * A payload region cannot hold the fields its schema declares
 */
export class MalformedPayloadError extends PumpEventError {
  constructor(
    readonly typeId: number,
    readonly required: number,
    readonly available: number
  ) {
    super(
      `Payload for event type ${typeId} needs ${required} bytes but only ${available} are available`
    );
  }
}

/**
 * The event blob ends with bytes that do not form a whole frame
 */
export class TruncatedFrameError extends PumpEventError {
  constructor(
    readonly trailingBytes: number,
    readonly frameLength: number
  ) {
    super(`Event blob ends with ${trailingBytes} bytes that do not fill a ${frameLength}-byte frame`);
  }
}

/**
 * Two schemas were registered under the same type id
 */
export class DuplicateEventTypeError extends PumpEventError {
  constructor(
    readonly typeId: number,
    readonly names: readonly [string, string]
  ) {
    super(`Event type id ${typeId} is registered twice (${names[0]}, ${names[1]})`);
  }
}

/**
 * An event schema declaration is invalid
 */
export class SchemaDefinitionError extends PumpEventError {}

/**
 * Process configuration is invalid
 */
export class ConfigError extends PumpEventError {}

/**
 * Errors that the pipeline isolates to a single frame
 */
export type FrameDecodeError =
  | MalformedHeaderError
  | UnknownEventTypeError
  | MalformedPayloadError
  | TruncatedFrameError;

/**
 * Narrow an unknown thrown value to a frame-level decode error
 */
export function isFrameDecodeError(error: unknown): error is FrameDecodeError {
  return (
    error instanceof MalformedHeaderError ||
    error instanceof UnknownEventTypeError ||
    error instanceof MalformedPayloadError ||
    error instanceof TruncatedFrameError
  );
}
