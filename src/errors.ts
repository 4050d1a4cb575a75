/**
 * Error taxonomy.
 *
 * Every failure carries a `code` naming the rule that was violated, and the
 * message includes the value that was received.
 *
 * @module streaming-mp3-encoder/errors
 */

export type ConfigurationErrorCode = "InvalidParameter";
export type TagErrorCode = "InvalidValue" | "AlreadyFinalized";
export type InputErrorCode =
  | "Misaligned"
  | "ChannelMismatch"
  | "LengthMismatch"
  | "SampleOutOfRange";
export type SessionErrorCode =
  | "AlreadyFlushed"
  | "TooLateForTag"
  | "CodecFailure"
  | "Closed";

export class Mp3EncoderError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "Mp3EncoderError";
  }
}

/** Render a received value for an error message. */
export function describeValue(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "number" || typeof value === "boolean" || value === null) {
    return String(value);
  }
  if (value === undefined) return "undefined";
  if (Array.isArray(value)) return `array(${value.length})`;
  return typeof value;
}

/**
 * Invalid build parameter. `build()` never partially succeeds.
 */
export class ConfigurationError extends Mp3EncoderError {
  declare readonly code: ConfigurationErrorCode;

  constructor(
    public readonly field: string,
    public readonly received: unknown,
    reason: string
  ) {
    super(
      "InvalidParameter",
      `Invalid ${field}: ${reason} (received ${describeValue(received)})`
    );
    this.name = "ConfigurationError";
  }
}

export class TagError extends Mp3EncoderError {
  declare readonly code: TagErrorCode;

  constructor(
    code: TagErrorCode,
    message: string,
    public readonly field?: string,
    public readonly received?: unknown
  ) {
    super(code, message);
    this.name = "TagError";
  }

  static invalidValue(field: string, received: unknown, reason: string): TagError {
    return new TagError(
      "InvalidValue",
      `Invalid tag ${field}: ${reason} (received ${describeValue(received)})`,
      field,
      received
    );
  }

  static alreadyFinalized(state: string): TagError {
    return new TagError(
      "AlreadyFinalized",
      `Tag must be applied before any audio is encoded (session state is "${state}")`,
      undefined,
      state
    );
  }
}

/**
 * PCM input does not match its shape's constraints or the session configuration.
 * Thrown before the session touches its buffers.
 */
export class InputError extends Mp3EncoderError {
  declare readonly code: InputErrorCode;

  constructor(
    code: InputErrorCode,
    message: string,
    public readonly received?: unknown
  ) {
    super(code, message);
    this.name = "InputError";
  }

  static misaligned(unit: string, length: number, multiple: number): InputError {
    return new InputError(
      "Misaligned",
      `Input length must be a multiple of ${multiple} ${unit} (received ${length} ${unit})`,
      length
    );
  }

  static channelMismatch(shape: string, expected: number, configured: number): InputError {
    return new InputError(
      "ChannelMismatch",
      `"${shape}" input requires ${expected} channel(s), session is configured for ${configured}`,
      configured
    );
  }

  static lengthMismatch(left: number, right: number): InputError {
    return new InputError(
      "LengthMismatch",
      `Left and right channels must have the same length (received ${left} and ${right})`,
      [left, right]
    );
  }

  static sampleOutOfRange(index: number, value: unknown): InputError {
    return new InputError(
      "SampleOutOfRange",
      `Sample at index ${index} must be an integer in [-32768, 32767] (received ${describeValue(value)})`,
      value
    );
  }
}

/**
 * State machine violation, or a failure reported by the codec.
 * After `CodecFailure` the session is poisoned.
 */
export class SessionError extends Mp3EncoderError {
  declare readonly code: SessionErrorCode;

  constructor(code: SessionErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = "SessionError";
  }

  static alreadyFlushed(operation: string): SessionError {
    return new SessionError(
      "AlreadyFlushed",
      `Cannot ${operation}: session has already been flushed`
    );
  }

  static tooLateForTag(state: string): SessionError {
    return new SessionError(
      "TooLateForTag",
      `Tag can only be applied in the "configured" state (session state is "${state}")`
    );
  }

  static codecFailure(operation: string, cause: unknown): SessionError {
    const detail = cause instanceof Error ? cause.message : describeValue(cause);
    return new SessionError("CodecFailure", `Codec failed during ${operation}: ${detail}`, {
      cause,
    });
  }

  static closed(operation: string): SessionError {
    return new SessionError("Closed", `Cannot ${operation}: session has been closed`);
  }
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

export function isTagError(error: unknown): error is TagError {
  return error instanceof TagError;
}

export function isInputError(error: unknown): error is InputError {
  return error instanceof InputError;
}

export function isSessionError(error: unknown): error is SessionError {
  return error instanceof SessionError;
}
