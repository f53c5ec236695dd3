export type CodecErrorCode =
  | "BAD_QOS"
  | "BAD_MSG_TYPE"
  | "BAD_WILL_QOS"
  | "BAD_RETURN_CODE"
  | "MALFORMED_LENGTH"
  | "MALFORMED_PACKET"
  | "TRUNCATED_STREAM"
  | "INVALID_FIELD"
  | "STREAM";

/**
 * Base class of everything the codec reports. Public entry points never
 * throw these; they come back inside a failed {@link CodecResult}.
 */
export class MqttCodecError extends Error {
  constructor(
    public readonly code: CodecErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "MqttCodecError";
  }
}

export class BadQosError extends MqttCodecError {
  constructor(public readonly qos: number) {
    super("BAD_QOS", `Invalid QoS level: ${qos}`);
    this.name = "BadQosError";
  }
}

export class BadMsgTypeError extends MqttCodecError {
  constructor(public readonly messageType: number) {
    super("BAD_MSG_TYPE", `Invalid MQTT message type: ${messageType}`);
    this.name = "BadMsgTypeError";
  }
}

export class BadWillQosError extends MqttCodecError {
  constructor(public readonly qos: number) {
    super("BAD_WILL_QOS", `Invalid will QoS level: ${qos}`);
    this.name = "BadWillQosError";
  }
}

export class BadReturnCodeError extends MqttCodecError {
  constructor(public readonly returnCode: number) {
    super("BAD_RETURN_CODE", `Invalid CONNACK return code: ${returnCode}`);
    this.name = "BadReturnCodeError";
  }
}

export class MalformedLengthError extends MqttCodecError {
  constructor(message: string) {
    super("MALFORMED_LENGTH", message);
    this.name = "MalformedLengthError";
  }
}

/** The packet body disagrees with its own remaining length. */
export class MalformedPacketError extends MqttCodecError {
  constructor(message: string) {
    super("MALFORMED_PACKET", message);
    this.name = "MalformedPacketError";
  }
}

export class TruncatedStreamError extends MqttCodecError {
  constructor(
    public readonly expected: number,
    public readonly received: number,
  ) {
    super(
      "TRUNCATED_STREAM",
      `Stream ended after ${received} of ${expected} expected bytes`,
    );
    this.name = "TruncatedStreamError";
  }
}

export class InvalidFieldError extends MqttCodecError {
  constructor(message: string) {
    super("INVALID_FIELD", message);
    this.name = "InvalidFieldError";
  }
}

/** The byte source or sink itself failed; the original error is the cause. */
export class StreamError extends MqttCodecError {
  constructor(cause: unknown) {
    super(
      "STREAM",
      cause instanceof Error ? cause.message : `Stream failure: ${String(cause)}`,
      { cause },
    );
    this.name = "StreamError";
  }
}

export type CodecResult<T> =
  | { ok: true; value: T; }
  | { ok: false; error: MqttCodecError; };

export const toCodecError = (error: unknown): MqttCodecError =>
  error instanceof MqttCodecError ? error : new StreamError(error);

/**
 * Runs one encode or decode step, turning anything it throws into a
 * failed result. Codec errors pass through as they are.
 */
export const captureFault = <T>(run: () => T): CodecResult<T> => {
  try {
    return { ok: true, value: run() };
  } catch (error) {
    return { ok: false, error: toCodecError(error) };
  }
};

export const unwrap = <T>(result: CodecResult<T>): T => {
  if (!result.ok) {
    throw result.error;
  }

  return result.value;
};
