import {
  type ByteSource,
  createPacketReader,
  createPacketWriter,
} from "../utils/buffer.js";
import { MAX_LENGTH_BYTES, MAX_REMAINING_LENGTH } from "./constants.js";
import { captureFault, type CodecResult, MalformedLengthError } from "./errors.js";

export const encodeLength = (value: number): CodecResult<Uint8Array> =>
  captureFault(() => createPacketWriter(MAX_LENGTH_BYTES)
    .writeVariableInt(value)
    .toUint8Array());

export const decodeLength = (source: ByteSource): CodecResult<number> =>
  captureFault(() => createPacketReader(source).readVariableInt());

export interface FrameInfo {
  /** Octets taken by the type octet plus the remaining-length field. */
  headerLength: number;
  remainingLength: number;
}

/**
 * Inspects the start of `bytes` for a fixed header without consuming
 * anything. Returns `undefined` while the header itself is still
 * incomplete, and throws on a remaining length that can never be valid.
 */
export const peekFrame = (
  bytes: Uint8Array,
  maxPacketSize = MAX_REMAINING_LENGTH,
): FrameInfo | undefined => {
  let value = 0;
  let multiplier = 1;

  for (let index = 0; index < MAX_LENGTH_BYTES; index++) {
    const position = 1 + index;

    if (position >= bytes.length) return undefined;

    const byte = bytes[position];

    value += (byte & 0x7f) * multiplier;

    if ((byte & 0x80) === 0) {
      if (value > maxPacketSize) {
        throw new MalformedLengthError(
          `Remaining length ${value} exceeds the ${maxPacketSize} byte limit`,
        );
      }

      return { headerLength: position + 1, remainingLength: value };
    }

    multiplier *= 128;
  }

  throw new MalformedLengthError(
    `Remaining length continues past ${MAX_LENGTH_BYTES} bytes`,
  );
};
