import {
  type ByteSource,
  createPacketReader,
  createPacketWriter,
  type PacketWriter,
} from "../utils/buffer.js";
import {
  HeaderFlags,
  isPacketType,
  isValidQoS,
  MAX_LENGTH_BYTES,
  QoS,
  toQoSField,
} from "./constants.js";
import {
  BadMsgTypeError,
  BadQosError,
  captureFault,
  type CodecResult,
} from "./errors.js";
import type { Header } from "./types.js";

export interface FixedHeader {
  /** Raw high nibble; validated by the dispatcher, not here. */
  type: number;
  header: Header;
  remainingLength: number;
}

export const createHeader = (flags: Partial<Header> = {}): Header => ({
  dup: false,
  qos: QoS.AT_MOST_ONCE,
  retain: false,
  ...flags,
});

/** Writes the type/flags octet followed by the remaining length. */
export function writeFixedHeader(
  writer: PacketWriter,
  type: number,
  header: Header,
  remainingLength: number,
): void {
  if (!isPacketType(type)) throw new BadMsgTypeError(type);

  if (!isValidQoS(header.qos)) throw new BadQosError(header.qos);

  let byte = type << 4;

  if (header.dup) byte |= HeaderFlags.DUP;

  byte |= header.qos << 1;

  if (header.retain) byte |= HeaderFlags.RETAIN;

  writer.writeByte(byte);
  writer.writeVariableInt(remainingLength);
}

export const encodeHeader = (
  header: Header,
  type: number,
  remainingLength: number,
): CodecResult<Uint8Array> =>
  captureFault(() => {
    const writer = createPacketWriter(1 + MAX_LENGTH_BYTES);

    writeFixedHeader(writer, type, header, remainingLength);

    return writer.toUint8Array();
  });

export function readFixedHeader(source: ByteSource): FixedHeader {
  const reader = createPacketReader(source);
  const byte = reader.readByte();

  return {
    type: byte >> 4,
    header: {
      dup: (byte & HeaderFlags.DUP) !== 0,
      qos: toQoSField((byte & HeaderFlags.QOS_MASK) >> 1),
      retain: (byte & HeaderFlags.RETAIN) !== 0,
    },
    remainingLength: reader.readVariableInt(),
  };
}

export const decodeHeader = (source: ByteSource): CodecResult<FixedHeader> =>
  captureFault(() => readFixedHeader(source));
