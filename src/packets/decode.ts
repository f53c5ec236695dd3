import {
  type ByteSource,
  createBufferSource,
  createPacketReader,
  type PacketReader,
} from "../utils/buffer.js";
import {
  ConnectFlags,
  hasMessageId,
  isConnackReturnCode,
  isPacketType,
  isValidQoS,
  MAX_REMAINING_LENGTH,
  PacketType,
  type PacketTypeValue,
  type QoSField,
  toQoSField,
} from "./constants.js";
import {
  BadMsgTypeError,
  BadQosError,
  BadReturnCodeError,
  BadWillQosError,
  captureFault,
  type CodecResult,
  MalformedPacketError,
  type MqttCodecError,
} from "./errors.js";
import { readFixedHeader } from "./header.js";
import { peekFrame } from "./length.js";
import type {
  AckPacket,
  AckPacketType,
  BasePacket,
  ConnackPacket,
  ConnectPacket,
  Header,
  MqttPacket,
  PacketOf,
  PublishPacket,
  SubackPacket,
  Subscription,
  SubscribePacket,
  UnsubscribePacket,
} from "./types.js";

type PayloadReader<P extends BasePacket<PacketTypeValue>> = (
  reader: PacketReader,
  header: Header,
) => P;

const readConnect = (reader: PacketReader, header: Header): ConnectPacket => {
  const protocolName = reader.readString();
  const protocolVersion = reader.readByte();
  const flags = reader.readByte();
  const keepalive = reader.readUint16();
  const clientId = reader.readString();

  const packet: ConnectPacket = {
    type: PacketType.CONNECT,
    header,
    protocolName,
    protocolVersion,
    clean: (flags & ConnectFlags.CLEAN_SESSION) !== 0,
    keepalive,
    clientId,
  };

  if (flags & ConnectFlags.WILL_FLAG) {
    const qos = toQoSField((flags & ConnectFlags.WILL_QOS_MASK) >> 3);

    if (!isValidQoS(qos)) throw new BadWillQosError(qos);

    packet.will = {
      topic: reader.readString(),
      payload: reader.readBinary(),
      qos,
      retain: (flags & ConnectFlags.WILL_RETAIN) !== 0,
    };
  }

  if (flags & ConnectFlags.USERNAME) packet.username = reader.readString();

  if (flags & ConnectFlags.PASSWORD) packet.password = reader.readString();

  return packet;
};

const readConnack = (reader: PacketReader, header: Header): ConnackPacket => {
  const flags = reader.readByte();
  const returnCode = reader.readByte();

  if (!isConnackReturnCode(returnCode)) {
    throw new BadReturnCodeError(returnCode);
  }

  return {
    type: PacketType.CONNACK,
    header,
    sessionPresent: (flags & 0x01) === 1,
    returnCode,
  };
};

const readPublish = (reader: PacketReader, header: Header): PublishPacket => {
  const topic = reader.readString();
  const messageId = hasMessageId(header.qos) ? reader.readUint16() : undefined;

  return {
    type: PacketType.PUBLISH,
    header,
    topic,
    ...(messageId === undefined ? {} : { messageId }),
    payload: reader.readRest(),
  };
};

const readSubscribe = (
  reader: PacketReader,
  header: Header,
): SubscribePacket => {
  const messageId = hasMessageId(header.qos) ? reader.readUint16() : undefined;
  const subscriptions: Subscription[] = [];

  while (reader.remaining > 0) {
    const topic = reader.readString();
    const qos = reader.readByte();

    if (!isValidQoS(qos)) throw new BadQosError(qos);

    subscriptions.push({ topic, qos });
  }

  return {
    type: PacketType.SUBSCRIBE,
    header,
    ...(messageId === undefined ? {} : { messageId }),
    subscriptions,
  };
};

const readSuback = (reader: PacketReader, header: Header): SubackPacket => {
  const messageId = reader.readUint16();
  const granted: QoSField[] = [];

  while (reader.remaining > 0) {
    granted.push(toQoSField(reader.readByte()));
  }

  return { type: PacketType.SUBACK, header, messageId, granted };
};

const readUnsubscribe = (
  reader: PacketReader,
  header: Header,
): UnsubscribePacket => {
  const messageId = hasMessageId(header.qos) ? reader.readUint16() : undefined;
  const topics: string[] = [];

  while (reader.remaining > 0) {
    topics.push(reader.readString());
  }

  return {
    type: PacketType.UNSUBSCRIBE,
    header,
    ...(messageId === undefined ? {} : { messageId }),
    topics,
  };
};

const readAck = <T extends AckPacketType>(
  type: T,
): PayloadReader<AckPacket<T>> => (reader, header) =>
  ({ type, header, messageId: reader.readUint16() });

type EmptyPacketType =
  | typeof PacketType.PINGREQ
  | typeof PacketType.PINGRESP
  | typeof PacketType.DISCONNECT;

const readEmpty = <T extends EmptyPacketType>(
  type: T,
): PayloadReader<BasePacket<T>> => (_reader, header) => ({ type, header });

// Keyed by every packet type, so a missing reader fails to compile.
const payloadReaders: {
  [K in PacketTypeValue]: PayloadReader<PacketOf<K>>;
} = {
  [PacketType.CONNECT]: readConnect,
  [PacketType.CONNACK]: readConnack,
  [PacketType.PUBLISH]: readPublish,
  [PacketType.PUBACK]: readAck(PacketType.PUBACK),
  [PacketType.PUBREC]: readAck(PacketType.PUBREC),
  [PacketType.PUBREL]: readAck(PacketType.PUBREL),
  [PacketType.PUBCOMP]: readAck(PacketType.PUBCOMP),
  [PacketType.SUBSCRIBE]: readSubscribe,
  [PacketType.SUBACK]: readSuback,
  [PacketType.UNSUBSCRIBE]: readUnsubscribe,
  [PacketType.UNSUBACK]: readAck(PacketType.UNSUBACK),
  [PacketType.PINGREQ]: readEmpty(PacketType.PINGREQ),
  [PacketType.PINGRESP]: readEmpty(PacketType.PINGRESP),
  [PacketType.DISCONNECT]: readEmpty(PacketType.DISCONNECT),
};

/**
 * Decodes one body and checks it used exactly its remaining length. Extra
 * bytes are drained first so a stream stays aligned on the next packet.
 */
const readPayload = (
  reader: PacketReader,
  type: PacketTypeValue,
  header: Header,
): MqttPacket => {
  const packet = payloadReaders[type](reader, header);

  if (reader.remaining > 0) {
    const trailing = reader.readRest().length;

    throw new MalformedPacketError(
      `${trailing} unexpected trailing bytes after packet type ${type}`,
    );
  }

  return packet;
};

const readPacket = (source: ByteSource): MqttPacket => {
  const { type, header, remainingLength } = readFixedHeader(source);

  if (!isPacketType(type)) throw new BadMsgTypeError(type);

  return readPayload(createPacketReader(source, remainingLength), type, header);
};

/**
 * Decodes the body of a packet whose fixed header has already been read.
 * `remainingLength` is the exact number of bytes the body may consume.
 */
export const decodePayload = (
  source: ByteSource,
  type: PacketTypeValue,
  header: Header,
  remainingLength: number,
): CodecResult<MqttPacket> =>
  captureFault(() =>
    readPayload(createPacketReader(source, remainingLength), type, header));

/** Reads one complete packet from `source`. */
export const decodeRead = (source: ByteSource): CodecResult<MqttPacket> =>
  captureFault(() => readPacket(source));

export interface DecodeResult {
  packet: MqttPacket;
  bytesConsumed: number;
}

export const decode = (bytes: Uint8Array): CodecResult<DecodeResult> => {
  const source = createBufferSource(bytes);

  return captureFault(() => ({
    packet: readPacket(source),
    bytesConsumed: source.position,
  }));
};

export interface DecodeAllResult {
  packets: MqttPacket[];
  /** Unconsumed tail: an incomplete packet, or whatever follows an error. */
  remaining: Uint8Array;
  /** Full size of the incomplete packet in `remaining`, once its header is in. */
  frameLength?: number;
  error?: MqttCodecError;
}

/**
 * Splits a buffer into every complete packet it holds. Decoding stops at the
 * first incomplete frame or at the first error.
 */
export const decodeAll = (
  bytes: Uint8Array,
  maxPacketSize = MAX_REMAINING_LENGTH,
): DecodeAllResult => {
  const packets: MqttPacket[] = [];
  let offset = 0;

  while (offset < bytes.length) {
    const view = bytes.subarray(offset);
    const frame = captureFault(() => peekFrame(view, maxPacketSize));

    if (!frame.ok) {
      return { packets, remaining: view, error: frame.error };
    }

    if (!frame.value) break;

    const totalLength = frame.value.headerLength + frame.value.remainingLength;

    if (view.length < totalLength) {
      return { packets, remaining: view, frameLength: totalLength };
    }

    const result = decode(view.subarray(0, totalLength));

    offset += totalLength;

    if (!result.ok) {
      return { packets, remaining: bytes.subarray(offset), error: result.error };
    }

    packets.push(result.value.packet);
  }

  return { packets, remaining: bytes.subarray(offset) };
};
