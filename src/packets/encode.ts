import {
  type ByteSink,
  createPacketWriter,
  type PacketWriter,
} from "../utils/buffer.js";
import {
  ConnectFlags,
  hasMessageId,
  isConnackReturnCode,
  isValidQoS,
  MAX_LENGTH_BYTES,
  PacketType,
} from "./constants.js";
import {
  BadMsgTypeError,
  BadQosError,
  BadReturnCodeError,
  BadWillQosError,
  captureFault,
  type CodecResult,
  InvalidFieldError,
} from "./errors.js";
import { writeFixedHeader } from "./header.js";
import type {
  AckPacket,
  ConnackPacket,
  ConnectPacket,
  MqttPacket,
  PublishPacket,
  SubackPacket,
  SubscribePacket,
  UnsubscribePacket,
} from "./types.js";

function writeMessageId(
  writer: PacketWriter,
  messageId: number | undefined,
): void {
  if (messageId === undefined) {
    throw new InvalidFieldError("Message id is required for QoS 1 and 2");
  }

  writer.writeUint16(messageId);
}

function writeConnect(writer: PacketWriter, packet: ConnectPacket): void {
  const { will } = packet;

  if (will && !isValidQoS(will.qos)) throw new BadWillQosError(will.qos);

  // Variable header
  writer.writeString(packet.protocolName);
  writer.writeByte(packet.protocolVersion);

  // Connect flags
  let flags = 0;

  if (packet.clean) flags |= ConnectFlags.CLEAN_SESSION;

  if (will) {
    flags |= ConnectFlags.WILL_FLAG;
    flags |= will.qos << 3;

    if (will.retain) flags |= ConnectFlags.WILL_RETAIN;
  }

  if (packet.password !== undefined) flags |= ConnectFlags.PASSWORD;

  if (packet.username !== undefined) flags |= ConnectFlags.USERNAME;

  writer.writeByte(flags);
  writer.writeUint16(packet.keepalive);

  // Payload
  writer.writeString(packet.clientId);

  if (will) {
    writer.writeString(will.topic);
    writer.writeBinary(will.payload);
  }

  if (packet.username !== undefined) writer.writeString(packet.username);

  if (packet.password !== undefined) writer.writeString(packet.password);
}

function writeConnack(writer: PacketWriter, packet: ConnackPacket): void {
  if (!isConnackReturnCode(packet.returnCode)) {
    throw new BadReturnCodeError(packet.returnCode);
  }

  writer.writeByte(packet.sessionPresent ? 0x01 : 0x00);
  writer.writeByte(packet.returnCode);
}

function writePublish(writer: PacketWriter, packet: PublishPacket): void {
  writer.writeString(packet.topic);

  if (hasMessageId(packet.header.qos)) {
    writeMessageId(writer, packet.messageId);
  }

  // Not length-prefixed: the payload runs to the end of the packet.
  writer.writeBytes(packet.payload);
}

function writeSubscribe(writer: PacketWriter, packet: SubscribePacket): void {
  if (hasMessageId(packet.header.qos)) {
    writeMessageId(writer, packet.messageId);
  }

  for (const sub of packet.subscriptions) {
    if (!isValidQoS(sub.qos)) throw new BadQosError(sub.qos);

    writer.writeString(sub.topic);
    writer.writeByte(sub.qos);
  }
}

function writeSuback(writer: PacketWriter, packet: SubackPacket): void {
  writer.writeUint16(packet.messageId);

  for (const qos of packet.granted) {
    writer.writeByte(qos);
  }
}

function writeUnsubscribe(
  writer: PacketWriter,
  packet: UnsubscribePacket,
): void {
  if (hasMessageId(packet.header.qos)) {
    writeMessageId(writer, packet.messageId);
  }

  for (const topic of packet.topics) {
    writer.writeString(topic);
  }
}

function writeAck(writer: PacketWriter, packet: AckPacket): void {
  writer.writeUint16(packet.messageId);
}

function writeBody(writer: PacketWriter, packet: MqttPacket): void {
  const messageType: number = packet.type;

  switch (packet.type) {
    case PacketType.CONNECT: {
      writeConnect(writer, packet);
      break;
    }
    case PacketType.CONNACK: {
      writeConnack(writer, packet);
      break;
    }
    case PacketType.PUBLISH: {
      writePublish(writer, packet);
      break;
    }
    case PacketType.SUBSCRIBE: {
      writeSubscribe(writer, packet);
      break;
    }
    case PacketType.SUBACK: {
      writeSuback(writer, packet);
      break;
    }
    case PacketType.UNSUBSCRIBE: {
      writeUnsubscribe(writer, packet);
      break;
    }
    case PacketType.PUBACK:
    case PacketType.PUBREC:
    case PacketType.PUBREL:
    case PacketType.PUBCOMP:
    case PacketType.UNSUBACK: {
      writeAck(writer, packet);
      break;
    }
    case PacketType.PINGREQ:
    case PacketType.PINGRESP:
    case PacketType.DISCONNECT: {
      break;
    }
    default: {
      packet satisfies never;
      throw new BadMsgTypeError(messageType);
    }
  }
}

/** Body first, so every validation failure precedes any output. */
function buildPacket(packet: MqttPacket): Uint8Array {
  const body = createPacketWriter();

  writeBody(body, packet);

  const out = createPacketWriter(1 + MAX_LENGTH_BYTES + body.length);

  writeFixedHeader(out, packet.type, packet.header, body.length);
  out.writeBytes(body.toUint8Array());

  return out.toUint8Array();
}

export const encodePacket = (packet: MqttPacket): CodecResult<Uint8Array> =>
  captureFault(() => buildPacket(packet));

/**
 * Encodes `packet` and hands it to `sink` in a single `write` call. Returns
 * the number of bytes written.
 */
export const writePacket = (
  packet: MqttPacket,
  sink: ByteSink,
): CodecResult<number> =>
  captureFault(() => {
    const bytes = buildPacket(packet);

    sink.write(bytes);

    return bytes.length;
  });
