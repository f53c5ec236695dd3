import type {
  ConnackReturnCodeValue,
  PacketType,
  PacketTypeValue,
  QoSField,
} from "./constants.js";

/** Flag bits of the fixed header octet. */
export interface Header {
  dup: boolean;
  qos: QoSField;
  retain: boolean;
}

export interface BasePacket<T extends PacketTypeValue> {
  type: T;
  header: Header;
}

// CONNECT Packet (Client => Broker)
export interface ConnectPacket extends BasePacket<typeof PacketType.CONNECT> {
  protocolName: string;
  protocolVersion: number;
  clean: boolean;
  keepalive: number;
  clientId: string;
  will?: {
    topic: string;
    payload: Uint8Array;
    qos: QoSField;
    retain: boolean;
  };
  username?: string;
  password?: string;
}

// CONNACK Packet (Broker => Client)
export interface ConnackPacket extends BasePacket<typeof PacketType.CONNACK> {
  sessionPresent: boolean;
  returnCode: ConnackReturnCodeValue;
}

// PUBLISH Packet (Both directions)
export interface PublishPacket extends BasePacket<typeof PacketType.PUBLISH> {
  topic: string;
  messageId?: number; // Present iff header QoS is 1 or 2
  payload: Uint8Array;
}

export interface Subscription {
  topic: string;
  qos: QoSField;
}

// SUBSCRIBE Packet (Client => Broker)
export interface SubscribePacket
  extends BasePacket<typeof PacketType.SUBSCRIBE> {
  messageId?: number;
  subscriptions: Subscription[];
}

// SUBACK Packet (Broker => Client)
export interface SubackPacket extends BasePacket<typeof PacketType.SUBACK> {
  messageId: number;
  granted: QoSField[];
}

// UNSUBSCRIBE Packet (Client => Broker)
export interface UnsubscribePacket
  extends BasePacket<typeof PacketType.UNSUBSCRIBE> {
  messageId?: number;
  topics: string[];
}

export type AckPacketType =
  | typeof PacketType.PUBACK
  | typeof PacketType.PUBREC
  | typeof PacketType.PUBREL
  | typeof PacketType.PUBCOMP
  | typeof PacketType.UNSUBACK;

/** Shared shape of every packet whose body is a single message id. */
export interface AckPacket<T extends AckPacketType = AckPacketType>
  extends BasePacket<T> {
  messageId: number;
}

export type PubackPacket = AckPacket<typeof PacketType.PUBACK>;
export type PubrecPacket = AckPacket<typeof PacketType.PUBREC>;
export type PubrelPacket = AckPacket<typeof PacketType.PUBREL>;
export type PubcompPacket = AckPacket<typeof PacketType.PUBCOMP>;
export type UnsubackPacket = AckPacket<typeof PacketType.UNSUBACK>;

export type PingreqPacket = BasePacket<typeof PacketType.PINGREQ>;
export type PingrespPacket = BasePacket<typeof PacketType.PINGRESP>;
export type DisconnectPacket = BasePacket<typeof PacketType.DISCONNECT>;

export type MqttPacket =
  | ConnectPacket
  | ConnackPacket
  | PublishPacket
  | PubackPacket
  | PubrecPacket
  | PubrelPacket
  | PubcompPacket
  | SubscribePacket
  | SubackPacket
  | UnsubscribePacket
  | UnsubackPacket
  | PingreqPacket
  | PingrespPacket
  | DisconnectPacket;

export type PacketOf<T extends PacketTypeValue> = Extract<
  MqttPacket,
  { type: T }
>;
