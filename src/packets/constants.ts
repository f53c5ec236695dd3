export const PacketType = {
  CONNECT: 1,
  CONNACK: 2,
  PUBLISH: 3,
  PUBACK: 4,
  PUBREC: 5,
  PUBREL: 6,
  PUBCOMP: 7,
  SUBSCRIBE: 8,
  SUBACK: 9,
  UNSUBSCRIBE: 10,
  UNSUBACK: 11,
  PINGREQ: 12,
  PINGRESP: 13,
  DISCONNECT: 14,
} as const;

export type PacketTypeValue = (typeof PacketType)[keyof typeof PacketType];

export const isPacketType = (value: number): value is PacketTypeValue =>
  Number.isInteger(value)
  && value >= PacketType.CONNECT
  && value <= PacketType.DISCONNECT;

export const PROTOCOL_NAME = "MQTT";
export const PROTOCOL_VERSION = 4; // MQTT version "4" actually refers to 3.1.1

export const PROTOCOL_NAME_V31 = "MQIsdp";
export const PROTOCOL_VERSION_V31 = 3;

export const ConnectFlags = {
  CLEAN_SESSION: 0x02,
  WILL_FLAG: 0x04,
  WILL_QOS_MASK: 0x18,
  WILL_RETAIN: 0x20,
  PASSWORD: 0x40,
  USERNAME: 0x80,
} as const;

export const HeaderFlags = {
  RETAIN: 0x01,
  QOS_MASK: 0x06,
  DUP: 0x08,
} as const;

export const QoS = {
  AT_MOST_ONCE: 0,
  AT_LEAST_ONCE: 1,
  EXACTLY_ONCE: 2,
} as const;

export type QoSLevel = (typeof QoS)[keyof typeof QoS];

/** The two-bit QoS field as it appears on the wire. 3 is reserved. */
export type QoSField = QoSLevel | 3;

export const isValidQoS = (value: number): value is QoSLevel =>
  value === QoS.AT_MOST_ONCE
  || value === QoS.AT_LEAST_ONCE
  || value === QoS.EXACTLY_ONCE;

/** Levels 1 and 2 carry a message identifier for acknowledgement. */
export const hasMessageId = (qos: QoSField): boolean =>
  qos === QoS.AT_LEAST_ONCE || qos === QoS.EXACTLY_ONCE;

export const toQoSField = (bits: number): QoSField => {
  switch (bits & 0x03) {
    case 0: {
      return QoS.AT_MOST_ONCE;
    }
    case 1: {
      return QoS.AT_LEAST_ONCE;
    }
    case 2: {
      return QoS.EXACTLY_ONCE;
    }
    default: {
      return 3;
    }
  }
};

export const ConnackReturnCode = {
  ACCEPTED: 0,
  UNACCEPTABLE_PROTOCOL_VERSION: 1,
  IDENTIFIER_REJECTED: 2,
  SERVER_UNAVAILABLE: 3,
  BAD_USERNAME_OR_PASSWORD: 4,
  NOT_AUTHORIZED: 5,
} as const;

export type ConnackReturnCodeValue =
  (typeof ConnackReturnCode)[keyof typeof ConnackReturnCode];

export const isConnackReturnCode = (
  value: number,
): value is ConnackReturnCodeValue =>
  Number.isInteger(value)
  && value >= ConnackReturnCode.ACCEPTED
  && value <= ConnackReturnCode.NOT_AUTHORIZED;

const connackMessages: Record<ConnackReturnCodeValue, string> = {
  0: "Connection accepted",
  1: "Connection refused: unacceptable protocol version",
  2: "Connection refused: identifier rejected",
  3: "Connection refused: server unavailable",
  4: "Connection refused: bad username or password",
  5: "Connection refused: not authorized",
};

export const getConnackReturnMessage = (returnCode: number): string =>
  isConnackReturnCode(returnCode)
    ? connackMessages[returnCode]
    : `Connection refused: ${returnCode}`;

/** Largest value four remaining-length octets can carry. */
export const MAX_REMAINING_LENGTH = 268_435_455;
export const MAX_LENGTH_BYTES = 4;

export const MAX_UINT16 = 0xff_ff;
