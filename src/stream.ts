import {
  decodeAll,
  MAX_REMAINING_LENGTH,
  type MqttCodecError,
  type MqttPacket,
} from "./packets/index.js";
import { concatBytes } from "./utils/buffer.js";
import { createEventEmitter, type EventEmitter } from "./utils/events.js";
import { createLogger, type LogOptions } from "./utils/logger.js";

export type PacketStreamOptions = {
  /** Frames announcing a larger remaining length are rejected early. */
  maxPacketSize?: number;
} & LogOptions;

export type PacketStreamEvents = {
  packet: [packet: MqttPacket];
  error: [error: MqttCodecError];
};

export type PacketStream = EventEmitter<PacketStreamEvents> & {
  /**
   * Appends a chunk, emits every packet it completes, and returns the
   * decode error if one occurred. After an error the buffer is discarded.
   */
  push: (chunk: Uint8Array) => MqttCodecError | undefined;
  reset: () => void;
  readonly bufferedLength: number;
};

/**
 * Incremental decoder for chunked input such as socket data: packets may
 * arrive split across chunks or several to a chunk.
 */
export const createPacketStream = (
  options: PacketStreamOptions = {},
): PacketStream => {
  const events = createEventEmitter<PacketStreamEvents>();
  const log = createLogger(options, "stream");
  const maxPacketSize = options.maxPacketSize ?? MAX_REMAINING_LENGTH;
  // Chunks since the last decode pass, joined only when a pass can finish
  // a packet.
  let pending: Uint8Array[] = [];
  let pendingLength = 0;
  let frameLength: number | undefined;

  const clear = (): void => {
    pending = [];
    pendingLength = 0;
    frameLength = undefined;
  };

  const push = (chunk: Uint8Array): MqttCodecError | undefined => {
    pending.push(chunk.slice());
    pendingLength += chunk.length;

    if (frameLength !== undefined && pendingLength < frameLength) {
      log.debug("awaiting", frameLength - pendingLength, "more bytes");

      return undefined;
    }

    const result = decodeAll(concatBytes(pending, pendingLength), maxPacketSize);
    const { packets, remaining, error } = result;

    clear();

    if (!error && remaining.length > 0) {
      pending = [remaining.slice()];
      pendingLength = remaining.length;
      frameLength = result.frameLength;
    }

    log.debug("packets to process", packets.length);

    for (const packet of packets) {
      log.debug("packet", packet);
      events.emit("packet", packet);
    }

    if (error) {
      log.debug("decode error", error.code, error.message);

      if (events.listenerCount("error") === 0) {
        log.debug("decode error has no listener; returning it to the caller only");
      }

      events.emit("error", error);

      return error;
    }

    if (pendingLength > 0) {
      log.debug("buffering partial packet", pendingLength);
    }

    return undefined;
  };

  const reset = (): void => {
    log.debug("reset with", pendingLength, "bytes buffered");
    clear();
  };

  return {
    ...events,
    push,
    reset,
    get bufferedLength() {
      return pendingLength;
    },
  };
};
