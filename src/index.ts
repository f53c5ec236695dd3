export * from "./packets/index.js";
export {
  createPacketStream,
  type PacketStream,
  type PacketStreamEvents,
  type PacketStreamOptions,
} from "./stream.js";
export {
  type ByteBufferSink,
  type ByteBufferSource,
  type ByteSink,
  type ByteSource,
  createBufferSink,
  createBufferSource,
  toUint8Array,
} from "./utils/buffer.js";
export type { LogLevel, LogOptions } from "./utils/logger.js";
