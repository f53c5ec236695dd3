import { describe, expect, test, vi } from "vitest";

import {
  BadReturnCodeError,
  createHeader,
  MalformedLengthError,
  type MqttCodecError,
  type MqttPacket,
  PacketType,
} from "../src/packets/index.js";
import { createPacketStream } from "../src/stream.js";

const PUBLISH = [0x30, 0x06, 0x00, 0x01, 0x61, 0x68, 0x69, 0x21];
const PINGRESP = [0xd0, 0x00];

const collect = (stream: ReturnType<typeof createPacketStream>) => {
  const packets: MqttPacket[] = [];
  const errors: MqttCodecError[] = [];

  stream.on("packet", (packet) => packets.push(packet));
  stream.on("error", (error) => errors.push(error));

  return { packets, errors };
};

describe("createPacketStream", () => {
  test("reassembles a packet split across chunks", () => {
    const stream = createPacketStream();
    const { packets } = collect(stream);

    for (const byte of PUBLISH.slice(0, -1)) {
      stream.push(Uint8Array.of(byte));
    }

    expect(packets).toEqual([]);
    expect(stream.bufferedLength).toBe(PUBLISH.length - 1);

    stream.push(Uint8Array.of(0x21));

    expect(packets).toEqual([{
      type: PacketType.PUBLISH,
      header: createHeader(),
      topic: "a",
      payload: Uint8Array.from([0x68, 0x69, 0x21]),
    }]);
    expect(stream.bufferedLength).toBe(0);
  });

  test("decodes a split frame once its last chunk arrives", () => {
    const logSink = vi.fn();
    const stream = createPacketStream({ debug: true, logSink });
    const { packets } = collect(stream);
    const payload = new Uint8Array(1000).fill(0x61);
    // Remaining length 1003 = 0x6b + 7 * 128
    const frame = Uint8Array.from([
      0x30, 0xeb, 0x07, 0x00, 0x01, 0x74, ...payload,
    ]);

    for (let offset = 0; offset < frame.length; offset += 100) {
      stream.push(frame.subarray(offset, offset + 100));
    }

    const passes = logSink.mock.calls.filter(
      ([, message]) => message === "packets to process",
    );

    expect(passes).toHaveLength(2);
    expect(packets).toEqual([{
      type: PacketType.PUBLISH,
      header: createHeader(),
      topic: "t",
      payload,
    }]);
  });

  test("keeps its own copy of pushed chunks", () => {
    const stream = createPacketStream();
    const { packets } = collect(stream);
    const middle = Uint8Array.from(PUBLISH.slice(2, 5));

    stream.push(Uint8Array.from(PUBLISH.slice(0, 2)));
    stream.push(middle);
    middle.fill(0);
    stream.push(Uint8Array.from(PUBLISH.slice(5)));

    expect(packets).toEqual([{
      type: PacketType.PUBLISH,
      header: createHeader(),
      topic: "a",
      payload: Uint8Array.from([0x68, 0x69, 0x21]),
    }]);
  });

  test("emits every packet in a chunk, in order", () => {
    const stream = createPacketStream();
    const { packets } = collect(stream);

    stream.push(Uint8Array.from([...PINGRESP, ...PUBLISH, ...PINGRESP, 0x40]));

    expect(packets.map((packet) => packet.type)).toEqual([
      PacketType.PINGRESP,
      PacketType.PUBLISH,
      PacketType.PINGRESP,
    ]);
    expect(stream.bufferedLength).toBe(1);
  });

  test("reports decode errors and drops its buffer", () => {
    const stream = createPacketStream();
    const { packets, errors } = collect(stream);

    const returned = stream.push(
      Uint8Array.from([...PINGRESP, 0x20, 0x02, 0x00, 0x09, ...PINGRESP]),
    );

    expect(packets).toHaveLength(1);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(BadReturnCodeError);
    expect(returned).toBe(errors[0]);
    expect(stream.bufferedLength).toBe(0);
  });

  test("returns the error even with no listener attached", () => {
    const stream = createPacketStream();

    expect(stream.push(Uint8Array.from([0x20, 0x02, 0x00, 0x09])))
      .toBeInstanceOf(BadReturnCodeError);
  });

  test("rejects oversized frames before their body arrives", () => {
    const stream = createPacketStream({ maxPacketSize: 10 });
    const { errors } = collect(stream);

    stream.push(Uint8Array.from([0x30, 0x0b]));

    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(MalformedLengthError);
  });

  test("reset discards a partial packet", () => {
    const stream = createPacketStream();
    const { packets } = collect(stream);

    stream.push(Uint8Array.from(PUBLISH.slice(0, 4)));
    stream.reset();
    stream.push(Uint8Array.from(PINGRESP));

    expect(stream.bufferedLength).toBe(0);
    expect(packets.map((packet) => packet.type)).toEqual([PacketType.PINGRESP]);
  });

  test("off stops delivery", () => {
    const stream = createPacketStream();
    const listener = vi.fn();

    stream.on("packet", listener);
    stream.push(Uint8Array.from(PINGRESP));
    stream.off("packet", listener);
    stream.push(Uint8Array.from(PINGRESP));

    expect(listener).toHaveBeenCalledTimes(1);
    expect(stream.listenerCount("packet")).toBe(0);
  });

  test("logs through the configured sink when debug is on", () => {
    const logSink = vi.fn();
    const stream = createPacketStream({ debug: true, logSink });

    stream.push(Uint8Array.from(PINGRESP));

    expect(logSink).toHaveBeenCalledWith(
      "[mqtt-wire:stream]",
      "packets to process",
      1,
    );
  });

  test("stays silent by default", () => {
    const logSink = vi.fn();
    const stream = createPacketStream({ logSink });

    stream.push(Uint8Array.from(PINGRESP));

    expect(logSink).not.toHaveBeenCalled();
  });

  test("logLevel debug enables logging too", () => {
    const logSink = vi.fn();
    const stream = createPacketStream({ logLevel: "debug", logSink });

    stream.push(Uint8Array.from([0x20, 0x02, 0x00, 0x09]));

    expect(logSink).toHaveBeenCalledWith(
      "[mqtt-wire:stream]",
      "decode error",
      "BAD_RETURN_CODE",
      "Invalid CONNACK return code: 9",
    );
  });
});
