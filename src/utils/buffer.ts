import {
  MAX_LENGTH_BYTES,
  MAX_REMAINING_LENGTH,
  MAX_UINT16,
} from "../packets/constants.js";
import {
  InvalidFieldError,
  MalformedLengthError,
  MalformedPacketError,
  TruncatedStreamError,
} from "../packets/errors.js";

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

/**
 * Synchronous byte source. `read` returns at most `size` bytes, or `null`
 * (or an empty chunk) once nothing more is available. A paused Node
 * `Readable` fits only once it has ended or holds the whole packet: its
 * `read(n)` returns `null` while fewer than `n` bytes are buffered.
 */
export interface ByteSource {
  read(size: number): Uint8Array | null;
}

/** Anything with a `write(chunk)`, such as a Node `Writable` or socket. */
export interface ByteSink {
  write(chunk: Uint8Array): unknown;
}

export function toUint8Array(data: string | Uint8Array): Uint8Array {
  return typeof data === "string" ? textEncoder.encode(data) : data;
}

/** Joins `chunks` into one new array of `length` bytes. */
export function concatBytes(chunks: Uint8Array[], length: number): Uint8Array {
  const out = new Uint8Array(length);
  let offset = 0;

  for (const chunk of chunks) {
    const part = chunk.subarray(0, length - offset);

    out.set(part, offset);
    offset += part.length;

    if (offset === length) break;
  }

  return out;
}

export function createBufferSource(bytes: Uint8Array) {
  let position = 0;

  return {
    read(size: number): Uint8Array | null {
      // eslint-disable-next-line unicorn/no-null
      if (position >= bytes.length) return null;

      const chunk = bytes.subarray(position, position + size);

      position += chunk.length;

      return chunk;
    },

    get position(): number {
      return position;
    },

    get remaining(): number {
      return bytes.length - position;
    },
  };
}

export function createBufferSink() {
  const chunks: Uint8Array[] = [];
  let length = 0;

  return {
    write(chunk: Uint8Array): void {
      chunks.push(chunk.slice());
      length += chunk.length;
    },

    /** Number of `write` calls received so far. */
    get writes(): number {
      return chunks.length;
    },

    get length(): number {
      return length;
    },

    toUint8Array(): Uint8Array {
      const out = new Uint8Array(length);
      let offset = 0;

      for (const chunk of chunks) {
        out.set(chunk, offset);
        offset += chunk.length;
      }

      return out;
    },
  };
}

export type ByteBufferSource = ReturnType<typeof createBufferSource>;
export type ByteBufferSink = ReturnType<typeof createBufferSink>;

function assertRange(name: string, value: number, max: number): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new InvalidFieldError(`${name} out of range 0..${max}: ${value}`);
  }
}

export function createPacketWriter(initialSize = 256) {
  let buffer = new Uint8Array(initialSize);
  let position = 0;

  /**
   * Ensures the buffer has enough capacity for the requested number of bytes.
   * If the buffer is too small, it doubles in size or expands to fit the needed bytes,
   * whichever is larger, and copies existing data to the new buffer.
   */
  function ensureCapacity(bytesNeeded: number): void {
    if (position + bytesNeeded > buffer.length) {
      const newSize = Math.max(buffer.length * 2, position + bytesNeeded);
      const newBuffer = new Uint8Array(newSize);

      newBuffer.set(buffer);
      buffer = newBuffer;
    }
  }

  const writer = {
    writeByte(value: number) {
      assertRange("uint8", value, 0xff);
      ensureCapacity(1);
      buffer[position++] = value;

      return writer;
    },

    writeUint16(value: number) {
      assertRange("uint16", value, MAX_UINT16);
      ensureCapacity(2);
      buffer[position++] = (value >> 8) & 0xff;
      buffer[position++] = value & 0xff;

      return writer;
    },

    writeBytes(data: Uint8Array) {
      ensureCapacity(data.length);
      buffer.set(data, position);
      position += data.length;

      return writer;
    },

    writeString(value: string) {
      const bytes = textEncoder.encode(value);

      if (bytes.length > MAX_UINT16) {
        throw new InvalidFieldError(
          `String of ${bytes.length} bytes exceeds the ${MAX_UINT16} byte limit`,
        );
      }

      writer.writeUint16(bytes.length);
      writer.writeBytes(bytes);

      return writer;
    },

    writeBinary(data: Uint8Array) {
      if (data.length > MAX_UINT16) {
        throw new InvalidFieldError(
          `Binary field of ${data.length} bytes exceeds the ${MAX_UINT16} byte limit`,
        );
      }

      writer.writeUint16(data.length);
      writer.writeBytes(data);

      return writer;
    },

    writeVariableInt(value: number) {
      if (!Number.isInteger(value) || value < 0 || value > MAX_REMAINING_LENGTH) {
        throw new MalformedLengthError(
          `Remaining length out of range 0..${MAX_REMAINING_LENGTH}: ${value}`,
        );
      }

      do {
        let byte = value % 128;

        value = Math.floor(value / 128);

        if (value > 0) byte |= 0x80;

        writer.writeByte(byte);
      } while (value > 0);

      return writer;
    },

    toUint8Array(): Uint8Array {
      return buffer.subarray(0, position);
    },

    get length(): number {
      return position;
    },
  };

  return writer;
}

/**
 * Reads exactly `length` bytes into a fresh array or fails as truncated.
 * Memory grows with the bytes received, not with the length asked for.
 */
function readExact(source: ByteSource, length: number): Uint8Array {
  const chunks: Uint8Array[] = [];
  let filled = 0;

  while (filled < length) {
    const chunk = source.read(length - filled);

    if (!chunk || chunk.length === 0) {
      throw new TruncatedStreamError(length, filled);
    }

    chunks.push(chunk);
    filled += chunk.length;
  }

  return concatBytes(chunks, length);
}

/**
 * Field reader over a byte source. Every read is charged against `budget`,
 * the remaining length of the packet being decoded; reading past it is a
 * malformed packet. The fixed header is read with an unbounded budget.
 */
export function createPacketReader(
  source: ByteSource,
  budget = Number.POSITIVE_INFINITY,
) {
  let remaining = budget;
  let position = 0;

  function take(length: number): Uint8Array {
    if (length > remaining) {
      throw new MalformedPacketError(
        `Field of ${length} bytes overruns the ${remaining} bytes left in the packet`,
      );
    }

    const data = readExact(source, length);

    remaining -= length;
    position += length;

    return data;
  }

  const reader = {
    get remaining(): number {
      return remaining;
    },

    get position(): number {
      return position;
    },

    readByte(): number {
      return take(1)[0];
    },

    readUint16(): number {
      const data = take(2);

      return (data[0] << 8) | data[1];
    },

    readBytes(length: number): Uint8Array {
      return take(length);
    },

    readString(): string {
      return textDecoder.decode(take(reader.readUint16()));
    },

    readBinary(): Uint8Array {
      return take(reader.readUint16());
    },

    readVariableInt(): number {
      let value = 0;
      let multiplier = 1;

      for (let index = 0; index < MAX_LENGTH_BYTES; index++) {
        const byte = reader.readByte();

        value += (byte & 0x7f) * multiplier;

        if ((byte & 0x80) === 0) return value;

        multiplier *= 128;
      }

      throw new MalformedLengthError(
        `Remaining length continues past ${MAX_LENGTH_BYTES} bytes`,
      );
    },

    /** Everything left in the budget, e.g. a PUBLISH payload. */
    readRest(): Uint8Array {
      return take(remaining);
    },
  };

  return reader;
}

export type PacketWriter = ReturnType<typeof createPacketWriter>;
export type PacketReader = ReturnType<typeof createPacketReader>;
