import { SavegameError } from "./errors.js";
import { DEFAULT_MAX_PAYLOAD_LENGTH } from "./format.js";
import type { ByteSource } from "./sources.js";

export type GammaValue = {
  value: number;
  /** Number of bytes the encoding occupied (1-5). */
  byteLength: number;
};

export type ReaderLimits = {
  maxPayloadLength: number;
};

const UTF8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Big-endian fixed-width reads and gamma decoding on top of a `ByteSource`.
 * Every read either returns exactly what was asked for or throws.
 */
export class PrimitiveReader {
  private consumed = 0;
  private readonly limits: ReaderLimits;

  constructor(
    private readonly source: ByteSource,
    limits?: Partial<ReaderLimits>
  ) {
    this.limits = { maxPayloadLength: limits?.maxPayloadLength ?? DEFAULT_MAX_PAYLOAD_LENGTH };
  }

  /** Bytes consumed so far through this reader. */
  get offset(): number {
    return this.consumed;
  }

  /** Reads up to `max` bytes; a short result means the source is exhausted. */
  async readUpTo(max: number): Promise<Buffer> {
    const chunks: Buffer[] = [];
    let total = 0;
    while (total < max) {
      const chunk = await this.source.read(max - total);
      if (chunk.length === 0) {
        break;
      }
      chunks.push(chunk);
      total += chunk.length;
    }
    this.consumed += total;
    return chunks.length === 1 ? chunks[0] : Buffer.concat(chunks, total);
  }

  async readBytes(length: number): Promise<Buffer> {
    if (length > this.limits.maxPayloadLength) {
      throw new SavegameError(
        "LIMIT_EXCEEDED",
        `Declared length ${length} exceeds safe allocation limit of ${this.limits.maxPayloadLength} bytes`,
        { offset: this.consumed }
      );
    }
    const start = this.consumed;
    const bytes = await this.readUpTo(length);
    if (bytes.length < length) {
      throw new SavegameError(
        "TRUNCATED",
        `Unexpected end of data at offset ${start}: needed ${length} bytes, got ${bytes.length}`,
        { offset: start }
      );
    }
    return bytes;
  }

  async readUint8(): Promise<number> {
    return (await this.readBytes(1)).readUInt8(0);
  }

  async readUint16(): Promise<number> {
    return (await this.readBytes(2)).readUInt16BE(0);
  }

  async readUint24(): Promise<number> {
    const high = await this.readUint16();
    const low = await this.readUint8();
    return (high << 8) | low;
  }

  async readUint32(): Promise<number> {
    return (await this.readBytes(4)).readUInt32BE(0);
  }

  async readGamma(): Promise<GammaValue> {
    const start = this.consumed;
    const first = await this.readUint8();
    if ((first & 0x80) === 0) {
      return { value: first & 0x7f, byteLength: 1 };
    }
    if ((first & 0xc0) === 0x80) {
      return { value: ((first & 0x3f) << 8) | (await this.readUint8()), byteLength: 2 };
    }
    if ((first & 0xe0) === 0xc0) {
      return { value: ((first & 0x1f) << 16) | (await this.readUint16()), byteLength: 3 };
    }
    if ((first & 0xf0) === 0xe0) {
      return { value: ((first & 0x0f) << 24) | (await this.readUint24()), byteLength: 4 };
    }
    if ((first & 0xf8) === 0xf0) {
      // 35 bits: out of range for bitwise operators.
      return { value: (first & 0x07) * 0x1_0000_0000 + (await this.readUint32()), byteLength: 5 };
    }
    throw new SavegameError(
      "INVALID_GAMMA",
      `Invalid gamma encoding at offset ${start}: first byte 0x${first.toString(16)}`,
      { offset: start }
    );
  }

  async readString(): Promise<string> {
    const { value: length } = await this.readGamma();
    const start = this.consumed;
    const bytes = await this.readBytes(length);
    try {
      return UTF8.decode(bytes);
    } catch (error) {
      throw new SavegameError("INVALID_TEXT", `String of ${length} bytes is not valid UTF-8`, {
        offset: start,
        cause: error,
      });
    }
  }
}
