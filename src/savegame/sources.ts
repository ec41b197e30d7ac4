import { open } from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import { Readable } from "node:stream";
import type { Transform } from "node:stream";
import { createInflate } from "node:zlib";
import { createXZDecoder } from "xz-compat";
import { SavegameError } from "./errors.js";
import { CompressionFormat, isCompressionFormat, LEGACY_MAGIC, RAW_CHUNK_SIZE, tagName } from "./format.js";

/**
 * Pull-based byte stream. `read(max)` resolves to at most `max` bytes; fewer
 * only at the end of the stream, and an empty buffer once it is exhausted.
 */
export interface ByteSource {
  read(max: number): Promise<Buffer>;
  close(): Promise<void>;
}

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const EMPTY = Buffer.alloc(0);

export class BufferSource implements ByteSource {
  private offset = 0;

  constructor(private readonly buffer: Buffer) {}

  get remaining(): number {
    return this.buffer.length - this.offset;
  }

  async read(max: number): Promise<Buffer> {
    const end = Math.min(this.buffer.length, this.offset + Math.max(0, max));
    const slice = this.buffer.subarray(this.offset, end);
    this.offset = end;
    return slice;
  }

  async close(): Promise<void> {
    this.offset = this.buffer.length;
  }
}

export class FileSource implements ByteSource {
  private position = 0;

  private constructor(
    private readonly handle: FileHandle,
    readonly path: string
  ) {}

  static async open(path: string): Promise<FileSource> {
    try {
      return new FileSource(await open(path, "r"), path);
    } catch (error) {
      throw new SavegameError("READ_FAILED", `Failed to open savegame "${path}": ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  async read(max: number): Promise<Buffer> {
    if (max <= 0) {
      return EMPTY;
    }
    const buffer = Buffer.alloc(max);
    let filled = 0;
    try {
      while (filled < max) {
        const { bytesRead } = await this.handle.read(buffer, filled, max - filled, this.position);
        if (bytesRead === 0) {
          break;
        }
        filled += bytesRead;
        this.position += bytesRead;
      }
    } catch (error) {
      throw new SavegameError("READ_FAILED", `Failed to read savegame "${this.path}": ${describeError(error)}`, {
        cause: error,
      });
    }
    return filled === max ? buffer : buffer.subarray(0, filled);
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}

/** Decompressed bytes produced but not yet handed out by `read`. */
export class PendingBytes {
  private chunks: Buffer[] = [];
  private size = 0;

  get length(): number {
    return this.size;
  }

  push(chunk: Buffer): void {
    if (chunk.length === 0) {
      return;
    }
    this.chunks.push(chunk);
    this.size += chunk.length;
  }

  take(max: number): Buffer {
    if (max <= 0 || this.size === 0) {
      return EMPTY;
    }
    if (this.chunks.length > 1 && this.chunks[0].length < max) {
      this.chunks = [Buffer.concat(this.chunks, this.size)];
    }
    const head = this.chunks[0];
    if (head.length <= max) {
      this.chunks.shift();
      this.size -= head.length;
      return head;
    }
    this.chunks[0] = head.subarray(max);
    this.size -= max;
    return head.subarray(0, max);
  }
}

async function* pullRawChunks(raw: ByteSource, chunkSize: number): AsyncGenerator<Buffer> {
  while (true) {
    const chunk = await raw.read(chunkSize);
    if (chunk.length === 0) {
      return;
    }
    yield chunk;
  }
}

const toBuffer = (chunk: unknown): Buffer => {
  if (Buffer.isBuffer(chunk)) {
    return chunk;
  }
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
  }
  throw new SavegameError("CORRUPT_COMPRESSED_STREAM", `Decompressor produced a non-binary chunk (${typeof chunk})`);
};

/**
 * Bridges a push-style decompressor (a Transform stream) to the pull-based
 * `ByteSource` contract. Raw bytes are fed in `rawChunkSize` slices only
 * while more output is needed.
 */
export class TransformSource implements ByteSource {
  private readonly pending = new PendingBytes();
  private readonly input: Readable;
  private readonly output: AsyncIterator<unknown>;
  private ended = false;

  constructor(
    private readonly raw: ByteSource,
    private readonly decoder: Transform,
    readonly label: string,
    rawChunkSize = RAW_CHUNK_SIZE
  ) {
    this.input = Readable.from(pullRawChunks(raw, rawChunkSize), { objectMode: false });
    this.input.once("error", (error: Error) => {
      decoder.destroy(error);
    });
    this.output = this.input.pipe(decoder)[Symbol.asyncIterator]();
  }

  async read(max: number): Promise<Buffer> {
    while (this.pending.length < max && !this.ended) {
      let step: IteratorResult<unknown>;
      try {
        step = await this.output.next();
      } catch (error) {
        if (error instanceof SavegameError) {
          throw error;
        }
        throw new SavegameError(
          "CORRUPT_COMPRESSED_STREAM",
          `Failed to decompress ${this.label} savegame body: ${describeError(error)}`,
          { cause: error }
        );
      }
      if (step.done) {
        this.ended = true;
        break;
      }
      this.pending.push(toBuffer(step.value));
    }
    return this.pending.take(max);
  }

  async close(): Promise<void> {
    this.ended = true;
    this.input.destroy();
    this.decoder.destroy();
    await this.raw.close();
  }
}

const DECODERS: Record<Exclude<CompressionFormat, CompressionFormat.None>, () => Transform> = {
  [CompressionFormat.Zlib]: () => createInflate(),
  [CompressionFormat.Lzma]: () => createXZDecoder(),
};

export type Decompressor = {
  format: CompressionFormat;
  source: ByteSource;
};

/**
 * Selects the decompression for a savegame body by its 4-byte magic. Nothing
 * is read from `raw` here; an unknown magic fails straight away.
 */
export const openDecompressor = (
  magic: Buffer,
  raw: ByteSource,
  rawChunkSize = RAW_CHUNK_SIZE
): Decompressor => {
  const name = tagName(magic);
  if (!isCompressionFormat(name)) {
    const hint = name === LEGACY_MAGIC ? " (legacy format is not supported)" : "";
    throw new SavegameError(
      "UNSUPPORTED_COMPRESSION",
      `Unsupported savegame compression ${JSON.stringify(name)}${hint}`
    );
  }
  if (name === CompressionFormat.None) {
    return { format: name, source: raw };
  }
  return { format: name, source: new TransformSource(raw, DECODERS[name](), name, rawChunkSize) };
};
