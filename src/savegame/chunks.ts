import { SavegameError, withTag } from "./errors.js";
import { BLOCK_INDEX, ChunkLayout, TAG_LENGTH, tagName } from "./format.js";
import type { PrimitiveReader } from "./primitives.js";

export type ChunkRecord = {
  tag: Buffer;
  tagName: string;
  layout: ChunkLayout;
  /** -1 for block chunks, the record index for (sparse) arrays. */
  index: number;
  payload: Buffer;
};

type IteratorState =
  | { kind: "boundary" }
  | { kind: "block"; tag: Buffer; header: number }
  | { kind: "array"; tag: Buffer; nextIndex: number }
  | { kind: "sparse"; tag: Buffer }
  | { kind: "done" }
  | { kind: "failed"; error: unknown };

const isZeroTag = (tag: Buffer): boolean => tag.every((byte) => byte === 0);

/**
 * Walks the chunk sequence of a decompressed savegame body and yields one
 * record per block chunk and one per (sparse) array element, in stream order.
 */
export class ChunkIterator implements AsyncIterable<ChunkRecord> {
  private state: IteratorState = { kind: "boundary" };

  constructor(private readonly reader: PrimitiveReader) {}

  get finished(): boolean {
    return this.state.kind === "done" || this.state.kind === "failed";
  }

  async next(): Promise<ChunkRecord | undefined> {
    try {
      return await this.step();
    } catch (error) {
      const current = this.state;
      const tagged = "tag" in current ? withTag(error, tagName(current.tag)) : error;
      this.state = { kind: "failed", error: tagged };
      throw tagged;
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<ChunkRecord> {
    while (true) {
      const record = await this.next();
      if (!record) {
        return;
      }
      yield record;
    }
  }

  private async step(): Promise<ChunkRecord | undefined> {
    while (true) {
      const state = this.state;
      switch (state.kind) {
        case "done":
          return undefined;
        case "failed":
          throw state.error;
        case "boundary":
          await this.readChunkHeader();
          break;
        case "block": {
          const size = ((state.header >> 4) << 24) | (await this.reader.readUint24());
          const payload = await this.reader.readBytes(size);
          this.state = { kind: "boundary" };
          return this.record(state.tag, ChunkLayout.Block, BLOCK_INDEX, payload);
        }
        case "array": {
          const { value } = await this.reader.readGamma();
          if (value === 0) {
            this.state = { kind: "boundary" };
            break;
          }
          const payload = await this.reader.readBytes(value - 1);
          const index = state.nextIndex;
          this.state = { ...state, nextIndex: index + 1 };
          return this.record(state.tag, ChunkLayout.Array, index, payload);
        }
        case "sparse": {
          const { value } = await this.reader.readGamma();
          if (value === 0) {
            this.state = { kind: "boundary" };
            break;
          }
          const start = this.reader.offset;
          const index = await this.reader.readGamma();
          const length = value - 1 - index.byteLength;
          if (length < 0) {
            throw new SavegameError(
              "INVALID_RECORD_LENGTH",
              `Sparse record length ${value - 1} is shorter than its ${index.byteLength}-byte index`,
              { offset: start }
            );
          }
          const payload = await this.reader.readBytes(length);
          return this.record(state.tag, ChunkLayout.SparseArray, index.value, payload);
        }
      }
    }
  }

  private async readChunkHeader(): Promise<void> {
    const tag = await this.reader.readUpTo(TAG_LENGTH);
    if (tag.length === 0 || (tag.length === TAG_LENGTH && isZeroTag(tag))) {
      this.state = { kind: "done" };
      return;
    }
    if (tag.length !== TAG_LENGTH) {
      throw new SavegameError(
        "MALFORMED_TAIL",
        `Savegame contains garbage at end of file (${tag.length} trailing bytes)`,
        { offset: this.reader.offset - tag.length }
      );
    }

    const header = await this.reader.readUint8();
    const layout = header & 0x0f;
    switch (layout) {
      case ChunkLayout.Block:
        this.state = { kind: "block", tag, header };
        return;
      case ChunkLayout.Array:
        this.state = { kind: "array", tag, nextIndex: 0 };
        return;
      case ChunkLayout.SparseArray:
        this.state = { kind: "sparse", tag };
        return;
      default:
        throw new SavegameError(
          "INVALID_CHUNK_TYPE",
          `Invalid chunk type ${header} for chunk ${JSON.stringify(tagName(tag))}`,
          { tag: tagName(tag), offset: this.reader.offset - 1 }
        );
    }
  }

  private record(tag: Buffer, layout: ChunkLayout, index: number, payload: Buffer): ChunkRecord {
    return { tag, tagName: tagName(tag), layout, index, payload };
  }
}
