import { ChunkTag, resolveChunkTag, TAG_LENGTH } from "./format.js";
import type { ChunkRecord } from "./chunks.js";
import { PrimitiveReader } from "./primitives.js";
import type { ReaderLimits } from "./primitives.js";
import { BufferSource } from "./sources.js";
import type { SavegameSummary } from "./summary.js";

export type ChunkContext = {
  record: ChunkRecord;
  /** Reader positioned at the start of the record's payload. */
  payload: PrimitiveReader;
  summary: SavegameSummary;
};

export type ChunkHandler = (context: ChunkContext) => void | Promise<void>;

const ignoreChunk: ChunkHandler = () => {};

// AI companies and game scripts store an empty name when the slot is unused.
const countNamedScript =
  (field: "aiCount" | "gsCount"): ChunkHandler =>
  async ({ payload, summary }) => {
    const name = await payload.readString();
    if (name) {
      summary[field] = (summary[field] ?? 0) + 1;
    }
  };

export const CHUNK_HANDLERS: Readonly<Record<ChunkTag, ChunkHandler>> = {
  [ChunkTag.MapSize]: async ({ payload, summary }) => {
    const width = await payload.readUint32();
    const height = await payload.readUint32();
    summary.mapSize = `${width}x${height}`;
  },
  [ChunkTag.NewGrf]: ({ summary }) => {
    summary.newgrfCount = (summary.newgrfCount ?? 0) + 1;
  },
  [ChunkTag.AiPlayer]: countNamedScript("aiCount"),
  [ChunkTag.GameScript]: countNamedScript("gsCount"),
};

export type ExtraHandlers = ReadonlyMap<string, ChunkHandler> | Readonly<Record<string, ChunkHandler>>;

const isHandlerMap = (handlers: ExtraHandlers): handlers is ReadonlyMap<string, ChunkHandler> =>
  handlers instanceof Map;

const toHandlerMap = (handlers: ExtraHandlers | undefined): Map<string, ChunkHandler> => {
  if (!handlers) {
    return new Map();
  }
  const entries: Array<[string, ChunkHandler]> = isHandlerMap(handlers)
    ? [...handlers.entries()]
    : Object.entries(handlers);
  for (const [tag] of entries) {
    if (Buffer.byteLength(tag, "latin1") !== TAG_LENGTH) {
      throw new Error(`Chunk handler tag must be ${TAG_LENGTH} characters: ${JSON.stringify(tag)}`);
    }
    if (resolveChunkTag(Buffer.from(tag, "latin1")) !== undefined) {
      throw new Error(`Chunk handler for built-in tag ${JSON.stringify(tag)} cannot be replaced`);
    }
  }
  return new Map(entries);
};

/**
 * Folds chunk records into a summary. Built-in tags dispatch through
 * `CHUNK_HANDLERS`; caller-registered tags write into `summary.extra`; every
 * other chunk is dropped without being looked at.
 */
export class FieldExtractor {
  private readonly extraHandlers: Map<string, ChunkHandler>;

  constructor(
    extraHandlers?: ExtraHandlers,
    private readonly limits?: Partial<ReaderLimits>
  ) {
    this.extraHandlers = toHandlerMap(extraHandlers);
  }

  handlerFor(record: ChunkRecord): ChunkHandler {
    const tag = resolveChunkTag(record.tag);
    if (tag !== undefined) {
      return CHUNK_HANDLERS[tag];
    }
    return this.extraHandlers.get(record.tagName) ?? ignoreChunk;
  }

  async visit(record: ChunkRecord, summary: SavegameSummary): Promise<void> {
    const handler = this.handlerFor(record);
    if (handler === ignoreChunk) {
      return;
    }
    const payload = new PrimitiveReader(new BufferSource(record.payload), this.limits);
    await handler({ record, payload, summary });
  }
}
