/**
 * Savegame container format
 *
 * Layout (all integers are big-endian):
 *
 *   [Header]
 *     - magic: 4 bytes (selects the compression of everything after the header)
 *     - savegameVersion: u16
 *     - reserved: u16
 *
 *   [Chunk sequence] (decompressed)
 *     - tag: 4 bytes ("\0\0\0\0" or end of input terminates the sequence)
 *     - header: u8, low nibble = layout
 *         - 0x0 block:  size = (header >> 4) << 24 | u24, then size bytes
 *         - 0x1 array:  records of [gamma length][length - 1 bytes], gamma 0 ends
 *         - 0x2 sparse: records of [gamma length][gamma index][payload], gamma 0 ends;
 *                       payload is length - 1 minus the bytes of the index gamma
 *
 * Gamma values are 1-5 bytes; the leading one bits of the first byte give the
 * number of extra bytes that follow.
 */

export const HEADER_LENGTH = 8;
export const TAG_LENGTH = 4;

export enum CompressionFormat {
  None = "OTTN",
  Zlib = "OTTZ",
  Lzma = "OTTX",
}

/** Magic used by very old savegames; recognised only to be rejected. */
export const LEGACY_MAGIC = "OTTD";

export enum ChunkLayout {
  Block = 0x0,
  Array = 0x1,
  SparseArray = 0x2,
}

export enum ChunkTag {
  MapSize = "MAPS",
  NewGrf = "NGRF",
  AiPlayer = "AIPL",
  GameScript = "GSDT",
}

export const BLOCK_INDEX = -1;

export const RAW_CHUNK_SIZE = 8 * 1024;

// Every block size (28 bits) fits under this.
export const DEFAULT_MAX_PAYLOAD_LENGTH = 256 * 1024 * 1024;

const COMPRESSION_FORMATS: ReadonlySet<string> = new Set(Object.values(CompressionFormat));
const CHUNK_TAGS: ReadonlySet<string> = new Set(Object.values(ChunkTag));

export const isCompressionFormat = (value: string): value is CompressionFormat =>
  COMPRESSION_FORMATS.has(value);

export const isChunkTag = (value: string): value is ChunkTag => CHUNK_TAGS.has(value);

/** Tags are opaque bytes; latin1 keeps every byte value distinct and printable-ish. */
export const tagName = (tag: Buffer): string => tag.toString("latin1");

export const resolveChunkTag = (tag: Buffer): ChunkTag | undefined => {
  const name = tagName(tag);
  return isChunkTag(name) ? name : undefined;
};
