import { crc32, deflateSync } from "node:zlib";
import { isSavegameError } from "../savegame/errors.js";

// Builders for synthetic savegames used across the test suites.

export const encodeGamma = (value: number): Buffer => {
  if (value < 0x80) {
    return Buffer.from([value]);
  }
  if (value < 0x4000) {
    return Buffer.from([0x80 | (value >> 8), value & 0xff]);
  }
  if (value < 0x20_0000) {
    return Buffer.from([0xc0 | (value >> 16), (value >> 8) & 0xff, value & 0xff]);
  }
  if (value < 0x1000_0000) {
    return Buffer.from([0xe0 | (value >> 24), (value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff]);
  }
  const bytes = Buffer.alloc(5);
  bytes.writeUInt8(0xf0 | Math.floor(value / 0x1_0000_0000), 0);
  bytes.writeUInt32BE(value % 0x1_0000_0000, 1);
  return bytes;
};

export const encodeString = (value: string): Buffer => {
  const bytes = Buffer.from(value, "utf8");
  return Buffer.concat([encodeGamma(bytes.length), bytes]);
};

export const uint32 = (...values: number[]): Buffer => {
  const bytes = Buffer.alloc(values.length * 4);
  values.forEach((value, i) => bytes.writeUInt32BE(value, i * 4));
  return bytes;
};

const tagBytes = (tag: string): Buffer => {
  const bytes = Buffer.from(tag, "latin1");
  if (bytes.length !== 4) {
    throw new Error(`Tag must be 4 bytes: ${tag}`);
  }
  return bytes;
};

export const blockChunk = (tag: string, payload: Buffer): Buffer => {
  const header = Buffer.alloc(4);
  header.writeUInt8((payload.length >> 24) << 4, 0);
  header.writeUIntBE(payload.length & 0xff_ffff, 1, 3);
  return Buffer.concat([tagBytes(tag), header, payload]);
};

export const arrayChunk = (tag: string, records: Buffer[]): Buffer =>
  Buffer.concat([
    tagBytes(tag),
    Buffer.from([0x01]),
    ...records.flatMap((record) => [encodeGamma(record.length + 1), record]),
    encodeGamma(0),
  ]);

export const sparseChunk = (tag: string, records: Array<[index: number, payload: Buffer]>): Buffer =>
  Buffer.concat([
    tagBytes(tag),
    Buffer.from([0x02]),
    ...records.flatMap(([index, payload]) => {
      const indexBytes = encodeGamma(index);
      return [encodeGamma(payload.length + indexBytes.length + 1), indexBytes, payload];
    }),
    encodeGamma(0),
  ]);

export const END_OF_CHUNKS = Buffer.alloc(4);

export const savegameHeader = (magic: string, version: number): Buffer => {
  const header = Buffer.alloc(8);
  header.write(magic, 0, "latin1");
  header.writeUInt16BE(version, 4);
  return header;
};

export const savegame = (magic: string, version: number, body: Buffer): Buffer => {
  const wrapped = magic === "OTTZ" ? deflateSync(body) : magic === "OTTX" ? xzStore(body) : body;
  return Buffer.concat([savegameHeader(magic, version), wrapped]);
};

/** Deterministic pseudo-random bytes. */
export const noise = (length: number, seed = 1): Buffer => {
  const bytes = Buffer.alloc(length);
  let state = seed;
  for (let i = 0; i < length; i += 1) {
    state = (state * 1664525 + 1013904223) % 0x1_0000_0000;
    bytes[i] = state >>> 24;
  }
  return bytes;
};

const uint32LE = (value: number): Buffer => {
  const bytes = Buffer.alloc(4);
  bytes.writeUInt32LE(value >>> 0, 0);
  return bytes;
};

const vli = (value: number): Buffer => {
  const bytes: number[] = [];
  let rest = value;
  while (rest >= 0x80) {
    bytes.push((rest % 0x80) | 0x80);
    rest = Math.floor(rest / 0x80);
  }
  bytes.push(rest);
  return Buffer.from(bytes);
};

const padTo4 = (length: number): Buffer => Buffer.alloc((4 - (length % 4)) % 4);

const LZMA2_MAX_STORED_CHUNK = 64 * 1024;

/**
 * Wraps `data` in a single-block .xz stream whose LZMA2 payload uses only
 * stored (uncompressed) chunks, so fixtures need no LZMA encoder.
 */
export const xzStore = (data: Buffer): Buffer => {
  const streamFlags = Buffer.from([0x00, 0x01]); // CRC32 check
  const streamHeader = Buffer.concat([
    Buffer.from([0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00]),
    streamFlags,
    uint32LE(crc32(streamFlags)),
  ]);

  // size byte, flags, LZMA2 filter id, props size, dictionary props (1 MiB), padding
  const blockHeaderBody = Buffer.from([0x02, 0x00, 0x21, 0x01, 0x10, 0x00, 0x00, 0x00]);
  const blockHeader = Buffer.concat([blockHeaderBody, uint32LE(crc32(blockHeaderBody))]);

  const lzma2: Buffer[] = [];
  for (let offset = 0; offset < data.length; offset += LZMA2_MAX_STORED_CHUNK) {
    const chunk = data.subarray(offset, offset + LZMA2_MAX_STORED_CHUNK);
    const control = Buffer.from([offset === 0 ? 0x01 : 0x02, 0, 0]);
    control.writeUInt16BE(chunk.length - 1, 1);
    lzma2.push(control, chunk);
  }
  lzma2.push(Buffer.from([0x00]));
  const compressed = Buffer.concat(lzma2);

  const check = uint32LE(crc32(data));
  const block = Buffer.concat([blockHeader, compressed, padTo4(compressed.length), check]);
  const unpaddedSize = blockHeader.length + compressed.length + check.length;

  const indexBody = Buffer.concat([Buffer.from([0x00]), vli(1), vli(unpaddedSize), vli(data.length)]);
  const indexPadded = Buffer.concat([indexBody, padTo4(indexBody.length)]);
  const index = Buffer.concat([indexPadded, uint32LE(crc32(indexPadded))]);

  const backwardSize = uint32LE(index.length / 4 - 1);
  const footerBody = Buffer.concat([backwardSize, streamFlags]);
  const streamFooter = Buffer.concat([uint32LE(crc32(footerBody)), footerBody, Buffer.from("YZ", "latin1")]);

  return Buffer.concat([streamHeader, block, index, streamFooter]);
};

/** Resolves to the `SavegameError` code a promise rejects with, or `undefined` if it resolves. */
export const errorCodeOf = async (promise: Promise<unknown>): Promise<string | undefined> => {
  try {
    await promise;
  } catch (error) {
    return isSavegameError(error) ? error.code : `unexpected ${String(error)}`;
  }
  return undefined;
};
