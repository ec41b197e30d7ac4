/** Stable savegame error codes. */
export type SavegameErrorCode =
  | "UNSUPPORTED_COMPRESSION"
  | "TRUNCATED"
  | "MALFORMED_TAIL"
  | "INVALID_CHUNK_TYPE"
  | "INVALID_GAMMA"
  | "INVALID_TEXT"
  | "INVALID_RECORD_LENGTH"
  | "LIMIT_EXCEEDED"
  | "CORRUPT_COMPRESSED_STREAM"
  | "READ_FAILED";

export type SavegameErrorOptions = {
  /** Chunk tag being decoded when the error happened. */
  tag?: string | undefined;
  /** Byte offset within the stream being read: the decompressed body, or a chunk payload. */
  offset?: number | undefined;
  cause?: unknown;
};

/** Error thrown for every structural failure while decoding a savegame. */
export class SavegameError extends Error {
  readonly code: SavegameErrorCode;
  readonly tag?: string | undefined;
  readonly offset?: number | undefined;

  constructor(code: SavegameErrorCode, message: string, options?: SavegameErrorOptions) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "SavegameError";
    this.code = code;
    this.tag = options?.tag;
    this.offset = options?.offset;
  }

  toJSON(): { name: string; code: SavegameErrorCode; message: string; tag?: string; offset?: number } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.tag === undefined ? {} : { tag: this.tag }),
      ...(this.offset === undefined ? {} : { offset: this.offset }),
    };
  }
}

export const isSavegameError = (value: unknown): value is SavegameError =>
  value instanceof SavegameError;

/** Attaches the chunk tag to an error raised while that chunk was decoded. */
export const withTag = (error: unknown, tag: string): unknown => {
  if (error instanceof SavegameError && error.tag === undefined) {
    return new SavegameError(error.code, `${error.message} (chunk ${JSON.stringify(tag)})`, {
      tag,
      offset: error.offset,
      cause: error.cause,
    });
  }
  return error;
};
