import path from "node:path";
import { ChunkIterator } from "./chunks.js";
import { isSavegameError, SavegameError, withTag } from "./errors.js";
import { FieldExtractor } from "./extractor.js";
import type { ExtraHandlers } from "./extractor.js";
import { PrimitiveReader } from "./primitives.js";
import type { ReaderLimits } from "./primitives.js";
import { FileSource, openDecompressor } from "./sources.js";
import type { ByteSource } from "./sources.js";
import { createSummary } from "./summary.js";
import type { SavegameSummary } from "./summary.js";

export type AnalyzerOptions = {
  /** Upper bound for any declared payload or string length. */
  maxPayloadLength?: number;
  /** Size of the raw slices fed to a streaming decompressor. */
  rawChunkSize?: number;
  extraHandlers?: ExtraHandlers;
  /** Stop a batch after the first file that fails to decode. */
  failFast?: boolean;
};

export type SavegameHeader = {
  magic: Buffer;
  savegameVersion: number;
};

export type AnalysisResult =
  | { ok: true; summary: Readonly<SavegameSummary> }
  | { ok: false; error: SavegameError };

export type FileAnalysis = {
  path: string;
  result: AnalysisResult;
};

const limitsFrom = (options: AnalyzerOptions): Partial<ReaderLimits> => ({
  maxPayloadLength: options.maxPayloadLength,
});

export const readSavegameHeader = async (reader: PrimitiveReader): Promise<SavegameHeader> => {
  const magic = await reader.readBytes(4);
  const savegameVersion = await reader.readUint16();
  await reader.readUint16(); // reserved
  return { magic, savegameVersion };
};

/**
 * Decodes one savegame from `raw` and returns its summary. Throws
 * `SavegameError` on the first structural problem; `raw` is closed either way.
 */
export const analyzeSavegame = async (
  raw: ByteSource,
  filename: string,
  options: AnalyzerOptions = {}
): Promise<Readonly<SavegameSummary>> => {
  const limits = limitsFrom(options);
  const extractor = new FieldExtractor(options.extraHandlers, limits);
  let body = raw;
  let summary: Readonly<SavegameSummary>;
  try {
    const header = await readSavegameHeader(new PrimitiveReader(raw, limits));
    const decompressor = openDecompressor(header.magic, raw, options.rawChunkSize);
    body = decompressor.source;

    const fields = createSummary(filename, header.savegameVersion, decompressor.format);
    const chunks = new ChunkIterator(new PrimitiveReader(body, limits));
    for await (const record of chunks) {
      try {
        await extractor.visit(record, fields);
      } catch (error) {
        throw withTag(error, record.tagName);
      }
    }
    summary = Object.freeze(fields);
  } catch (error) {
    // The decode failure is what gets reported; a failing close behind it is not.
    await body.close().catch(() => undefined);
    throw error;
  }
  await body.close();
  return summary;
};

const toSavegameError = (error: unknown, filePath: string): SavegameError => {
  if (isSavegameError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new SavegameError("READ_FAILED", `Failed to analyze "${filePath}": ${message}`, { cause: error });
};

export const analyzeSavegameFile = async (
  filePath: string,
  options: AnalyzerOptions = {}
): Promise<AnalysisResult> => {
  try {
    const source = await FileSource.open(filePath);
    const summary = await analyzeSavegame(source, path.basename(filePath), options);
    return { ok: true, summary };
  } catch (error) {
    return { ok: false, error: toSavegameError(error, filePath) };
  }
};

/**
 * Analyzes files one at a time, in order. Failures are yielded like any other
 * result; with `failFast` the batch ends after the first one.
 */
export async function* analyzeFiles(
  filePaths: Iterable<string>,
  options: AnalyzerOptions = {}
): AsyncGenerator<FileAnalysis> {
  for (const filePath of filePaths) {
    const result = await analyzeSavegameFile(filePath, options);
    yield { path: filePath, result };
    if (!result.ok && options.failFast) {
      return;
    }
  }
}
