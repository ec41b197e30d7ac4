export { analyzeFiles, analyzeSavegame, analyzeSavegameFile, readSavegameHeader } from "./savegame/analyzer.js";
export type { AnalysisResult, AnalyzerOptions, FileAnalysis, SavegameHeader } from "./savegame/analyzer.js";
export { ChunkIterator } from "./savegame/chunks.js";
export type { ChunkRecord } from "./savegame/chunks.js";
export { isSavegameError, SavegameError } from "./savegame/errors.js";
export type { SavegameErrorCode } from "./savegame/errors.js";
export { CHUNK_HANDLERS, FieldExtractor } from "./savegame/extractor.js";
export type { ChunkContext, ChunkHandler, ExtraHandlers } from "./savegame/extractor.js";
export { ChunkLayout, ChunkTag, CompressionFormat, DEFAULT_MAX_PAYLOAD_LENGTH } from "./savegame/format.js";
export { PrimitiveReader } from "./savegame/primitives.js";
export type { GammaValue, ReaderLimits } from "./savegame/primitives.js";
export { BufferSource, FileSource, openDecompressor, TransformSource } from "./savegame/sources.js";
export type { ByteSource, Decompressor } from "./savegame/sources.js";
export { createSummary, summaryToJson, toSummaryEntries } from "./savegame/summary.js";
export type { SavegameSummary, SummaryValue } from "./savegame/summary.js";
