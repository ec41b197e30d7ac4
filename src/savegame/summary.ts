import type { CompressionFormat } from "./format.js";

export type SummaryValue = number | string | Buffer;

/** What one savegame boils down to; handed to reporting once the file is fully read. */
export interface SavegameSummary {
  filename: string;
  savegameVersion: number;
  compression: CompressionFormat;
  mapSize?: string;
  newgrfCount?: number;
  aiCount?: number;
  gsCount?: number;
  /** Values contributed by caller-registered chunk handlers. */
  extra: Map<string, SummaryValue>;
}

export const createSummary = (
  filename: string,
  savegameVersion: number,
  compression: CompressionFormat
): SavegameSummary => ({
  filename,
  savegameVersion,
  compression,
  extra: new Map(),
});

/**
 * Flat key/value view of a summary, with the keys reporting groups files by.
 * Optional fields that were never seen are left out.
 */
export const toSummaryEntries = (summary: SavegameSummary): Record<string, SummaryValue> => {
  const entries: Record<string, SummaryValue> = {
    filename: summary.filename,
    "savegame-version": summary.savegameVersion,
    compression: summary.compression,
  };
  if (summary.mapSize !== undefined) entries["map-size"] = summary.mapSize;
  if (summary.newgrfCount !== undefined) entries["newgrf-count"] = summary.newgrfCount;
  if (summary.aiCount !== undefined) entries["ai-count"] = summary.aiCount;
  if (summary.gsCount !== undefined) entries["gs-count"] = summary.gsCount;
  for (const [key, value] of summary.extra) {
    if (!(key in entries)) {
      entries[key] = value;
    }
  }
  return entries;
};

export const summaryToJson = (summary: SavegameSummary): Record<string, number | string> => {
  const json: Record<string, number | string> = {};
  for (const [key, value] of Object.entries(toSummaryEntries(summary))) {
    json[key] = Buffer.isBuffer(value) ? value.toString("hex") : value;
  }
  return json;
};
